/**
 * `ssi-serve` - Static file server for single-page applications with
 * server-side includes.
 *
 * ## Features
 *
 * - Serves files from a root directory, with `index.html` / `index.htm`
 *   for directories
 * - SPA fallback: a missing `.html` path is answered with the root
 *   `index.html`, so client-side routers can take over
 * - Expands `<!-- #include virtual="path" -->` in HTML documents
 *
 * ## Usage
 *
 * ### CLI
 *
 * ```bash
 * ssi-serve ./public --port 8000
 * ```
 *
 * ### Programmatic
 *
 * ```typescript
 * import { createApp } from 'ssi-serve';
 * import { serve } from '@hono/node-server';
 *
 * const app = createApp({ rootDir: './public', fallbackRoot: './public' });
 * serve({ fetch: app.fetch, port: 8000 });
 * ```
 *
 * @packageDocumentation
 */

export * from './server/index.js';
export { loggerMiddleware, formatSize, type LoggerOptions } from './middleware/index.js';
export { runServer } from './runner.js';
export { RootDirectoryError, type RootDirectoryProblem } from './errors.js';
export { VERSION, unquote } from './utils.js';
export * from './types.js';
