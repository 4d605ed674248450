/**
 * Programmatic interface for running the server.
 *
 * @packageDocumentation
 */

import { serve, type ServerType } from '@hono/node-server';
import pc from 'picocolors';
import { createApp, getServerInfo } from './server/app.js';
import type { ServerOptions } from './types.js';

/**
 * Runs the server programmatically.
 *
 * Prints a start-up banner, then starts listening. The returned server
 * keeps running until it is closed or the process exits.
 *
 * @param options - Server configuration options
 * @returns The underlying Node.js server
 *
 * @example
 * ```typescript
 * import { runServer } from 'ssi-serve';
 *
 * const server = runServer({
 *     rootDir: '/srv/app',
 *     fallbackRoot: '/srv/app',
 *     port: 8000,
 *     host: 'localhost',
 * });
 * process.once('SIGINT', () => server.close());
 * ```
 */
export function runServer(options: ServerOptions): ServerType {
    console.log(pc.bold(pc.cyan('\n  SPA + SSI Server')));
    console.log(pc.gray('  ' + '─'.repeat(30)));
    console.log();

    for (const line of getServerInfo(options)) {
        console.log(`  ${line}`);
    }
    console.log();

    const app = createApp(options);

    return serve(
        {
            fetch: app.fetch,
            port: options.port,
            hostname: options.host,
        },
        (info) => {
            console.log(pc.green(`  Server started on port ${info.port}!`));
            console.log();
            console.log(pc.gray(`  Press ${pc.bold('Ctrl+C')} to stop`));
            console.log();
        },
    );
}
