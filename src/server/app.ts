/**
 * Hono app factory - creates the SPA and include-expanding file server
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { dirname, join } from 'path';
import pc from 'picocolors';

import type {
    FoundResolution,
    IncludeResult,
    ResolverOptions,
    ServerOptions,
} from '../types.js';
import { loggerMiddleware } from '../middleware/logger.js';
import { expandIncludesDetailed } from './includes.js';
import { LISTING_ERROR_MESSAGE, renderDirectoryListing } from './listing.js';
import { decodeUtf8 } from './loader.js';
import { getMimeType, isHtmlContentType } from './mime.js';
import { requestPathFromUrl } from './paths.js';
import { FALLBACK_FILE, NOT_FOUND_MESSAGE, resolveRequest } from './resolver.js';

/**
 * Options accepted by {@link createApp}.
 */
export interface AppOptions extends ResolverOptions {
    /** Disable request and include-problem logging. */
    quiet?: boolean;
}

/**
 * Logs include directives that could not be honoured.
 */
function reportIncludeProblems(
    requestPath: string,
    includes: IncludeResult[],
): void {
    for (const include of includes) {
        if (include.status === 'missing') {
            console.warn(
                pc.yellow(`  Include not found in ${requestPath}: ${include.path}`),
            );
        } else if (include.status === 'error') {
            console.warn(
                pc.yellow(
                    `  Include failed in ${requestPath}: ${include.path} (${include.error})`,
                ),
            );
        }
    }
}

/**
 * Sends a resolved file, expanding includes when it is HTML.
 *
 * Headers are computed from the final bytes, after expansion.
 */
async function sendFile(
    c: Context,
    requestPath: string,
    resolution: FoundResolution,
    quiet: boolean,
): Promise<Response> {
    const contentType = getMimeType(resolution.filePath);
    let bytes: Uint8Array = resolution.body;

    if (isHtmlContentType(contentType)) {
        const { content, includes } = await expandIncludesDetailed(
            decodeUtf8(resolution.body),
            dirname(resolution.filePath),
        );
        if (!quiet) {
            reportIncludeProblems(requestPath, includes);
        }
        bytes = new TextEncoder().encode(content);
    }

    const payload = Uint8Array.from(bytes);
    c.header('Content-Type', contentType);
    c.header('Content-Length', String(payload.byteLength));
    return c.body(payload, 200);
}

/**
 * Create a Hono app that serves `rootDir` with SPA fallback and
 * server-side includes.
 *
 * @example
 * ```typescript
 * import { serve } from '@hono/node-server';
 *
 * const app = createApp({ rootDir: './public', fallbackRoot: './public' });
 * serve({ fetch: app.fetch, port: 8000 });
 * ```
 */
export function createApp(options: AppOptions): Hono {
    const app = new Hono();
    const quiet = options.quiet ?? false;

    if (!quiet) {
        app.use('*', loggerMiddleware({ enabled: true }));
    }

    // HEAD is dispatched to this handler by Hono, minus the body
    app.get('*', async (c) => {
        const url = new URL(c.req.url);
        const requestPath = requestPathFromUrl(c.req.url);
        const resolution = await resolveRequest(requestPath, options);

        switch (resolution.kind) {
            case 'found':
                return sendFile(c, requestPath, resolution, quiet);

            case 'directory': {
                if (!url.pathname.endsWith('/')) {
                    return c.redirect(`${url.pathname}/${url.search}`, 301);
                }
                const listing = await renderDirectoryListing(
                    resolution.directoryPath,
                    requestPath,
                );
                if (listing === null) {
                    return c.text(LISTING_ERROR_MESSAGE, 404);
                }
                return c.html(listing);
            }

            case 'not-found':
                return c.text(resolution.message, resolution.status);

            case 'missing':
                return c.text(NOT_FOUND_MESSAGE, 404);
        }
    });

    app.all('*', (c) => {
        return c.text(`Unsupported method ('${c.req.method}')`, 501);
    });

    // Error handler
    app.onError((err, c) => {
        console.error(pc.red('Server error:'), err);
        return c.text('Internal Server Error', 500);
    });

    return app;
}

/**
 * Get server info for display
 */
export function getServerInfo(options: ServerOptions): string[] {
    const lines: string[] = [];

    lines.push(`Root: ${options.rootDir}`);
    lines.push(`SPA fallback: ${join(options.fallbackRoot, FALLBACK_FILE)}`);
    if (options.fallbackRoot !== options.rootDir) {
        lines.push(pc.yellow('  (fallback root differs from the served root)'));
    }
    lines.push('Includes: <!-- #include virtual="path" -->');
    lines.push('');
    lines.push(`Listening on: http://${options.host}:${options.port}`);

    if (options.quiet) {
        lines.push('Request logging: off');
    }

    return lines;
}
