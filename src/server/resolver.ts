/**
 * Path resolver.
 *
 * Decides what a request path refers to: an existing file, a directory's
 * index file, the SPA fallback document, or nothing. The resolver reads
 * the chosen file into memory so the transport can compute headers from
 * the final bytes before sending anything.
 *
 * @packageDocumentation
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import type {
    NotFoundResolution,
    Resolution,
    ResolverOptions,
} from '../types.js';
import { directoryExists, pathExists } from './loader.js';
import { translateRequestPath } from './paths.js';

/**
 * Index documents probed inside a requested directory, in priority order.
 */
export const INDEX_FILES = ['index.html', 'index.htm'] as const;

/**
 * Document served for missing `.html` paths, relative to the fallback root.
 */
export const FALLBACK_FILE = 'index.html';

/**
 * Message sent with every 404.
 */
export const NOT_FOUND_MESSAGE = 'File not found';

function notFound(): NotFoundResolution {
    return { kind: 'not-found', status: 404, message: NOT_FOUND_MESSAGE };
}

/**
 * Finds the index document of a directory.
 *
 * @param directory - Directory to probe
 * @returns Path of the first existing entry of {@link INDEX_FILES}, or `null`
 */
export async function findIndexFile(directory: string): Promise<string | null> {
    for (const name of INDEX_FILES) {
        const candidate = join(directory, name);
        if (await pathExists(candidate)) {
            return candidate;
        }
    }
    return null;
}

/**
 * Resolves a decoded request path to the content that should be served.
 *
 * - A directory is replaced by its `index.html` (or `index.htm`); without
 *   either, the result is `directory`.
 * - A missing path ending in `.html` is replaced by `index.html` from
 *   `fallbackRoot` so client-side routers can handle it. Without that file
 *   the result is `not-found`.
 * - Any other missing path is `missing`.
 * - A file that exists but cannot be read is `not-found`. There is no retry.
 *
 * The same path against an unchanged filesystem always resolves the same way.
 *
 * @param requestPath - Decoded URL path, e.g. `/about.html`
 * @param options - Served root and SPA fallback root
 * @returns The resolution outcome
 *
 * @example
 * ```typescript
 * const resolution = await resolveRequest('/settings/profile.html', {
 *     rootDir: '/srv/app',
 *     fallbackRoot: '/srv/app',
 * });
 * if (resolution.kind === 'found') {
 *     console.log(resolution.filePath, resolution.fallback);
 * }
 * ```
 */
export async function resolveRequest(
    requestPath: string,
    options: ResolverOptions,
): Promise<Resolution> {
    let filePath = translateRequestPath(requestPath, options.rootDir);
    let fallback = false;

    if (await directoryExists(filePath)) {
        const indexFile = await findIndexFile(filePath);
        if (indexFile === null) {
            return { kind: 'directory', directoryPath: filePath };
        }
        filePath = indexFile;
    }

    if (!(await pathExists(filePath))) {
        if (!requestPath.endsWith('.html')) {
            return { kind: 'missing', filePath };
        }

        const fallbackPath = join(options.fallbackRoot, FALLBACK_FILE);
        if (!(await pathExists(fallbackPath))) {
            return notFound();
        }
        filePath = fallbackPath;
        fallback = true;
    }

    let body: Uint8Array;
    try {
        body = await readFile(filePath);
    } catch {
        return notFound();
    }

    return { kind: 'found', filePath, body, fallback };
}
