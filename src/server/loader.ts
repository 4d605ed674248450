/**
 * Filesystem helpers.
 *
 * Thin wrappers over `fs/promises` that answer existence questions without
 * throwing, plus strict UTF-8 decoding for documents that pass through the
 * include expander.
 *
 * @packageDocumentation
 */

import { readFile, stat } from 'fs/promises';
import type { Stats } from 'fs';
import { resolve } from 'path';
import { RootDirectoryError } from '../errors.js';

/**
 * Stats a path, following symlinks.
 *
 * @param path - Path to check
 * @returns The stats, or `null` when the path cannot be stat'ed
 */
export async function statOrNull(path: string): Promise<Stats | null> {
    try {
        return await stat(path);
    } catch {
        return null;
    }
}

/**
 * Checks if anything (file, directory or other) exists at the given path.
 *
 * @param path - Path to check
 * @returns `true` if the path exists, `false` otherwise
 */
export async function pathExists(path: string): Promise<boolean> {
    return (await statOrNull(path)) !== null;
}

/**
 * Checks if a directory exists at the given path.
 *
 * @param path - Path to check
 * @returns `true` if a directory exists at the path, `false` otherwise
 */
export async function directoryExists(path: string): Promise<boolean> {
    const stats = await statOrNull(path);
    return stats?.isDirectory() ?? false;
}

/**
 * Checks if a regular file exists at the given path.
 *
 * @param path - Path to check
 * @returns `true` if a file exists at the path, `false` otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
    const stats = await statOrNull(path);
    return stats?.isFile() ?? false;
}

/**
 * Decodes bytes as UTF-8, throwing on malformed input instead of
 * substituting replacement characters. A leading byte order mark is kept
 * as U+FEFF so the document round-trips byte for byte.
 *
 * @param bytes - Encoded document
 * @returns The decoded text
 * @throws {TypeError} When the bytes are not valid UTF-8
 */
export function decodeUtf8(bytes: Uint8Array): string {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
}

/**
 * Reads a file as strict UTF-8 text.
 *
 * @param path - File to read
 * @returns The file contents
 * @throws When the file cannot be read or is not valid UTF-8
 */
export async function readUtf8File(path: string): Promise<string> {
    return decodeUtf8(await readFile(path));
}

/**
 * Resolves and validates the directory to serve.
 *
 * @param input - Path to resolve (may be relative or absolute)
 * @returns Resolved absolute path to the directory
 * @throws {RootDirectoryError} When the path is missing or not a directory
 *
 * @example
 * ```typescript
 * const rootDir = await resolveRootDir('./public');
 * ```
 */
export async function resolveRootDir(input: string): Promise<string> {
    const resolved = resolve(input);
    const stats = await statOrNull(resolved);

    if (!stats) {
        throw new RootDirectoryError(resolved, 'missing');
    }
    if (!stats.isDirectory()) {
        throw new RootDirectoryError(resolved, 'not-a-directory');
    }

    return resolved;
}
