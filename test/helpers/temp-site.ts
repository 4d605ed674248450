/**
 * Temporary site directories for filesystem-backed tests.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

/**
 * Creates an empty temporary directory with a unique name.
 */
export async function createTempDir(prefix = 'ssi-serve-test-'): Promise<string> {
    return mkdtemp(join(tmpdir(), prefix));
}

/**
 * Removes a temporary directory and everything below it.
 */
export async function removeTempDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

/**
 * Creates a file (and its parent directories) inside `dir`.
 *
 * @returns The absolute path of the file
 */
export async function createFile(
    dir: string,
    relativePath: string,
    content: string | Uint8Array,
): Promise<string> {
    const fullPath = join(dir, relativePath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content);
    return fullPath;
}

/**
 * Creates several files at once, keyed by path relative to `dir`.
 */
export async function createFiles(
    dir: string,
    files: Record<string, string | Uint8Array>,
): Promise<void> {
    for (const [relativePath, content] of Object.entries(files)) {
        await createFile(dir, relativePath, content);
    }
}

/**
 * Bytes that are not valid UTF-8 (a lone continuation byte and an
 * overlong lead byte).
 */
export const INVALID_UTF8 = new Uint8Array([0x3c, 0x70, 0x3e, 0x80, 0xc0, 0x3c]);

/**
 * The UTF-8 byte order mark.
 */
export const UTF8_BOM = new Uint8Array([0xef, 0xbb, 0xbf]);

/**
 * Encodes `text` as UTF-8 behind a byte order mark.
 */
export function withBom(text: string): Uint8Array {
    const body = new TextEncoder().encode(text);
    const bytes = new Uint8Array(UTF8_BOM.length + body.length);
    bytes.set(UTF8_BOM);
    bytes.set(body, UTF8_BOM.length);
    return bytes;
}
