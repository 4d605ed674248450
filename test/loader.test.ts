import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import {
    decodeUtf8,
    directoryExists,
    fileExists,
    pathExists,
    readUtf8File,
    resolveRootDir,
} from '../src/server/loader.js';
import { RootDirectoryError } from '../src/errors.js';
import {
    INVALID_UTF8,
    createFile,
    createTempDir,
    removeTempDir,
    withBom,
} from './helpers/temp-site.js';

describe('loader', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await createTempDir();
    });

    afterEach(async () => {
        await removeTempDir(dir);
    });

    describe('existence checks', () => {
        it('should tell files and directories apart', async () => {
            const file = await createFile(dir, 'a.txt', 'a');

            expect(await fileExists(file)).toBe(true);
            expect(await directoryExists(file)).toBe(false);
            expect(await fileExists(dir)).toBe(false);
            expect(await directoryExists(dir)).toBe(true);
            expect(await pathExists(file)).toBe(true);
            expect(await pathExists(dir)).toBe(true);
        });

        it('should return false for missing paths', async () => {
            const missing = join(dir, 'missing');

            expect(await pathExists(missing)).toBe(false);
            expect(await fileExists(missing)).toBe(false);
            expect(await directoryExists(missing)).toBe(false);
        });
    });

    describe('decodeUtf8', () => {
        it('should decode valid UTF-8', () => {
            expect(decodeUtf8(new TextEncoder().encode('naïve'))).toBe('naïve');
        });

        it('should keep a leading byte order mark', () => {
            expect(decodeUtf8(withBom('<p>'))).toBe('\uFEFF<p>');
        });

        it('should throw on invalid UTF-8', () => {
            expect(() => decodeUtf8(INVALID_UTF8)).toThrow(TypeError);
        });
    });

    describe('readUtf8File', () => {
        it('should read a UTF-8 file', async () => {
            const file = await createFile(dir, 'p.html', '<p>ü</p>');

            expect(await readUtf8File(file)).toBe('<p>ü</p>');
        });

        it('should keep the byte order mark of a file', async () => {
            const file = await createFile(dir, 'b.html', withBom('hi'));

            expect(await readUtf8File(file)).toBe('\uFEFFhi');
        });

        it('should reject for a missing file', async () => {
            await expect(readUtf8File(join(dir, 'nope.html'))).rejects.toThrow();
        });
    });

    describe('resolveRootDir', () => {
        it('should return the absolute directory path', async () => {
            expect(await resolveRootDir(dir)).toBe(dir);
        });

        it('should reject a missing directory', async () => {
            const missing = join(dir, 'public');

            await expect(resolveRootDir(missing)).rejects.toThrow(
                new RootDirectoryError(missing, 'missing'),
            );
        });

        it('should reject a file', async () => {
            const file = await createFile(dir, 'index.html', 'x');

            const error = await resolveRootDir(file).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(RootDirectoryError);
            if (error instanceof RootDirectoryError) {
                expect(error.problem).toBe('not-a-directory');
                expect(error.path).toBe(file);
                expect(error.message).toBe(`Root path is not a directory: ${file}`);
            }
        });
    });
});
