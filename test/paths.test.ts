import { describe, it, expect } from 'vitest';
import { join, sep } from 'path';
import {
    requestPathFromUrl,
    translateRequestPath,
} from '../src/server/paths.js';

const ROOT = join(sep, 'srv', 'site');

describe('translateRequestPath', () => {
    it('should join the request path onto the root', () => {
        expect(translateRequestPath('/docs/page.html', ROOT)).toBe(
            join(ROOT, 'docs', 'page.html'),
        );
    });

    it('should keep a trailing slash', () => {
        expect(translateRequestPath('/docs/', ROOT)).toBe(
            join(ROOT, 'docs') + sep,
        );
    });

    it('should map the bare root path to the root directory', () => {
        expect(translateRequestPath('/', ROOT)).toBe(ROOT + sep);
    });

    it('should collapse dot segments inside the path', () => {
        expect(translateRequestPath('/a/./b/../c.html', ROOT)).toBe(
            join(ROOT, 'a', 'c.html'),
        );
    });

    it('should never climb above the root', () => {
        expect(translateRequestPath('/../../etc/passwd', ROOT)).toBe(
            join(ROOT, 'etc', 'passwd'),
        );
    });

    it('should ignore repeated slashes', () => {
        expect(translateRequestPath('//a///b.css', ROOT)).toBe(
            join(ROOT, 'a', 'b.css'),
        );
    });
});

describe('requestPathFromUrl', () => {
    it('should drop the query and fragment', () => {
        expect(requestPathFromUrl('http://localhost/app.html?tab=1#top')).toBe(
            '/app.html',
        );
    });

    it('should percent-decode the pathname', () => {
        expect(requestPathFromUrl('http://localhost/my%20page.html')).toBe(
            '/my page.html',
        );
    });
});
