/**
 * Request path translation.
 *
 * Maps URL paths onto the served directory. `.` and `..` segments are
 * collapsed before joining, so a translated path never leaves the root.
 */

import { join, posix, sep } from 'path';
import { unquote } from '../utils.js';

/**
 * Extracts the decoded path of a request URL, without query or fragment.
 *
 * @param url - Absolute request URL
 * @returns The percent-decoded pathname
 *
 * @example
 * ```typescript
 * requestPathFromUrl('http://localhost/docs/my%20page.html?x=1');
 * // Returns: '/docs/my page.html'
 * ```
 */
export function requestPathFromUrl(url: string): string {
    return unquote(new URL(url).pathname);
}

/**
 * Translates a decoded request path into a filesystem path under `rootDir`.
 *
 * A trailing `/` on the request path is kept on the result, so that a
 * request for `/page.html/` does not match the file `page.html`.
 *
 * @param requestPath - Decoded URL path, e.g. `/docs/index.html`
 * @param rootDir - Directory being served
 * @returns Filesystem path inside `rootDir`
 *
 * @example
 * ```typescript
 * translateRequestPath('/a/../b/c.html', '/srv'); // '/srv/b/c.html'
 * translateRequestPath('/../../etc/passwd', '/srv'); // '/srv/etc/passwd'
 * ```
 */
export function translateRequestPath(
    requestPath: string,
    rootDir: string,
): string {
    const normalized = posix.normalize(`/${requestPath}`);
    const segments = normalized
        .split('/')
        .filter((segment) => segment !== '' && segment !== '.' && segment !== '..');

    const translated = join(rootDir, ...segments);
    if (requestPath.endsWith('/') && !translated.endsWith(sep)) {
        return translated + sep;
    }
    return translated;
}
