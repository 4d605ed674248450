/**
 * Shared utility functions for ssi-serve.
 */

/**
 * The current version of ssi-serve.
 *
 * Used for displaying version information in the CLI.
 */
export const VERSION = '0.1.0';

/**
 * Percent-decodes a URL path or include target.
 *
 * Unlike `decodeURIComponent`, this never throws: each run of `%XX`
 * escapes is decoded as UTF-8, valid sequences are kept and every invalid
 * byte becomes U+FFFD. A `%` not followed by two hex digits is left as
 * written, and `+` is not treated as a space.
 *
 * @param value - The encoded string
 * @returns The decoded string
 *
 * @example
 * ```ts
 * unquote('my%20nav.html'); // 'my nav.html'
 * unquote('100%.html');     // '100%.html'
 * unquote('%C3%A9%FF');     // 'é\uFFFD'
 * ```
 */
export function unquote(value: string): string {
    const decoder = new TextDecoder('utf-8', { ignoreBOM: true });
    return value.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) => {
        const bytes = Uint8Array.from(
            run
                .slice(1)
                .split('%')
                .map((hex) => parseInt(hex, 16)),
        );
        return decoder.decode(bytes);
    });
}
