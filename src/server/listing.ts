/**
 * Directory listing for directories without an index document.
 */

import { readdir } from 'fs/promises';
import { html } from 'hono/html';

/**
 * Message sent with the 404 for a directory that cannot be read.
 */
export const LISTING_ERROR_MESSAGE = 'No permission to list directory';

interface ListingEntry {
    /** Text shown for the entry (`/` suffix for directories, `@` for symlinks). */
    label: string;
    /** Relative link target. */
    href: string;
}

async function readEntries(directoryPath: string): Promise<ListingEntry[]> {
    const dirents = await readdir(directoryPath, { withFileTypes: true });

    return dirents
        .sort((a, b) => {
            const left = a.name.toLowerCase();
            const right = b.name.toLowerCase();
            return left < right ? -1 : left > right ? 1 : 0;
        })
        .map((dirent) => {
            const href = encodeURIComponent(dirent.name);
            if (dirent.isDirectory()) {
                return { label: `${dirent.name}/`, href: `${href}/` };
            }
            if (dirent.isSymbolicLink()) {
                return { label: `${dirent.name}@`, href };
            }
            return { label: dirent.name, href };
        });
}

/**
 * Renders an HTML listing of a directory.
 *
 * Entries are sorted case-insensitively. Names are HTML-escaped in the link
 * text and percent-encoded in the link target.
 *
 * @param directoryPath - Directory to list
 * @param displayPath - Decoded request path shown in the title, e.g. `/assets/`
 * @returns The page, or `null` when the directory cannot be read
 */
export async function renderDirectoryListing(
    directoryPath: string,
    displayPath: string,
): Promise<string | null> {
    let entries: ListingEntry[];
    try {
        entries = await readEntries(directoryPath);
    } catch {
        return null;
    }

    const title = `Directory listing for ${displayPath}`;
    const page = await html`<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${title}</title>
</head>
<body>
<h1>${title}</h1>
<hr>
<ul>
${entries.map((entry) => html`<li><a href="${entry.href}">${entry.label}</a></li>\n`)}</ul>
<hr>
</body>
</html>
`;

    return page.toString();
}
