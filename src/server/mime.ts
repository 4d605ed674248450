/**
 * Content type lookup by file extension.
 */

import { extname } from 'path';

/**
 * Content type of documents that go through include expansion.
 */
export const HTML_CONTENT_TYPE = 'text/html';

/**
 * MIME types for static files
 */
const MIME_TYPES: Record<string, string> = {
    '.html': HTML_CONTENT_TYPE,
    '.htm': HTML_CONTENT_TYPE,
    '.css': 'text/css',
    '.js': 'text/javascript',
    '.mjs': 'text/javascript',
    '.json': 'application/json',
    '.map': 'application/json',
    '.webmanifest': 'application/manifest+json',
    '.wasm': 'application/wasm',
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.gif': 'image/gif',
    '.svg': 'image/svg+xml',
    '.webp': 'image/webp',
    '.avif': 'image/avif',
    '.ico': 'image/x-icon',
    '.woff': 'font/woff',
    '.woff2': 'font/woff2',
    '.ttf': 'font/ttf',
    '.eot': 'application/vnd.ms-fontobject',
    '.otf': 'font/otf',
    '.mp4': 'video/mp4',
    '.webm': 'video/webm',
    '.mp3': 'audio/mpeg',
    '.wav': 'audio/wav',
    '.ogg': 'audio/ogg',
    '.pdf': 'application/pdf',
    '.txt': 'text/plain',
    '.csv': 'text/csv',
    '.md': 'text/markdown',
    '.xml': 'application/xml',
};

/**
 * Get MIME type from file extension
 *
 * @param filePath - Path or file name
 * @returns The content type, or `application/octet-stream` for unknown extensions
 */
export function getMimeType(filePath: string): string {
    const ext = extname(filePath).toLowerCase();
    return MIME_TYPES[ext] ?? 'application/octet-stream';
}

/**
 * Whether a content type marks a document for include expansion.
 */
export function isHtmlContentType(contentType: string): boolean {
    return contentType === HTML_CONTENT_TYPE;
}
