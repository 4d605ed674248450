/**
 * Core server functionality.
 *
 * This module exports the Hono app factory, the path resolver, the include
 * expander and the filesystem helpers they share.
 *
 * @packageDocumentation
 */

export { createApp, getServerInfo, type AppOptions } from './app.js';
export {
    resolveRequest,
    findIndexFile,
    INDEX_FILES,
    FALLBACK_FILE,
    NOT_FOUND_MESSAGE,
} from './resolver.js';
export {
    expandIncludes,
    expandIncludesDetailed,
    missingIncludeComment,
    includeErrorComment,
} from './includes.js';
export { translateRequestPath, requestPathFromUrl } from './paths.js';
export { getMimeType, isHtmlContentType, HTML_CONTENT_TYPE } from './mime.js';
export { renderDirectoryListing, LISTING_ERROR_MESSAGE } from './listing.js';
export {
    statOrNull,
    pathExists,
    directoryExists,
    fileExists,
    decodeUtf8,
    readUtf8File,
    resolveRootDir,
} from './loader.js';
