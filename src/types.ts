/**
 * Type definitions for ssi-serve.
 *
 * This module exports the types shared by the path resolver, the include
 * expander and the HTTP transport.
 *
 * @packageDocumentation
 */

/**
 * Directories consulted when resolving a request path.
 */
export interface ResolverOptions {
    /** Directory that request paths are translated into. */
    rootDir: string;

    /**
     * Directory holding the SPA fallback `index.html`.
     *
     * Usually the same as `rootDir`, but kept separate: the CLI defaults it
     * to the working directory, which may differ from the served root.
     */
    fallbackRoot: string;
}

/**
 * Configuration options for the server.
 *
 * @example
 * ```typescript
 * const options: ServerOptions = {
 *     rootDir: '/srv/app',
 *     fallbackRoot: '/srv/app',
 *     port: 8000,
 *     host: 'localhost',
 * };
 * ```
 */
export interface ServerOptions extends ResolverOptions {
    /** Port to listen on. `0` picks a free port. */
    port: number;

    /** Host to bind to. */
    host: string;

    /** Disable request and include-problem logging. */
    quiet?: boolean;
}

/**
 * The request resolved to a file whose bytes were read successfully.
 */
export interface FoundResolution {
    kind: 'found';

    /** Absolute path of the file that will be served. */
    filePath: string;

    /** Raw file contents. */
    body: Uint8Array;

    /** Whether the file is the SPA fallback rather than the requested path. */
    fallback: boolean;
}

/**
 * Nothing can be served; the transport answers with a 404.
 */
export interface NotFoundResolution {
    kind: 'not-found';
    status: 404;
    message: string;
}

/**
 * The request named a directory holding neither `index.html` nor
 * `index.htm`. Handled by the default directory behaviour.
 */
export interface DirectoryResolution {
    kind: 'directory';
    directoryPath: string;
}

/**
 * A non-HTML path that does not exist. Handled by the default not-found
 * behaviour; the SPA fallback never applies here.
 */
export interface MissingResolution {
    kind: 'missing';
    filePath: string;
}

/**
 * Outcome of resolving one request path.
 */
export type Resolution =
    | FoundResolution
    | NotFoundResolution
    | DirectoryResolution
    | MissingResolution;

/**
 * What happened to a single include directive.
 */
export type IncludeStatus = 'included' | 'missing' | 'error';

/**
 * Report for one include directive found in a document.
 */
export interface IncludeResult {
    /** The directive exactly as it appeared in the document. */
    directive: string;

    /** Filesystem path the directive resolved to. */
    path: string;

    status: IncludeStatus;

    /** Error message when `status` is `'error'`. */
    error?: string;
}

/**
 * Expanded document together with a report for each directive, in
 * document order.
 */
export interface ExpansionResult {
    content: string;
    includes: IncludeResult[];
}
