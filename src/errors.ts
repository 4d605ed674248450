/**
 * Error definitions for ssi-serve.
 *
 * Request-level failures never throw: they become 404 responses or inline
 * comments. The errors here stop the server from starting.
 */

/**
 * Reason a root directory was rejected.
 */
export type RootDirectoryProblem = 'missing' | 'not-a-directory';

/**
 * Error thrown when the directory to serve does not exist or is a file.
 */
export class RootDirectoryError extends Error {
    readonly name = 'RootDirectoryError';

    /**
     * @param path - The resolved directory path
     * @param problem - Why the path cannot be served
     */
    constructor(
        public readonly path: string,
        public readonly problem: RootDirectoryProblem,
    ) {
        super(
            problem === 'missing'
                ? `Root directory not found: ${path}`
                : `Root path is not a directory: ${path}`,
        );
    }
}
