/**
 * Command line interface for ssi-serve.
 *
 * Defines the single serve command and its options using commander.js.
 */

import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'path';
import pc from 'picocolors';

import { resolveRootDir } from './server/loader.js';
import { runServer } from './runner.js';
import { VERSION } from './utils.js';

/**
 * Port used when `--port` is not given.
 */
export const DEFAULT_PORT = 8000;

/**
 * Options parsed from the command line.
 */
export interface CliOptions {
    /** Port to listen on. */
    port: number;
    /** Host to bind to. */
    host: string;
    /** Directory holding the SPA fallback `index.html`. */
    fallbackRoot?: string;
    /** Disable request logging. */
    quiet: boolean;
}

/**
 * Parses and validates a `--port` value.
 *
 * @param value - Raw option value
 * @returns The port number
 * @throws {InvalidArgumentError} When the value is not an integer in 0-65535
 */
export function parsePort(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new InvalidArgumentError('Port must be an integer.');
    }
    const port = Number(value);
    if (port > 65535) {
        throw new InvalidArgumentError('Port must be between 0 and 65535.');
    }
    return port;
}

/**
 * Starts the server for a parsed command line.
 */
async function serveCommand(root: string, opts: CliOptions): Promise<void> {
    try {
        const rootDir = await resolveRootDir(root);
        const server = runServer({
            rootDir,
            fallbackRoot: resolve(opts.fallbackRoot ?? process.cwd()),
            port: opts.port,
            host: opts.host,
            quiet: opts.quiet,
        });

        process.once('SIGINT', () => {
            console.log(pc.gray('\n  Shutting down...'));
            server.close(() => process.exit(0));
        });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(pc.red(`\nError: ${message}`));
        process.exit(1);
    }
}

/**
 * Builds the commander program.
 */
export function createProgram(): Command {
    return new Command()
        .name('ssi-serve')
        .description(
            'Serve a directory with SPA fallback and server-side includes',
        )
        .version(VERSION)
        .argument('[root]', 'Directory to serve', '.')
        .option('-p, --port <number>', 'Port to listen on', parsePort, DEFAULT_PORT)
        .option('-H, --host <string>', 'Host to bind to', 'localhost')
        .option(
            '--fallback-root <dir>',
            'Directory holding the SPA fallback index.html (default: working directory)',
        )
        .option('-q, --quiet', 'Disable request logging', false)
        .action(serveCommand);
}

/**
 * Parses the command line and runs the server.
 *
 * @param argv - Full process argv, including the node and script paths
 */
export async function main(argv: string[] = process.argv): Promise<void> {
    await createProgram().parseAsync(argv);
}
