#!/usr/bin/env node
/**
 * Entry point for the ssi-serve CLI application.
 *
 * @packageDocumentation
 */

import { main } from './cli.js';

main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`\n[ssi-serve] A fatal, unhandled error occurred: ${message}`);
    if (process.env.DEBUG && error instanceof Error) {
        console.error(error.stack);
    }
    process.exit(1);
});
