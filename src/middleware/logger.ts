/**
 * Logger middleware for request logging.
 *
 * This module provides Hono middleware that logs HTTP requests with
 * colorized output showing time of day, method, path, status code,
 * body size and response time.
 *
 * @packageDocumentation
 */

import type { Context, Next } from 'hono';
import pc from 'picocolors';

/**
 * Configuration options for the logger middleware.
 */
export interface LoggerOptions {
    /** Whether request logging is enabled. */
    enabled: boolean;
}

/**
 * Formats an HTTP method with appropriate color coding.
 *
 * @param method - The HTTP method to format
 * @returns The colorized method string
 */
function formatMethod(method: string): string {
    switch (method) {
        case 'GET':
            return pc.green(method);
        case 'HEAD':
            return pc.cyan(method);
        default:
            return pc.gray(method);
    }
}

/**
 * Formats an HTTP status code with appropriate color coding.
 *
 * Colors are applied based on status code ranges:
 * - 2xx (success): green
 * - 3xx (redirect): cyan
 * - 4xx (client error): yellow
 * - 5xx (server error): red
 *
 * @param status - The HTTP status code to format
 * @returns The colorized status string
 */
function formatStatus(status: number): string {
    if (status >= 200 && status < 300) {
        return pc.green(String(status));
    } else if (status >= 300 && status < 400) {
        return pc.cyan(String(status));
    } else if (status >= 400 && status < 500) {
        return pc.yellow(String(status));
    } else if (status >= 500) {
        return pc.red(String(status));
    }
    return String(status);
}

/**
 * Formats a `Content-Length` header value as a human-readable size.
 *
 * @param contentLength - Raw header value, if any
 * @returns e.g. `"512B"`, `"1.5kB"`, or `"-"` when unknown
 */
export function formatSize(contentLength: string | null): string {
    if (contentLength === null) {
        return '-';
    }
    const bytes = Number(contentLength);
    if (!Number.isFinite(bytes)) {
        return '-';
    }
    if (bytes < 1024) {
        return `${bytes}B`;
    }
    if (bytes < 1024 * 1024) {
        return `${(bytes / 1024).toFixed(1)}kB`;
    }
    return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

/**
 * Formats response time with color coding based on duration.
 *
 * @param ms - Response time in milliseconds
 * @returns The colorized time string with "ms" suffix
 */
function formatTime(ms: number): string {
    if (ms < 100) {
        return pc.green(`${ms.toFixed(0)}ms`);
    } else if (ms < 500) {
        return pc.yellow(`${ms.toFixed(0)}ms`);
    }
    return pc.red(`${ms.toFixed(0)}ms`);
}

/**
 * Creates a Hono middleware that logs HTTP requests.
 *
 * Logs each request after the response is built.
 *
 * @param options - Logger configuration options
 * @returns A Hono middleware function
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono';
 * import { loggerMiddleware } from 'ssi-serve';
 *
 * const app = new Hono();
 * app.use('*', loggerMiddleware({ enabled: true }));
 *
 * // Output example:
 * //   14:03:27 GET /about.html 200 1.2kB 3ms
 * ```
 */
export function loggerMiddleware(options: LoggerOptions = { enabled: true }) {
    return async (c: Context, next: Next) => {
        if (!options.enabled) {
            return next();
        }

        const start = Date.now();
        const method = c.req.method;
        const path = new URL(c.req.url).pathname;

        await next();

        const elapsed = Date.now() - start;
        const clock = new Date().toTimeString().slice(0, 8);
        const size = formatSize(c.res.headers.get('Content-Length'));

        console.log(
            `  ${pc.gray(clock)} ${formatMethod(method)} ${path} ${formatStatus(c.res.status)} ${pc.gray(size)} ${formatTime(elapsed)}`,
        );
    };
}
