/**
 * Hono middleware for ssi-serve.
 *
 * @packageDocumentation
 */

export { loggerMiddleware, formatSize, type LoggerOptions } from './logger.js';
