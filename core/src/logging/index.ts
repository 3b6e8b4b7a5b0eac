/**
 * Logging Module
 *
 * Injectable loggers and error classification helpers.
 */

export type { Logger, LoggerOptions } from "./logger.js";
export { createLogger, silentLogger } from "./logger.js";
export { getErrorCode, getErrorMessage } from "./error-utils.js";
