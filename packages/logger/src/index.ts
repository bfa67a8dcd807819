/**
 * @credforge/logger
 *
 * Structured logging with redaction of credential material.
 */

export { createLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS } from "./pii-redactor.js";
export { createLogErrorReporter } from "./error-reporter.js";
export type { ErrorReporter } from "./error-reporter.js";
