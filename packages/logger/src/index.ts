/**
 * @ingestline/logger
 *
 * Structured logging with credential redaction for the ingestion pipeline.
 */

export { createLogger, createChildLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactFields, isSecretKey, maskUrlCredentials, REDACT_PATHS } from "./redaction.js";
