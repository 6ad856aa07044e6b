export { IngestionError } from "./ingestion-error.js";
export type { IngestionErrorOptions } from "./ingestion-error.js";

export {
  UnsupportedFormatError,
  CorruptDocumentError,
  ExtractionServiceError,
  TokenBudgetExceededError,
  EmbeddingServiceError,
  DimensionMismatchError,
  IndexWriteError,
  BlobWriteError,
  CancelledError,
  ConfigurationError,
  classifyError,
} from "./errors.js";
export type { ErrorContext, ServiceErrorContext, ClassifiedError } from "./errors.js";

export { createCircuitBreaker, isOpenCircuitError } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";

export { RetryPolicy, isRetryable } from "./retry.js";
export type { RetryPolicyOptions, RetryAttempt, RetryContext } from "./retry.js";

export { parseRetryAfter, isTransientStatus } from "./http-status.js";
