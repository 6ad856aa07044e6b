import type { ErrorKind } from "@ingestline/types";
import { IngestionError } from "./ingestion-error.js";

export interface ErrorContext {
  documentId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export interface ServiceErrorContext extends ErrorContext {
  /** HTTP status reported by the backend, when there was a response. */
  status?: number;
  /** Backend hint (e.g. `Retry-After`) for the earliest next attempt. */
  retryAfterMs?: number;
  retryable?: boolean;
}

export class UnsupportedFormatError extends IngestionError {
  public readonly mediaType: string;

  constructor(mediaType: string, options?: ErrorContext) {
    super({
      message: `Unsupported media type: ${mediaType}`,
      code: "UNSUPPORTED_FORMAT",
      kind: "UnsupportedFormat",
      ...options,
    });
    this.mediaType = mediaType;
  }
}

export class CorruptDocumentError extends IngestionError {
  constructor(message = "Document is malformed", options?: ErrorContext) {
    super({ message, code: "CORRUPT_DOCUMENT", kind: "CorruptDocument", ...options });
  }
}

export class ExtractionServiceError extends IngestionError {
  public readonly status?: number;
  public readonly retryAfterMs?: number;

  constructor(message = "Text extraction service error", options?: ServiceErrorContext) {
    const { status, retryAfterMs, retryable = true, ...rest } = options ?? {};
    super({
      message,
      code: "EXTRACTION_SERVICE_ERROR",
      kind: "ExtractionServiceError",
      retryable,
      ...rest,
    });
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }
}

export class TokenBudgetExceededError extends IngestionError {
  public readonly chunkId: string;
  public readonly tokenCount: number;
  public readonly limit: number;

  constructor(chunkId: string, tokenCount: number, limit: number, options?: ErrorContext) {
    super({
      message: `Chunk ${chunkId} has ${String(tokenCount)} tokens, model limit is ${String(limit)}`,
      code: "TOKEN_BUDGET_EXCEEDED",
      kind: "TokenBudgetExceeded",
      ...options,
    });
    this.chunkId = chunkId;
    this.tokenCount = tokenCount;
    this.limit = limit;
  }
}

export class EmbeddingServiceError extends IngestionError {
  public readonly status?: number;
  public readonly retryAfterMs?: number;

  constructor(message = "Embedding service error", options?: ServiceErrorContext) {
    const { status, retryAfterMs, retryable = true, ...rest } = options ?? {};
    super({
      message,
      code: "EMBEDDING_SERVICE_ERROR",
      kind: "EmbeddingServiceError",
      retryable,
      ...rest,
    });
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }
}

export class DimensionMismatchError extends IngestionError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, chunkId: string, options?: ErrorContext) {
    super({
      message: `Embedding for chunk ${chunkId} has dimension ${String(actual)}, expected ${String(expected)}`,
      code: "DIMENSION_MISMATCH",
      kind: "DimensionMismatch",
      ...options,
    });
    this.expected = expected;
    this.actual = actual;
  }
}

export class IndexWriteError extends IngestionError {
  constructor(message = "Index write failed", options?: ErrorContext) {
    super({ message, code: "INDEX_WRITE_ERROR", kind: "IndexWriteError", ...options });
  }
}

export class BlobWriteError extends IngestionError {
  constructor(message = "Blob write failed", options?: ErrorContext) {
    super({ message, code: "BLOB_WRITE_ERROR", kind: "BlobWriteError", ...options });
  }
}

export class CancelledError extends IngestionError {
  constructor(message = "Ingestion cancelled", options?: ErrorContext) {
    super({ message, code: "CANCELLED", kind: "Cancelled", ...options });
  }
}

export class ConfigurationError extends IngestionError {
  public readonly fields: Record<string, string>;

  constructor(
    message = "Invalid configuration",
    fields: Record<string, string> = {},
    options?: ErrorContext,
  ) {
    super({ message, code: "CONFIGURATION_ERROR", kind: "ConfigurationError", ...options });
    this.fields = fields;
  }
}

export interface ClassifiedError {
  kind: ErrorKind;
  message: string;
}

/**
 * Reduce any thrown value to the kind/message pair recorded in a run summary.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (IngestionError.isIngestionError(err)) {
    return { kind: err.kind, message: err.message };
  }
  if (err instanceof Error) {
    return { kind: "Unexpected", message: err.message };
  }
  return { kind: "Unexpected", message: String(err) };
}
