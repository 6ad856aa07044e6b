import type { ErrorKind } from "@ingestline/types";

export interface IngestionErrorOptions {
  message: string;
  code: string;
  kind: ErrorKind;
  retryable?: boolean;
  documentId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class IngestionError extends Error {
  public readonly code: string;
  public readonly kind: ErrorKind;
  public readonly retryable: boolean;
  public readonly documentId?: string;
  public readonly details?: Record<string, unknown>;

  constructor({
    message,
    code,
    kind,
    retryable = false,
    documentId,
    details,
    cause,
  }: IngestionErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.kind = kind;
    this.retryable = retryable;
    this.documentId = documentId;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  static isIngestionError(err: unknown): err is IngestionError {
    return err instanceof IngestionError;
  }
}
