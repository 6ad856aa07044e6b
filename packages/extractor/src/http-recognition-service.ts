import type CircuitBreaker from "opossum";
import type { MediaType } from "@ingestline/types";
import type { Logger } from "@ingestline/logger";
import {
  CancelledError,
  CorruptDocumentError,
  ExtractionServiceError,
  type IngestionError,
  UnsupportedFormatError,
  createCircuitBreaker,
  isOpenCircuitError,
  isTransientStatus,
  parseRetryAfter,
} from "@ingestline/errors";
import {
  recognitionResultSchema,
  type ITextRecognitionService,
  type RecognitionResult,
  type RecognizeOptions,
} from "./recognition-service.js";

const DEFAULT_TIMEOUT_MS = 60_000;

export interface HttpRecognitionServiceConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  logger?: Logger;
  /** Replaced in tests. */
  fetch?: typeof fetch;
}

type RecognizeArgs = [Uint8Array, MediaType, AbortSignal | undefined];

/**
 * Client for a text-recognition HTTP service: `POST {baseUrl}/analyze` with
 * the raw document bytes. One instance (and one circuit breaker) is shared by
 * every document in a run.
 */
export class HttpTextRecognitionService implements ITextRecognitionService {
  readonly name = "http-recognition";
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly breaker: CircuitBreaker<RecognizeArgs, RecognitionResult>;

  constructor(config: HttpRecognitionServiceConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
    this.breaker = createCircuitBreaker<RecognizeArgs, RecognitionResult>(
      "text-recognition",
      (content, mediaType, signal) => this.post(content, mediaType, signal),
      { logger: config.logger },
    );
  }

  async recognize(
    content: Uint8Array,
    mediaType: MediaType,
    options?: RecognizeOptions,
  ): Promise<RecognitionResult> {
    try {
      return await this.breaker.fire(content, mediaType, options?.signal);
    } catch (err: unknown) {
      if (isOpenCircuitError(err)) {
        throw new ExtractionServiceError("Text recognition circuit is open", { cause: err });
      }
      throw err;
    }
  }

  /** Stops the breaker's rolling-window timers. */
  shutdown(): void {
    this.breaker.shutdown();
  }

  private async post(
    content: Uint8Array,
    mediaType: MediaType,
    signal: AbortSignal | undefined,
  ): Promise<RecognitionResult> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    const headers: Record<string, string> = { "Content-Type": mediaType };
    if (this.apiKey) {
      headers["api-key"] = this.apiKey;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/analyze`, {
        method: "POST",
        headers,
        body: content,
        signal: combined,
      });
    } catch (err: unknown) {
      if (signal?.aborted) {
        throw new CancelledError("Text recognition request cancelled", { cause: err });
      }
      const reason = timeout.aborted ? "timed out" : "failed";
      throw new ExtractionServiceError(`Text recognition request ${reason}`, { cause: err });
    }

    if (!response.ok) {
      throw await statusError(response, mediaType);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err: unknown) {
      throw new ExtractionServiceError("Text recognition response is not JSON", { cause: err });
    }

    const parsed = recognitionResultSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExtractionServiceError("Text recognition response has an unexpected shape", {
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }
    return parsed.data;
  }
}

async function statusError(response: Response, mediaType: MediaType): Promise<IngestionError> {
  const status = response.status;
  const detail = await response.text().catch(() => "");
  const message = `Text recognition failed: ${String(status)} ${detail || response.statusText}`.trim();

  if (status === 415) {
    return new UnsupportedFormatError(mediaType, { details: { status } });
  }
  if (status === 400 || status === 422) {
    return new CorruptDocumentError(message, { details: { status } });
  }
  return new ExtractionServiceError(message, {
    status,
    retryable: isTransientStatus(status),
    retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
  });
}
