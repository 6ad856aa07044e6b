import type { RetryConfig } from "@ingestline/types";
import { IngestionError } from "./ingestion-error.js";
import { CancelledError } from "./errors.js";

export interface RetryPolicyOptions {
  /** Total attempts including the first one. Default: 5 */
  maxAttempts?: number;
  /** Delay before the first retry. Default: 500 */
  baseDelayMs?: number;
  /** Upper bound for the exponential delay. Default: 20000 */
  maxDelayMs?: number;
  /** Fraction of the delay that is randomized, 0..1. Default: 0.5 */
  jitter?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export interface RetryAttempt {
  /** 1-based number of the attempt that just failed. */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface RetryContext {
  signal?: AbortSignal;
  onRetry?: (attempt: RetryAttempt) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryPolicyOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "jitter">
> = {
  maxAttempts: 5,
  baseDelayMs: 500,
  maxDelayMs: 20_000,
  jitter: 0.5,
};

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Only errors that declare themselves retryable are retried. Service clients
 * translate transport failures into retryable service errors before they
 * reach the policy.
 */
export function isRetryable(error: unknown): boolean {
  return IngestionError.isIngestionError(error) && error.retryable;
}

function retryAfterHint(error: unknown): number {
  if (typeof error === "object" && error !== null && "retryAfterMs" in error) {
    const hint = error.retryAfterMs;
    return typeof hint === "number" && hint > 0 ? hint : 0;
  }
  return 0;
}

/**
 * Bounded exponential backoff with jitter, shared by the extraction and
 * embedding stages.
 *
 * delay(n) = min(maxDelay, baseDelay * 2^(n-1)) * (1 - jitter + random() * jitter)
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(options?: RetryPolicyOptions) {
    const merged = { ...DEFAULT_RETRY_OPTIONS, ...options };
    if (!Number.isInteger(merged.maxAttempts) || merged.maxAttempts < 1) {
      throw new RangeError("maxAttempts must be a positive integer");
    }
    if (merged.jitter < 0 || merged.jitter > 1) {
      throw new RangeError("jitter must be between 0 and 1");
    }
    this.maxAttempts = merged.maxAttempts;
    this.baseDelayMs = merged.baseDelayMs;
    this.maxDelayMs = merged.maxDelayMs;
    this.jitter = merged.jitter;
    this.sleep = options?.sleep ?? sleep;
    this.random = options?.random ?? Math.random;
  }

  static fromConfig(config: RetryConfig): RetryPolicy {
    return new RetryPolicy(config);
  }

  /**
   * Delay before retrying after the given (1-based) failed attempt. A
   * service's retry-after hint raises the delay but never past `maxDelayMs`.
   */
  delayFor(attempt: number, error?: unknown): number {
    const exponential = this.baseDelayMs * Math.pow(2, attempt - 1);
    const capped = Math.min(this.maxDelayMs, exponential);
    const factor = 1 - this.jitter + this.random() * this.jitter;
    const delay = Math.floor(capped * factor);
    return Math.min(this.maxDelayMs, Math.max(delay, retryAfterHint(error)));
  }

  async execute<T>(fn: (attempt: number) => Promise<T>, context?: RetryContext): Promise<T> {
    const signal = context?.signal;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new CancelledError();
      }

      try {
        return await fn(attempt);
      } catch (error: unknown) {
        if (attempt >= this.maxAttempts || !isRetryable(error)) {
          throw error;
        }

        const delayMs = this.delayFor(attempt, error);
        context?.onRetry?.({ attempt, maxAttempts: this.maxAttempts, delayMs, error });
        await this.sleep(delayMs, signal);
      }
    }
  }
}
