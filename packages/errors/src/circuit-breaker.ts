import CircuitBreaker from "opossum";
import type { Logger } from "@ingestline/logger";
import { IngestionError } from "./ingestion-error.js";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed, or false. Default: false */
  timeout?: number | false;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Minimum calls in the rolling window before the circuit may open. Default: 5 */
  volumeThreshold?: number;
  logger?: Pick<Logger, "warn" | "info">;
}

const DEFAULT_OPTIONS = {
  timeout: false,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
} as const;

/**
 * Non-retryable ingestion errors describe the input (malformed document, bad
 * request), not the backend's health, so they do not count against the circuit.
 */
function isInputError(err: unknown): boolean {
  return IngestionError.isIngestionError(err) && !err.retryable;
}

export function createCircuitBreaker<TI extends unknown[], TR>(
  name: string,
  fn: (...args: TI) => Promise<TR>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TI, TR> {
  const { logger, ...breakerOptions } = options ?? {};
  const mergedOptions = {
    ...DEFAULT_OPTIONS,
    ...breakerOptions,
    name,
    errorFilter: isInputError,
  };

  const breaker = new CircuitBreaker(fn, mergedOptions);

  breaker.on("open", () => {
    logger?.warn({ breaker: name }, "circuit opened, requests will be short-circuited");
  });

  breaker.on("halfOpen", () => {
    logger?.warn({ breaker: name }, "circuit half-open, next request is a probe");
  });

  breaker.on("close", () => {
    logger?.info({ breaker: name }, "circuit closed");
  });

  return breaker;
}

/** True for the rejection opossum produces while the circuit is open. */
export function isOpenCircuitError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EOPENBREAKER";
}
