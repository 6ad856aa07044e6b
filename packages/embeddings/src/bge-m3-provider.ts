import type CircuitBreaker from "opossum";
import { z } from "zod";
import type { EmbeddingResult } from "@ingestline/types";
import type { Logger } from "@ingestline/logger";
import {
  CancelledError,
  EmbeddingServiceError,
  createCircuitBreaker,
  isOpenCircuitError,
  isTransientStatus,
  parseRetryAfter,
} from "@ingestline/errors";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 1024;
const DEFAULT_TIMEOUT_MS = 60_000;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  dimensions?: number;
  timeoutMs?: number;
  logger?: Logger;
  /** Replaced in tests. */
  fetch?: typeof fetch;
}

const bgeM3ResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  tokens_used: z.number().int().nonnegative().optional(),
});

type EmbedArgs = [string[], AbortSignal | undefined];

/**
 * BGE-M3 self-hosted embedding provider.
 * Communicates with a BGE-M3 model server via HTTP.
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly model = "bge-m3";
  readonly dimensions: number;
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;
  private breaker: CircuitBreaker<EmbedArgs, EmbeddingResult>;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
    this.breaker = createCircuitBreaker<EmbedArgs, EmbeddingResult>(
      "bge-m3",
      (texts, signal) => this.post(texts, signal),
      { logger: config.logger },
    );
  }

  async batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    try {
      return await this.breaker.fire(texts, options?.signal);
    } catch (err: unknown) {
      if (isOpenCircuitError(err)) {
        throw new EmbeddingServiceError("BGE-M3 circuit is open", { cause: err });
      }
      throw err;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/health`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  shutdown(): void {
    this.breaker.shutdown();
  }

  private async post(texts: string[], signal: AbortSignal | undefined): Promise<EmbeddingResult> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ texts, dimensions: this.dimensions }),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (err: unknown) {
      if (signal?.aborted) {
        throw new CancelledError("Embedding request cancelled", { cause: err });
      }
      const reason = timeout.aborted ? "timed out" : "failed";
      throw new EmbeddingServiceError(`BGE-M3 embedding request ${reason}`, { cause: err });
    }

    if (!response.ok) {
      const status = response.status;
      throw new EmbeddingServiceError(
        `BGE-M3 embedding failed: ${String(status)} ${response.statusText}`.trim(),
        {
          status,
          retryable: isTransientStatus(status),
          retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
        },
      );
    }

    const parsed = bgeM3ResponseSchema.safeParse(await response.json().catch(() => undefined));
    if (!parsed.success) {
      throw new EmbeddingServiceError("BGE-M3 response has an unexpected shape", {
        retryable: false,
      });
    }

    return {
      embeddings: parsed.data.embeddings,
      model: this.model,
      tokensUsed: parsed.data.tokens_used,
      dimensions: this.dimensions,
    };
  }
}
