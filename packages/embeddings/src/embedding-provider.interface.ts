import type { EmbeddingResult } from "@ingestline/types";

export interface EmbedOptions {
  signal?: AbortSignal;
}

export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;

  /**
   * Embed a batch of texts, returning vectors in input order. Transport and
   * backend failures surface as `EmbeddingServiceError`.
   */
  batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
  /** Release timers held by the client's circuit breaker, if any. */
  shutdown?(): void;
}
