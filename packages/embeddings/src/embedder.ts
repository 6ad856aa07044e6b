import type { Chunk, EmbeddingResult, EmbeddingVector } from "@ingestline/types";
import type { Logger } from "@ingestline/logger";
import type { Semaphore } from "@ingestline/queue";
import {
  CancelledError,
  DimensionMismatchError,
  EmbeddingServiceError,
  RetryPolicy,
  TokenBudgetExceededError,
  classifyError,
} from "@ingestline/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { planBatches, type BatchLimits } from "./batcher.js";

export interface EmbedderOptions extends BatchLimits {
  provider: IEmbeddingProvider;
  retry: RetryPolicy;
  /** Shared across documents: caps concurrent embedding requests for the run. */
  limiter: Semaphore;
  /** Dimension every returned vector must have. */
  dimensions: number;
  logger?: Logger;
}

export interface EmbedChunksOptions {
  signal?: AbortSignal;
}

export interface EmbedChunksResult {
  vectors: EmbeddingVector[];
  tokensUsed: number;
}

/**
 * Embeds one document's chunks. Batches go out one after another; results
 * are matched to chunks by position.
 */
export class Embedder {
  private readonly provider: IEmbeddingProvider;
  private readonly retry: RetryPolicy;
  private readonly limiter: Semaphore;
  private readonly dimensions: number;
  private readonly limits: BatchLimits;
  private readonly logger?: Logger;

  constructor(options: EmbedderOptions) {
    this.provider = options.provider;
    this.retry = options.retry;
    this.limiter = options.limiter;
    this.dimensions = options.dimensions;
    this.limits = {
      maxBatchSize: options.maxBatchSize,
      maxBatchTokens: options.maxBatchTokens,
      maxInputTokens: options.maxInputTokens,
    };
    this.logger = options.logger;
  }

  async embed(chunks: readonly Chunk[], options?: EmbedChunksOptions): Promise<EmbedChunksResult> {
    const batches = planBatches(chunks, this.limits);
    const vectors: EmbeddingVector[] = [];
    let tokensUsed = 0;

    for (const [index, batch] of batches.entries()) {
      const result = await this.embedBatch(batch, index, options?.signal);
      this.validate(batch, result);

      batch.forEach((chunk, i) => {
        vectors.push({ chunkId: chunk.id, values: result.embeddings[i] ?? [] });
      });
      tokensUsed +=
        result.tokensUsed ?? batch.reduce((sum, chunk) => sum + chunk.tokenCount, 0);
    }

    return { vectors, tokensUsed };
  }

  private async embedBatch(
    batch: readonly Chunk[],
    batchIndex: number,
    signal: AbortSignal | undefined,
  ): Promise<EmbeddingResult> {
    const texts = batch.map((chunk) => chunk.text);
    const documentId = batch[0]?.documentId;

    try {
      return await this.retry.execute(
        () => this.limiter.run(() => this.provider.batchEmbed(texts, { signal }), signal),
        {
          signal,
          onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
            this.logger?.warn(
              { documentId, batchIndex, attempt, maxAttempts, delayMs, error: classifyError(error) },
              "embedding request failed, retrying",
            );
          },
        },
      );
    } catch (err: unknown) {
      if (signal?.aborted && !(err instanceof CancelledError)) {
        throw new CancelledError("Embedding cancelled", { documentId, cause: err });
      }
      if (err instanceof EmbeddingServiceError && err.status === 413) {
        const largest = batch.reduce((a, b) => (b.tokenCount > a.tokenCount ? b : a));
        throw new TokenBudgetExceededError(
          largest.id,
          largest.tokenCount,
          this.limits.maxInputTokens,
          { documentId, cause: err },
        );
      }
      throw err;
    }
  }

  private validate(batch: readonly Chunk[], result: EmbeddingResult): void {
    if (result.embeddings.length !== batch.length) {
      throw new EmbeddingServiceError(
        `Embedding service returned ${String(result.embeddings.length)} vectors for ${String(batch.length)} chunks`,
        { retryable: false, documentId: batch[0]?.documentId },
      );
    }
    result.embeddings.forEach((values, i) => {
      const chunk = batch[i];
      if (chunk && values.length !== this.dimensions) {
        throw new DimensionMismatchError(this.dimensions, values.length, chunk.id, {
          documentId: chunk.documentId,
        });
      }
    });
  }
}
