import type { Chunk } from "@ingestline/types";
import { TokenBudgetExceededError } from "@ingestline/errors";

export interface BatchLimits {
  maxBatchSize: number;
  maxBatchTokens: number;
  maxInputTokens: number;
}

/**
 * Group chunks, in order, into batches bounded by both chunk count and token
 * total. A chunk the model cannot take at all fails the whole plan before
 * anything is sent.
 */
export function planBatches(chunks: readonly Chunk[], limits: BatchLimits): Chunk[][] {
  for (const chunk of chunks) {
    if (chunk.tokenCount > limits.maxInputTokens) {
      throw new TokenBudgetExceededError(chunk.id, chunk.tokenCount, limits.maxInputTokens, {
        documentId: chunk.documentId,
      });
    }
  }

  const batches: Chunk[][] = [];
  let current: Chunk[] = [];
  let currentTokens = 0;

  for (const chunk of chunks) {
    const full =
      current.length >= limits.maxBatchSize ||
      currentTokens + chunk.tokenCount > limits.maxBatchTokens;
    if (full && current.length > 0) {
      batches.push(current);
      current = [];
      currentTokens = 0;
    }
    current.push(chunk);
    currentTokens += chunk.tokenCount;
  }
  if (current.length > 0) {
    batches.push(current);
  }

  return batches;
}
