import { CohereClient, CohereError, CohereTimeoutError } from "cohere-ai";
import type { EmbeddingResult } from "@ingestline/types";
import { CancelledError, EmbeddingServiceError, isTransientStatus } from "@ingestline/errors";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const REQUEST_TIMEOUT_SECONDS = 60;

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number;
  private client: CohereClient;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    const response = await this.client.v2
      .embed(
        {
          texts,
          model: this.model,
          inputType: "search_document",
          embeddingTypes: ["float"],
          outputDimension: this.dimensions,
        },
        // Retries belong to the pipeline's RetryPolicy, not the SDK.
        { maxRetries: 0, timeoutInSeconds: REQUEST_TIMEOUT_SECONDS, abortSignal: options?.signal },
      )
      .catch((err: unknown) => {
        throw toServiceError(err, options?.signal);
      });

    return {
      embeddings: response.embeddings.float ?? [],
      model: this.model,
      tokensUsed: response.meta?.billedUnits?.inputTokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.batchEmbed(["health check"]);
      return true;
    } catch {
      return false;
    }
  }
}

function toServiceError(err: unknown, signal?: AbortSignal): Error {
  if (signal?.aborted) {
    return new CancelledError("Embedding request cancelled", { cause: err });
  }
  if (err instanceof CohereTimeoutError) {
    return new EmbeddingServiceError("Cohere embed request timed out", { cause: err });
  }
  if (err instanceof CohereError) {
    const status = err.statusCode;
    return new EmbeddingServiceError(`Cohere embed failed: ${err.message}`, {
      status,
      retryable: status === undefined || isTransientStatus(status),
      cause: err,
    });
  }
  return new EmbeddingServiceError("Cohere embed request failed", { cause: err });
}
