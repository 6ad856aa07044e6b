import type { EmbeddingConfig } from "@ingestline/types";
import type { Logger } from "@ingestline/logger";
import { ConfigurationError } from "@ingestline/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";

export interface EmbeddingProviderDeps {
  logger?: Logger;
}

export function createEmbeddingProvider(
  config: EmbeddingConfig,
  deps?: EmbeddingProviderDeps,
): IEmbeddingProvider {
  switch (config.provider) {
    case "cohere":
      if (!config.cohere) {
        throw new ConfigurationError("Cohere config is required when provider is 'cohere'", {
          COHERE_API_KEY: "required",
        });
      }
      return new CohereEmbeddingProvider({ ...config.cohere, dimensions: config.dimensions });
    case "bge-m3":
      if (!config.bgeM3) {
        throw new ConfigurationError("BGE-M3 config is required when provider is 'bge-m3'", {
          BGE_M3_URL: "required",
        });
      }
      return new BgeM3EmbeddingProvider({
        baseUrl: config.bgeM3.baseUrl,
        dimensions: config.dimensions,
        logger: deps?.logger,
      });
    default:
      throw new ConfigurationError(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
