export type { IEmbeddingProvider, EmbedOptions } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
export type { BgeM3ProviderConfig } from "./bge-m3-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingProviderDeps } from "./factory.js";
export { planBatches } from "./batcher.js";
export type { BatchLimits } from "./batcher.js";
export { Embedder } from "./embedder.js";
export type { EmbedderOptions, EmbedChunksOptions, EmbedChunksResult } from "./embedder.js";
