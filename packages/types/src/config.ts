import type { ChunkingConfig, TokenizerKind } from "./chunk.js";

export type NodeEnv = "development" | "test" | "production";
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type EmbeddingProviderKind = "cohere" | "bge-m3";
export type VectorStoreKind = "qdrant" | "pgvector";
export type BlobStoreKind = "filesystem" | "postgres";

export interface PipelineConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  concurrency: number;
  chunking: ChunkingConfig;
  tokenizer: TokenizerConfig;
  extraction: ExtractionConfig;
  embedding: EmbeddingConfig;
  retry: RetryConfig;
  vectorStore: VectorStoreConfig;
  blobStore: BlobStoreConfig;
}

export interface TokenizerConfig {
  kind: TokenizerKind;
  encoding: string;
}

export interface ExtractionConfig {
  /** Unset when no text-recognition service is configured. */
  serviceUrl?: string;
  apiKey?: string;
  timeoutMs: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderKind;
  cohere?: { apiKey: string; model: string };
  bgeM3?: { baseUrl: string };
  dimensions: number;
  maxBatchSize: number;
  maxBatchTokens: number;
  maxInputTokens: number;
  concurrency: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: number;
}

export interface VectorStoreConfig {
  kind: VectorStoreKind;
  indexName: string;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  databaseUrl?: string;
}

export interface BlobStoreConfig {
  kind: BlobStoreKind;
  root: string;
  container: string;
  databaseUrl?: string;
}
