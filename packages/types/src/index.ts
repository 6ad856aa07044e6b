export type { MediaType, SourceDocument, TextBlock } from "./document.js";
export type { Chunk, ChunkingConfig, TokenizerKind } from "./chunk.js";
export { DEFAULT_CHUNKING_CONFIG } from "./chunk.js";
export type {
  EmbeddingVector,
  EmbeddingResult,
  IndexRecord,
  DocumentState,
  TerminalState,
} from "./pipeline.js";
export type { ErrorKind, DocumentOutcome, IngestionRunSummary } from "./run.js";
export type {
  PipelineConfig,
  NodeEnv,
  LogLevel,
  EmbeddingProviderKind,
  VectorStoreKind,
  BlobStoreKind,
  TokenizerConfig,
  ExtractionConfig,
  EmbeddingConfig,
  RetryConfig,
  VectorStoreConfig,
  BlobStoreConfig,
} from "./config.js";
