export type TokenizerKind = "tiktoken" | "whitespace";

export interface Chunk {
  readonly id: string;
  readonly documentId: string;
  readonly sequence: number;
  readonly text: string;
  readonly tokenCount: number;
  /** Token offset (inclusive) into the document's token stream. */
  readonly startOffset: number;
  /** Token offset (exclusive). */
  readonly endOffset: number;
  readonly pageNumbers: readonly number[];
  readonly sectionLabel: string | null;
}

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 1024,
  chunkOverlap: 128,
};
