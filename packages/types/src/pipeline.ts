export interface EmbeddingVector {
  chunkId: string;
  values: number[];
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  /** Provider-reported token usage, when the backend reports it. */
  tokensUsed?: number;
  dimensions: number;
}

export interface IndexRecord {
  id: string;
  chunkId: string;
  documentId: string;
  sequence: number;
  text: string;
  vector: number[];
  sourceBlobKey: string;
  pageNumbers: number[];
  sectionLabel: string | null;
  category: string | null;
  contentHash: string;
}

export type DocumentState =
  | "discovered"
  | "extracting"
  | "chunking"
  | "embedding"
  | "indexing"
  | "done"
  | "failed"
  | "skipped";

export type TerminalState = Extract<DocumentState, "done" | "failed" | "skipped">;
