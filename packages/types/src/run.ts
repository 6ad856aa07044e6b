import type { TerminalState } from "./pipeline.js";

export type ErrorKind =
  | "UnsupportedFormat"
  | "CorruptDocument"
  | "ExtractionServiceError"
  | "TokenBudgetExceeded"
  | "EmbeddingServiceError"
  | "DimensionMismatch"
  | "IndexWriteError"
  | "BlobWriteError"
  | "Cancelled"
  | "ConfigurationError"
  | "Unexpected";

export type DocumentOutcome =
  | {
      documentId: string;
      state: Extract<TerminalState, "done">;
      chunkCount: number;
      tokensUsed: number;
    }
  | { documentId: string; state: Extract<TerminalState, "skipped">; reason: string }
  | {
      documentId: string;
      state: Extract<TerminalState, "failed">;
      errorKind: ErrorKind;
      message: string;
    };

export interface IngestionRunSummary {
  outcomes: DocumentOutcome[];
  counts: Record<TerminalState, number>;
  documentsProcessed: number;
  chunksUploaded: number;
  embeddingTokens: number;
  durationMs: number;
  cancelled: boolean;
}
