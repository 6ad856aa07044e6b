export type MediaType =
  | "application/pdf"
  | "image/png"
  | "image/jpeg"
  | "image/tiff"
  | "image/bmp"
  | "text/plain"
  | "text/markdown"
  | "text/html"
  | "text/csv"
  | "application/json"
  | "application/octet-stream";

export interface SourceDocument {
  /** Path relative to the input root, POSIX separators. */
  id: string;
  /** Absolute path the bytes were read from. */
  path: string;
  content: Uint8Array;
  mediaType: MediaType;
  sizeBytes: number;
  /** SHA-256 hex digest of `content`. */
  contentHash: string;
}

export interface TextBlock {
  documentId: string;
  text: string;
  pageNumber: number;
  sectionLabel: string | null;
  order: number;
}
