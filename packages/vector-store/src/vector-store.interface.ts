import type { IndexRecord } from "@ingestline/types";

export interface IVectorStore {
  readonly kind: string;
  /** Create the collection and its payload indexes when missing. */
  ensureCollection(collectionName: string, dimensions: number): Promise<void>;
  /** Insert or overwrite records by id. */
  upsert(collectionName: string, records: IndexRecord[]): Promise<void>;
  /** Delete a document's records whose sequence is `keepCount` or higher. */
  deleteTrailing(collectionName: string, documentId: string, keepCount: number): Promise<void>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
