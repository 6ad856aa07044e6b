export interface BlobMetadata {
  contentHash: string;
  sizeBytes: number;
}

export interface PutBlobOptions {
  contentHash: string;
  mediaType: string;
}

export interface IBlobStore {
  readonly kind: string;
  ensureContainer(container: string): Promise<void>;
  /** Write or overwrite a blob. The stored hash becomes visible only once the content is in place. */
  put(container: string, key: string, content: Uint8Array, options: PutBlobOptions): Promise<void>;
  /** Metadata of a stored blob, or null when absent. */
  head(container: string, key: string): Promise<BlobMetadata | null>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
