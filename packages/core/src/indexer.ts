import type { Chunk, EmbeddingVector, IndexRecord, SourceDocument } from "@ingestline/types";
import type { IVectorStore } from "@ingestline/vector-store";
import type { IBlobStore } from "@ingestline/blob-store";
import { BlobWriteError, IndexWriteError, IngestionError } from "@ingestline/errors";
import { blobKey } from "@ingestline/chunker";

export interface IndexerOptions {
  vectorStore: IVectorStore;
  blobStore: IBlobStore;
  collectionName: string;
  container: string;
  dimensions: number;
  /** Record the source reference but do not upload the raw bytes. */
  skipBlobs?: boolean;
  category?: string | null;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Writes a document's chunks to the vector index and its raw bytes to the
 * blob store. The blob goes last and serves as the commit marker.
 */
export class Indexer {
  readonly collectionName: string;
  readonly container: string;
  private readonly vectorStore: IVectorStore;
  private readonly blobStore: IBlobStore;
  private readonly dimensions: number;
  private readonly skipBlobs: boolean;
  private readonly category: string | null;

  constructor(options: IndexerOptions) {
    this.vectorStore = options.vectorStore;
    this.blobStore = options.blobStore;
    this.collectionName = options.collectionName;
    this.container = options.container;
    this.dimensions = options.dimensions;
    this.skipBlobs = options.skipBlobs ?? false;
    this.category = options.category ?? null;
  }

  /** Bootstrap the collection and blob container once per run. */
  async prepare(): Promise<void> {
    try {
      await this.vectorStore.ensureCollection(this.collectionName, this.dimensions);
    } catch (err: unknown) {
      throw new IndexWriteError(`Cannot prepare index ${this.collectionName}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!this.skipBlobs) {
      try {
        await this.blobStore.ensureContainer(this.container);
      } catch (err: unknown) {
        throw new BlobWriteError(`Cannot prepare container ${this.container}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    }
  }

  buildRecords(
    document: SourceDocument,
    chunks: readonly Chunk[],
    vectors: readonly EmbeddingVector[],
  ): IndexRecord[] {
    const sourceBlobKey = blobKey(document.id);
    return chunks.map((chunk, i) => {
      const vector = vectors[i];
      if (!vector || vector.chunkId !== chunk.id) {
        throw new IndexWriteError(`Missing embedding for chunk ${chunk.id}`, {
          documentId: document.id,
        });
      }
      return {
        id: chunk.id,
        chunkId: chunk.id,
        documentId: document.id,
        sequence: chunk.sequence,
        text: chunk.text,
        vector: vector.values,
        sourceBlobKey,
        pageNumbers: [...chunk.pageNumbers],
        sectionLabel: chunk.sectionLabel,
        category: this.category,
        contentHash: document.contentHash,
      };
    });
  }

  async index(
    document: SourceDocument,
    chunks: readonly Chunk[],
    vectors: readonly EmbeddingVector[],
  ): Promise<IndexRecord[]> {
    const records = this.buildRecords(document, chunks, vectors);

    try {
      await this.vectorStore.upsert(this.collectionName, records);
      await this.vectorStore.deleteTrailing(this.collectionName, document.id, records.length);
    } catch (err: unknown) {
      if (IngestionError.isIngestionError(err)) throw err;
      throw new IndexWriteError(`Index write failed for ${document.id}: ${errorMessage(err)}`, {
        documentId: document.id,
        cause: err,
      });
    }

    if (!this.skipBlobs) {
      try {
        await this.blobStore.put(this.container, blobKey(document.id), document.content, {
          contentHash: document.contentHash,
          mediaType: document.mediaType,
        });
      } catch (err: unknown) {
        if (IngestionError.isIngestionError(err)) throw err;
        throw new BlobWriteError(`Blob upload failed for ${document.id}: ${errorMessage(err)}`, {
          documentId: document.id,
          cause: err,
        });
      }
    }

    return records;
  }

  /** True when the committed blob carries this exact content hash. */
  async isUnchanged(document: SourceDocument): Promise<boolean> {
    const head = await this.blobStore.head(this.container, blobKey(document.id));
    return head !== null && head.contentHash === document.contentHash;
  }
}
