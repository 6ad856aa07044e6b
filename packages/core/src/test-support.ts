import type { EmbeddingResult, IndexRecord, MediaType, SourceDocument } from "@ingestline/types";
import type { IVectorStore } from "@ingestline/vector-store";
import type { BlobMetadata, IBlobStore, PutBlobOptions } from "@ingestline/blob-store";
import type { EmbedOptions, IEmbeddingProvider } from "@ingestline/embeddings";
import { sha256Hex } from "@ingestline/chunker";
import type { DiscoveredDocument } from "./discovery.js";

/** In-process stand-ins for the index, blob store and embedding service. */

export class InMemoryVectorStore implements IVectorStore {
  readonly kind = "memory";
  readonly collections = new Map<string, Map<string, IndexRecord>>();
  readonly failFor = new Set<string>();
  healthy = true;

  async ensureCollection(collectionName: string): Promise<void> {
    if (!this.collections.has(collectionName)) {
      this.collections.set(collectionName, new Map());
    }
  }

  async upsert(collectionName: string, records: IndexRecord[]): Promise<void> {
    const collection = this.collection(collectionName);
    for (const record of records) {
      if (this.failFor.has(record.documentId)) {
        throw new Error("index unavailable");
      }
      collection.set(record.id, structuredClone(record));
    }
  }

  async deleteTrailing(collectionName: string, documentId: string, keepCount: number): Promise<void> {
    const collection = this.collection(collectionName);
    for (const [id, record] of collection) {
      if (record.documentId === documentId && record.sequence >= keepCount) {
        collection.delete(id);
      }
    }
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }

  async close(): Promise<void> {}

  records(collectionName = "documents"): IndexRecord[] {
    return [...this.collection(collectionName).values()].sort((a, b) =>
      a.id < b.id ? -1 : a.id > b.id ? 1 : 0,
    );
  }

  private collection(name: string): Map<string, IndexRecord> {
    let collection = this.collections.get(name);
    if (!collection) {
      collection = new Map();
      this.collections.set(name, collection);
    }
    return collection;
  }
}

export class InMemoryBlobStore implements IBlobStore {
  readonly kind = "memory";
  readonly blobs = new Map<string, { content: Uint8Array; contentHash: string; mediaType: string }>();
  puts = 0;
  healthy = true;

  async ensureContainer(): Promise<void> {}

  async put(container: string, key: string, content: Uint8Array, options: PutBlobOptions): Promise<void> {
    this.puts++;
    this.blobs.set(`${container}/${key}`, { content, ...options });
  }

  async head(container: string, key: string): Promise<BlobMetadata | null> {
    const blob = this.blobs.get(`${container}/${key}`);
    return blob ? { contentHash: blob.contentHash, sizeBytes: blob.content.byteLength } : null;
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }

  async close(): Promise<void> {}
}

/**
 * Deterministic embeddings: each vector is derived from the text alone.
 * Texts containing `badDimensionMarker` get one component too many.
 */
export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly model = "fake-embed";
  readonly batches: string[][] = [];
  healthy = true;

  constructor(
    readonly dimensions = 4,
    private readonly badDimensionMarker = "BADDIM",
  ) {}

  async batchEmbed(texts: string[], _options?: EmbedOptions): Promise<EmbeddingResult> {
    this.batches.push(texts);
    return {
      embeddings: texts.map((text) => {
        const size = text.includes(this.badDimensionMarker) ? this.dimensions + 1 : this.dimensions;
        return Array.from({ length: size }, (_, i) => (text.length + i) / 100);
      }),
      model: this.model,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

export function sourceDocument(
  id: string,
  mediaType: MediaType,
  text: string | Uint8Array,
): SourceDocument {
  const content = typeof text === "string" ? new TextEncoder().encode(text) : text;
  return {
    id,
    path: `/corpus/${id}`,
    content,
    mediaType,
    sizeBytes: content.byteLength,
    contentHash: sha256Hex(content),
  };
}

export function discovered(document: SourceDocument): DiscoveredDocument {
  return { id: document.id, path: document.path, mediaType: document.mediaType };
}
