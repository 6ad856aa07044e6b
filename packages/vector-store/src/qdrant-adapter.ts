import crypto from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import type { IndexRecord } from "@ingestline/types";
import type { IVectorStore } from "./vector-store.interface.js";

const BATCH_SIZE = 100;

/** Qdrant only takes unsigned integers or UUIDs as point ids. */
export function pointId(chunkId: string): string {
  const hex = crypto.createHash("sha256").update(chunkId).digest("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");
}

export class QdrantVectorStore implements IVectorStore {
  readonly kind = "qdrant";
  private client: QdrantClient;

  constructor(url: string, apiKey?: string) {
    this.client = new QdrantClient({ url, apiKey, checkCompatibility: false });
  }

  async upsert(collectionName: string, records: IndexRecord[]): Promise<void> {
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);

      await this.client.upsert(collectionName, {
        wait: true,
        points: batch.map(({ vector, ...payload }) => ({
          id: pointId(payload.id),
          vector,
          payload: { ...payload },
        })),
      });
    }
  }

  async deleteTrailing(
    collectionName: string,
    documentId: string,
    keepCount: number,
  ): Promise<void> {
    await this.client.delete(collectionName, {
      wait: true,
      filter: {
        must: [
          { key: "documentId", match: { value: documentId } },
          { key: "sequence", range: { gte: keepCount } },
        ],
      },
    });
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === collectionName);

    if (!exists) {
      await this.client.createCollection(collectionName, {
        vectors: {
          size: dimensions,
          distance: "Cosine",
        },
      });

      await this.client.createPayloadIndex(collectionName, {
        field_name: "documentId",
        field_schema: "keyword",
        wait: true,
      });
      await this.client.createPayloadIndex(collectionName, {
        field_name: "sequence",
        field_schema: "integer",
        wait: true,
      });
      await this.client.createPayloadIndex(collectionName, {
        field_name: "category",
        field_schema: "keyword",
        wait: true,
      });
      await this.client.createPayloadIndex(collectionName, {
        field_name: "text",
        field_schema: { type: "text", tokenizer: "word", lowercase: true },
        wait: true,
      });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    // REST client holds no connections
  }
}
