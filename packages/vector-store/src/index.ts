import type { VectorStoreConfig } from "@ingestline/types";
import { ConfigurationError } from "@ingestline/errors";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { PgVectorStore } from "./pgvector-adapter.js";

export type { IVectorStore } from "./vector-store.interface.js";
export { QdrantVectorStore, pointId } from "./qdrant-adapter.js";
export { PgVectorStore, toChunkRow, upsertChunks, deleteTrailingChunks } from "./pgvector-adapter.js";

export function createVectorStore(config: VectorStoreConfig, dimensions: number): IVectorStore {
  switch (config.kind) {
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new ConfigurationError("qdrantUrl is required for Qdrant vector store", {
          QDRANT_URL: "required",
        });
      }
      return new QdrantVectorStore(config.qdrantUrl, config.qdrantApiKey);
    case "pgvector":
      if (!config.databaseUrl) {
        throw new ConfigurationError("databaseUrl is required for pgvector store", {
          DATABASE_URL: "required",
        });
      }
      return new PgVectorStore(config.databaseUrl, dimensions);
    default:
      throw new ConfigurationError(`Unknown vector store type: ${String(config.kind)}`);
  }
}
