import type { BlobStoreConfig } from "@ingestline/types";
import { ConfigurationError } from "@ingestline/errors";
import type { IBlobStore } from "./blob-store.interface.js";
import { FileSystemBlobStore } from "./filesystem-blob-store.js";
import { PgBlobStore } from "./pg-blob-store.js";

export type { IBlobStore, BlobMetadata, PutBlobOptions } from "./blob-store.interface.js";
export { FileSystemBlobStore } from "./filesystem-blob-store.js";
export { PgBlobStore, putBlob, headBlob } from "./pg-blob-store.js";

export function createBlobStore(config: BlobStoreConfig): IBlobStore {
  switch (config.kind) {
    case "filesystem":
      return new FileSystemBlobStore(config.root);
    case "postgres":
      if (!config.databaseUrl) {
        throw new ConfigurationError("databaseUrl is required for the postgres blob store", {
          DATABASE_URL: "required",
        });
      }
      return new PgBlobStore(config.databaseUrl);
    default:
      throw new ConfigurationError(`Unknown blob store type: ${String(config.kind)}`);
  }
}
