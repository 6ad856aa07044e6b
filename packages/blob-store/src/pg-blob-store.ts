import { and, eq, sql } from "drizzle-orm";
import {
  INGEST_BLOBS_DDL,
  closeDbClient,
  createDbClient,
  ingestBlobs,
  type DbClient,
} from "@ingestline/db";
import type { BlobMetadata, IBlobStore, PutBlobOptions } from "./blob-store.interface.js";

export function putBlob(
  db: DbClient,
  container: string,
  key: string,
  content: Uint8Array,
  options: PutBlobOptions,
) {
  return db
    .insert(ingestBlobs)
    .values({
      container,
      key,
      content,
      contentHash: options.contentHash,
      sizeBytes: content.byteLength,
      mediaType: options.mediaType,
    })
    .onConflictDoUpdate({
      target: [ingestBlobs.container, ingestBlobs.key],
      set: {
        content: sql`excluded.content`,
        contentHash: sql`excluded.content_hash`,
        sizeBytes: sql`excluded.size_bytes`,
        mediaType: sql`excluded.media_type`,
        updatedAt: sql`now()`,
      },
    });
}

export function headBlob(db: DbClient, container: string, key: string) {
  return db
    .select({ contentHash: ingestBlobs.contentHash, sizeBytes: ingestBlobs.sizeBytes })
    .from(ingestBlobs)
    .where(and(eq(ingestBlobs.container, container), eq(ingestBlobs.key, key)))
    .limit(1);
}

/**
 * Blobs in a single `ingest_blobs` table keyed by (container, key).
 * Content and hash land in one row, so the write is atomic.
 */
export class PgBlobStore implements IBlobStore {
  readonly kind = "postgres";
  private db: DbClient;

  constructor(connectionString: string) {
    this.db = createDbClient({ url: connectionString });
  }

  async ensureContainer(_container: string): Promise<void> {
    await this.db.execute(INGEST_BLOBS_DDL);
  }

  async put(
    container: string,
    key: string,
    content: Uint8Array,
    options: PutBlobOptions,
  ): Promise<void> {
    await putBlob(this.db, container, key, content, options);
  }

  async head(container: string, key: string): Promise<BlobMetadata | null> {
    const [row] = await headBlob(this.db, container, key);
    return row ?? null;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.db.execute(sql`select 1`);
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await closeDbClient(this.db);
  }
}
