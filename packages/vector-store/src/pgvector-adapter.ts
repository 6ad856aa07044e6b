import { and, eq, gte, sql } from "drizzle-orm";
import type { IndexRecord } from "@ingestline/types";
import {
  chunkTable,
  chunkTableDdl,
  closeDbClient,
  createDbClient,
  type ChunkTable,
  type DbClient,
} from "@ingestline/db";
import type { IVectorStore } from "./vector-store.interface.js";

const BATCH_SIZE = 100;

export function toChunkRow(record: IndexRecord): ChunkTable["$inferInsert"] {
  return {
    id: record.id,
    chunkId: record.chunkId,
    documentId: record.documentId,
    sequence: record.sequence,
    text: record.text,
    embedding: record.vector,
    sourceBlobKey: record.sourceBlobKey,
    pageNumbers: record.pageNumbers,
    sectionLabel: record.sectionLabel,
    category: record.category,
    contentHash: record.contentHash,
  };
}

/**
 * Upsert statement for one batch; `excluded` carries the incoming row on
 * conflict.
 */
export function upsertChunks(db: DbClient, table: ChunkTable, records: IndexRecord[]) {
  return db
    .insert(table)
    .values(records.map(toChunkRow))
    .onConflictDoUpdate({
      target: table.id,
      set: {
        chunkId: sql`excluded.chunk_id`,
        documentId: sql`excluded.document_id`,
        sequence: sql`excluded.sequence`,
        text: sql`excluded.text`,
        embedding: sql`excluded.embedding`,
        sourceBlobKey: sql`excluded.source_blob_key`,
        pageNumbers: sql`excluded.page_numbers`,
        sectionLabel: sql`excluded.section_label`,
        category: sql`excluded.category`,
        contentHash: sql`excluded.content_hash`,
      },
    });
}

export function deleteTrailingChunks(
  db: DbClient,
  table: ChunkTable,
  documentId: string,
  keepCount: number,
) {
  return db
    .delete(table)
    .where(and(eq(table.documentId, documentId), gte(table.sequence, keepCount)));
}

/**
 * PostgreSQL + pgvector index: one table per collection with a vector column
 * and a generated tsvector column for full-text search.
 */
export class PgVectorStore implements IVectorStore {
  readonly kind = "pgvector";
  private db: DbClient;
  private tables = new Map<string, ChunkTable>();

  constructor(connectionString: string, private readonly dimensions: number) {
    this.db = createDbClient({ url: connectionString });
  }

  async upsert(collectionName: string, records: IndexRecord[]): Promise<void> {
    const table = this.table(collectionName);
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      await upsertChunks(this.db, table, records.slice(i, i + BATCH_SIZE));
    }
  }

  async deleteTrailing(
    collectionName: string,
    documentId: string,
    keepCount: number,
  ): Promise<void> {
    await deleteTrailingChunks(this.db, this.table(collectionName), documentId, keepCount);
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    for (const statement of chunkTableDdl(collectionName, dimensions)) {
      await this.db.execute(statement);
    }
    this.tables.set(collectionName, chunkTable(collectionName, dimensions));
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

  private table(collectionName: string): ChunkTable {
    let table = this.tables.get(collectionName);
    if (!table) {
      table = chunkTable(collectionName, this.dimensions);
      this.tables.set(collectionName, table);
    }
    return table;
  }
}
