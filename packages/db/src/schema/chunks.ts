import { sql } from "drizzle-orm";
import { pgTable, text, integer, jsonb, vector } from "drizzle-orm/pg-core";
import { tsvector } from "./columns.js";

/**
 * One table per index name. The vector column's dimension is fixed when the
 * table is created, so the table definition is built at run time.
 */
export function chunkTable(name: string, dimensions: number) {
  return pgTable(name, {
    id: text("id").primaryKey(),
    chunkId: text("chunk_id").notNull(),
    documentId: text("document_id").notNull(),
    sequence: integer("sequence").notNull(),
    text: text("text").notNull(),
    embedding: vector("embedding", { dimensions }).notNull(),
    sourceBlobKey: text("source_blob_key").notNull(),
    pageNumbers: jsonb("page_numbers").notNull().$type<number[]>(),
    sectionLabel: text("section_label"),
    category: text("category"),
    contentHash: text("content_hash").notNull(),
    searchVector: tsvector("search_vector").generatedAlwaysAs(
      sql`to_tsvector('simple', coalesce(section_label, '') || ' ' || text)`,
    ),
  });
}

export type ChunkTable = ReturnType<typeof chunkTable>;

/** Bootstrap DDL for a chunk table, matching `chunkTable`. */
export function chunkTableDdl(name: string, dimensions: number) {
  const table = sql.identifier(name);
  const documentIndex = sql.identifier(`${name}_document_idx`);
  const searchIndex = sql.identifier(`${name}_search_idx`);
  const embeddingIndex = sql.identifier(`${name}_embedding_idx`);

  return [
    sql`create extension if not exists vector`,
    sql`create table if not exists ${table} (
      id text primary key,
      chunk_id text not null,
      document_id text not null,
      sequence integer not null,
      text text not null,
      embedding vector(${sql.raw(String(dimensions))}) not null,
      source_blob_key text not null,
      page_numbers jsonb not null,
      section_label text,
      category text,
      content_hash text not null,
      search_vector tsvector generated always as (
        to_tsvector('simple', coalesce(section_label, '') || ' ' || text)
      ) stored
    )`,
    sql`create index if not exists ${documentIndex} on ${table} (document_id, sequence)`,
    sql`create index if not exists ${searchIndex} on ${table} using gin (search_vector)`,
    sql`create index if not exists ${embeddingIndex} on ${table} using hnsw (embedding vector_cosine_ops)`,
  ];
}

export const INGEST_BLOBS_DDL = sql`create table if not exists ingest_blobs (
  container text not null,
  key text not null,
  content bytea not null,
  content_hash text not null,
  size_bytes integer not null,
  media_type text not null,
  updated_at timestamptz not null default now(),
  primary key (container, key)
)`;
