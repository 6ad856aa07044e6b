import { pgTable, text, timestamp, integer, primaryKey } from "drizzle-orm/pg-core";
import { bytea } from "./columns.js";

export const ingestBlobs = pgTable(
  "ingest_blobs",
  {
    container: text("container").notNull(),
    key: text("key").notNull(),
    content: bytea("content").notNull(),
    contentHash: text("content_hash").notNull(),
    sizeBytes: integer("size_bytes").notNull(),
    mediaType: text("media_type").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.container, table.key] }),
  }),
);
