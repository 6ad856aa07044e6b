import crypto from "node:crypto";
import { BlobWriteError } from "@ingestline/errors";

const SLUG_MAX_LENGTH = 48;

export function sha256Hex(input: string | Uint8Array): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

/**
 * Stable, storage-safe key for a document id: a readable slug plus a hash
 * prefix so distinct ids never collide after slugging.
 */
export function documentKey(documentId: string): string {
  const slug = documentId.replace(/[^0-9A-Za-z_-]/g, "_").slice(0, SLUG_MAX_LENGTH);
  return `doc-${slug}-${sha256Hex(documentId).slice(0, 16)}`;
}

export function chunkId(documentId: string, sequence: number): string {
  return `${documentKey(documentId)}-${String(sequence)}`;
}

/** Blob key for a document: its relative path, never escaping the container. */
export function blobKey(documentId: string): string {
  const key = documentId.replace(/\\/g, "/").replace(/^(?:\.\/|\/)+/, "");
  const segments = key.split("/");
  if (key.length === 0 || segments.some((segment) => segment === ".." || segment === "")) {
    throw new BlobWriteError(`Invalid blob key for document ${documentId}`, { documentId });
  }
  return key;
}
