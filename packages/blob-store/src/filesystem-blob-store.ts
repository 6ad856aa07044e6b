import crypto from "node:crypto";
import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import type { BlobMetadata, IBlobStore, PutBlobOptions } from "./blob-store.interface.js";

const HASH_SUFFIX = ".sha256";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Blobs as files under `<root>/<container>/<key>`, each with a `.sha256`
 * sidecar holding the content hash.
 */
export class FileSystemBlobStore implements IBlobStore {
  readonly kind = "filesystem";
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async ensureContainer(container: string): Promise<void> {
    await mkdir(this.containerPath(container), { recursive: true });
  }

  async put(
    container: string,
    key: string,
    content: Uint8Array,
    options: PutBlobOptions,
  ): Promise<void> {
    const target = this.blobPath(container, key);
    await mkdir(path.dirname(target), { recursive: true });
    // Content first: a sidecar never describes a partially written file.
    await writeAtomic(target, content);
    await writeAtomic(`${target}${HASH_SUFFIX}`, `${options.contentHash}\n`);
  }

  async head(container: string, key: string): Promise<BlobMetadata | null> {
    const target = this.blobPath(container, key);
    try {
      const [hash, info] = await Promise.all([
        readFile(`${target}${HASH_SUFFIX}`, "utf8"),
        stat(target),
      ]);
      return { contentHash: hash.trim(), sizeBytes: info.size };
    } catch (err: unknown) {
      if (isNotFound(err)) {
        return null;
      }
      throw err;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await mkdir(this.root, { recursive: true });
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    // nothing held open
  }

  private containerPath(container: string): string {
    const resolved = path.resolve(this.root, container);
    if (path.dirname(resolved) !== this.root) {
      throw new RangeError(`Invalid container name: ${container}`);
    }
    return resolved;
  }

  private blobPath(container: string, key: string): string {
    const base = this.containerPath(container);
    const resolved = path.resolve(base, key);
    if (!resolved.startsWith(`${base}${path.sep}`)) {
      throw new RangeError(`Blob key escapes its container: ${key}`);
    }
    return resolved;
  }
}

async function writeAtomic(target: string, data: Uint8Array | string): Promise<void> {
  const temp = `${target}.${crypto.randomUUID()}.tmp`;
  try {
    await writeFile(temp, data);
    await rename(temp, target);
  } catch (err: unknown) {
    await rm(temp, { force: true });
    throw err;
  }
}
