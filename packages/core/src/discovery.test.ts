import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConfigurationError } from "@ingestline/errors";
import { sha256Hex } from "@ingestline/chunker";
import { discoverDocuments, readSourceDocument, staticBase } from "./discovery.js";

describe("staticBase", () => {
  it("keeps the leading segments without glob syntax", () => {
    expect(staticBase("docs/guides/**/*.md")).toBe("docs/guides");
    expect(staticBase("*.md")).toBe(".");
    expect(staticBase("docs/{a,b}/x.md")).toBe("docs");
  });
});

describe("discoverDocuments", () => {
  let root: string;

  async function touch(relative: string, content = "x"): Promise<void> {
    const file = path.join(root, relative);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, content);
  }

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "ingestline-discovery-"));
    await touch("corpus/b.txt");
    await touch("corpus/a.md");
    await touch("corpus/nested/c.pdf");
    await touch("corpus/nested/c.pdf.sha256");
    await touch("corpus/.hidden/secret.md");
    await touch("corpus/.env");
    await touch("other/d.json");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("walks a directory recursively, sorted, without hidden files or hash sidecars", async () => {
    const documents = await discoverDocuments(["corpus"], { cwd: root });

    expect(documents).toEqual([
      { id: "a.md", path: path.join(root, "corpus", "a.md"), mediaType: "text/markdown" },
      { id: "b.txt", path: path.join(root, "corpus", "b.txt"), mediaType: "text/plain" },
      {
        id: "nested/c.pdf",
        path: path.join(root, "corpus", "nested", "c.pdf"),
        mediaType: "application/pdf",
      },
    ]);
  });

  it("expands globs and de-duplicates overlapping selectors", async () => {
    const documents = await discoverDocuments(["corpus/**/*.md", "corpus/a.md"], { cwd: root });

    expect(documents.map((d) => d.id)).toEqual(["a.md"]);
  });

  it("makes ids relative to the common root of all selectors", async () => {
    const documents = await discoverDocuments(["corpus/a.md", "other"], { cwd: root });

    expect(documents.map((d) => d.id)).toEqual(["corpus/a.md", "other/d.json"]);
  });

  it("keeps ids stable across selectors when a root is given", async () => {
    const whole = await discoverDocuments(["corpus"], { cwd: root, root: "." });
    const part = await discoverDocuments(["corpus/nested"], { cwd: root, root: "." });

    expect(whole.map((d) => d.id)).toEqual(["corpus/a.md", "corpus/b.txt", "corpus/nested/c.pdf"]);
    expect(part.map((d) => d.id)).toEqual(["corpus/nested/c.pdf"]);
  });

  it("rejects files outside the given root", async () => {
    await expect(
      discoverDocuments(["corpus/a.md", "other"], { cwd: root, root: "corpus" }),
    ).rejects.toThrow(new ConfigurationError("other/d.json is outside the root corpus"));
  });

  it("returns nothing for a glob without matches", async () => {
    await expect(discoverDocuments(["corpus/**/*.csv"], { cwd: root })).resolves.toEqual([]);
  });

  it("rejects a path that does not exist", async () => {
    const attempt = discoverDocuments(["missing"], { cwd: root });

    await expect(attempt).rejects.toBeInstanceOf(ConfigurationError);
    await expect(attempt).rejects.toThrow("No such file or directory: missing");
  });

  it("reads a document with its size and content hash", async () => {
    await touch("corpus/a.md", "# Title\nbody");
    const [document] = await discoverDocuments(["corpus/a.md"], { cwd: root });
    if (!document) throw new Error("expected a document");

    const source = await readSourceDocument(document);

    expect(source.id).toBe("a.md");
    expect(new TextDecoder().decode(source.content)).toBe("# Title\nbody");
    expect(source.sizeBytes).toBe(12);
    expect(source.contentHash).toBe(sha256Hex("# Title\nbody"));
  });
});
