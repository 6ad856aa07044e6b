import { describe, it, expect } from "vitest";
import { UsageError, parseCliArgs } from "./args.js";

describe("parseCliArgs", () => {
  it("collects selectors and defaults every flag", () => {
    expect(parseCliArgs(["docs", "notes/*.md"])).toEqual({
      help: false,
      selectors: ["docs", "notes/*.md"],
      category: null,
      root: null,
      skipBlobs: false,
      skipUnchanged: false,
      envOverrides: {},
    });
  });

  it("takes the id root from --root", () => {
    const args = parseCliArgs(["--root", "corpus", "corpus/guides"]);

    expect(args.root).toBe("corpus");
    expect(args.selectors).toEqual(["corpus/guides"]);
  });

  it("turns tuning flags into environment overrides", () => {
    const args = parseCliArgs([
      "-v",
      "--index",
      "handbook",
      "--container",
      "raw",
      "--concurrency",
      "2",
      "--chunk-size",
      "256",
      "--chunk-overlap=32",
      "docs",
    ]);

    expect(args.envOverrides).toEqual({
      LOG_LEVEL: "debug",
      INDEX_NAME: "handbook",
      BLOB_CONTAINER: "raw",
      INGEST_CONCURRENCY: "2",
      CHUNK_SIZE: "256",
      CHUNK_OVERLAP: "32",
    });
  });

  it("maps --quiet to the warn level", () => {
    expect(parseCliArgs(["-q", "docs"]).envOverrides).toEqual({ LOG_LEVEL: "warn" });
  });

  it("reads category and the skip switches", () => {
    const args = parseCliArgs(["--category", "manuals", "--skip-blobs", "--skip-unchanged", "docs"]);

    expect(args.category).toBe("manuals");
    expect(args.skipBlobs).toBe(true);
    expect(args.skipUnchanged).toBe(true);
  });

  it("accepts --help without selectors", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
  });

  it("requires at least one selector", () => {
    expect(() => parseCliArgs([])).toThrow(
      new UsageError("at least one file, directory or glob pattern is required"),
    );
  });

  it("rejects unknown flags and conflicting verbosity", () => {
    expect(() => parseCliArgs(["--bogus", "docs"])).toThrow(UsageError);
    expect(() => parseCliArgs(["-v", "-q", "docs"])).toThrow(
      "--verbose and --quiet cannot be combined",
    );
  });
});
