import { describe, it, expect } from "vitest";
import { parseEnv } from "@ingestline/config";
import { ConfigurationError } from "@ingestline/errors";
import { createLogger } from "@ingestline/logger";
import { createPipelineContext, findUnhealthy } from "./context.js";

const logger = createLogger({ level: "silent", destination: 2 });

function config(overrides: Record<string, string> = {}) {
  return parseEnv({
    TOKENIZER: "whitespace",
    EMBEDDING_PROVIDER: "bge-m3",
    BGE_M3_URL: "http://localhost:8080",
    VECTOR_STORE: "pgvector",
    DATABASE_URL: "postgresql://localhost:5432/ingest",
    INDEX_NAME: "handbook",
    BLOB_CONTAINER: "raw",
    ...overrides,
  });
}

describe("createPipelineContext", () => {
  it("wires text recognition only when a service is configured", async () => {
    const withService = createPipelineContext(
      config({ EXTRACTION_SERVICE_URL: "http://localhost:5050" }),
      { logger },
    );
    const withoutService = createPipelineContext(config(), { logger });

    expect(withService.deps.extractors.supports("application/pdf")).toBe(true);
    expect(withService.deps.extractors.supports("text/markdown")).toBe(true);
    expect(withoutService.deps.extractors.supports("application/pdf")).toBe(false);

    await withService.close();
    await withoutService.close();
  });

  it("targets the configured index and container", async () => {
    const context = createPipelineContext(config(), { logger, skipBlobs: true });

    expect(context.deps.indexer.collectionName).toBe("handbook");
    expect(context.deps.indexer.container).toBe("raw");
    expect(context.deps.chunker.config).toEqual({ chunkSize: 1024, chunkOverlap: 128 });

    await context.close();
  });

  it("rejects an unknown tokenizer encoding", () => {
    expect(() =>
      createPipelineContext(
        config({ TOKENIZER: "tiktoken", TOKENIZER_ENCODING: "not-an-encoding" }),
        { logger },
      ),
    ).toThrow(ConfigurationError);
  });
});

describe("findUnhealthy", () => {
  it("names failing services in the order given", async () => {
    const up = { healthCheck: () => Promise.resolve(true) };
    const down = { healthCheck: () => Promise.resolve(false) };

    await expect(
      findUnhealthy([
        ["vector store", down],
        ["embedding provider", up],
        ["blob store", down],
      ]),
    ).resolves.toEqual(["vector store", "blob store"]);
    await expect(findUnhealthy([["vector store", up]])).resolves.toEqual([]);
  });
});
