import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { parseEnv, describeEnvIssues } from "./env.js";

function makeValidEnv(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    NODE_ENV: "test",
    LOG_LEVEL: "info",
    INGEST_CONCURRENCY: "8",
    CHUNK_SIZE: "512",
    CHUNK_OVERLAP: "64",
    TOKENIZER: "whitespace",
    EXTRACTION_SERVICE_URL: "http://localhost:5050",
    EXTRACTION_SERVICE_API_KEY: "test-extraction-key",
    EMBEDDING_PROVIDER: "cohere",
    COHERE_API_KEY: "test-cohere-key",
    EMBEDDING_DIMENSIONS: "768",
    VECTOR_STORE: "qdrant",
    QDRANT_URL: "http://localhost:6333",
    INDEX_NAME: "handbook",
    BLOB_STORE: "filesystem",
    BLOB_ROOT: "/tmp/blobs",
    BLOB_CONTAINER: "content",
    ...overrides,
  };
}

function withoutKeys(env: Record<string, string>, ...keys: string[]): Record<string, string> {
  const copy = { ...env };
  for (const key of keys) {
    delete copy[key];
  }
  return copy;
}

describe("parseEnv", () => {
  it("parses valid env and returns PipelineConfig", () => {
    const config = parseEnv(makeValidEnv());

    expect(config.nodeEnv).toBe("test");
    expect(config.logLevel).toBe("info");
    expect(config.concurrency).toBe(8);
    expect(config.chunking).toEqual({ chunkSize: 512, chunkOverlap: 64 });
    expect(config.tokenizer).toEqual({ kind: "whitespace", encoding: "cl100k_base" });
    expect(config.extraction).toEqual({
      serviceUrl: "http://localhost:5050",
      apiKey: "test-extraction-key",
      timeoutMs: 60000,
    });
    expect(config.embedding.provider).toBe("cohere");
    expect(config.embedding.cohere).toEqual({ apiKey: "test-cohere-key", model: "embed-v4.0" });
    expect(config.embedding.bgeM3).toBeUndefined();
    expect(config.embedding.dimensions).toBe(768);
    expect(config.vectorStore).toEqual({
      kind: "qdrant",
      indexName: "handbook",
      qdrantUrl: "http://localhost:6333",
      qdrantApiKey: undefined,
      databaseUrl: undefined,
    });
    expect(config.blobStore).toEqual({
      kind: "filesystem",
      root: "/tmp/blobs",
      container: "content",
      databaseUrl: undefined,
    });
  });

  it("uses defaults for optional fields", () => {
    const env = withoutKeys(
      makeValidEnv(),
      "NODE_ENV",
      "LOG_LEVEL",
      "INGEST_CONCURRENCY",
      "CHUNK_SIZE",
      "CHUNK_OVERLAP",
      "TOKENIZER",
      "EMBEDDING_DIMENSIONS",
      "INDEX_NAME",
      "BLOB_ROOT",
      "BLOB_CONTAINER",
    );

    const config = parseEnv(env);

    expect(config.nodeEnv).toBe("production");
    expect(config.logLevel).toBe("info");
    expect(config.concurrency).toBe(4);
    expect(config.chunking).toEqual({ chunkSize: 1024, chunkOverlap: 128 });
    expect(config.tokenizer.kind).toBe("tiktoken");
    expect(config.embedding).toMatchObject({
      dimensions: 1024,
      maxBatchSize: 16,
      maxBatchTokens: 16384,
      maxInputTokens: 8191,
      concurrency: 4,
    });
    expect(config.retry).toEqual({
      maxAttempts: 5,
      baseDelayMs: 500,
      maxDelayMs: 20000,
      jitter: 0.5,
    });
    expect(config.vectorStore.indexName).toBe("documents");
    expect(config.blobStore.root).toBe(".blobs");
    expect(config.blobStore.container).toBe("content");
  });

  it("treats an empty extraction URL as not configured", () => {
    const config = parseEnv(makeValidEnv({ EXTRACTION_SERVICE_URL: "" }));
    expect(config.extraction.serviceUrl).toBeUndefined();
  });

  it("rejects CHUNK_OVERLAP >= CHUNK_SIZE", () => {
    expect(() => parseEnv(makeValidEnv({ CHUNK_SIZE: "128", CHUNK_OVERLAP: "128" }))).toThrow(
      "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    );
  });

  it("rejects a non-numeric CHUNK_SIZE", () => {
    expect(() => parseEnv(makeValidEnv({ CHUNK_SIZE: "large" }))).toThrow(ZodError);
  });

  it("rejects batch token limits below the model input limit", () => {
    expect(() =>
      parseEnv(
        makeValidEnv({ EMBEDDING_MAX_BATCH_TOKENS: "4000", EMBEDDING_MAX_INPUT_TOKENS: "8191" }),
      ),
    ).toThrow("EMBEDDING_MAX_BATCH_TOKENS must be at least EMBEDDING_MAX_INPUT_TOKENS");
  });

  it("requires COHERE_API_KEY for the cohere provider", () => {
    expect(() => parseEnv(withoutKeys(makeValidEnv(), "COHERE_API_KEY"))).toThrow(
      "COHERE_API_KEY is required",
    );
  });

  it("requires BGE_M3_URL for the bge-m3 provider", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3" }))).toThrow(
      "BGE_M3_URL is required",
    );
  });

  it("builds the bge-m3 provider config", () => {
    const config = parseEnv(
      makeValidEnv({ EMBEDDING_PROVIDER: "bge-m3", BGE_M3_URL: "http://localhost:8080" }),
    );
    expect(config.embedding.bgeM3).toEqual({ baseUrl: "http://localhost:8080" });
  });

  it("requires QDRANT_URL for the qdrant index", () => {
    expect(() => parseEnv(withoutKeys(makeValidEnv(), "QDRANT_URL"))).toThrow(
      "QDRANT_URL is required",
    );
  });

  it("requires DATABASE_URL for pgvector", () => {
    expect(() => parseEnv(makeValidEnv({ VECTOR_STORE: "pgvector" }))).toThrow(
      "DATABASE_URL is required",
    );
  });

  it("rejects DATABASE_URL with another scheme", () => {
    expect(() =>
      parseEnv(makeValidEnv({ VECTOR_STORE: "pgvector", DATABASE_URL: "mysql://localhost" })),
    ).toThrow("DATABASE_URL must start with postgresql://");
  });

  it("shares DATABASE_URL between pgvector and postgres blobs", () => {
    const config = parseEnv(
      makeValidEnv({
        VECTOR_STORE: "pgvector",
        BLOB_STORE: "postgres",
        DATABASE_URL: "postgresql://localhost:5432/ingest",
      }),
    );
    expect(config.vectorStore.databaseUrl).toBe("postgresql://localhost:5432/ingest");
    expect(config.blobStore.databaseUrl).toBe("postgresql://localhost:5432/ingest");
  });

  it("rejects invalid INDEX_NAME", () => {
    expect(() => parseEnv(makeValidEnv({ INDEX_NAME: "My Index" }))).toThrow(ZodError);
  });

  it("rejects invalid LOG_LEVEL", () => {
    expect(() => parseEnv(makeValidEnv({ LOG_LEVEL: "verbose" }))).toThrow(ZodError);
  });

  it("rejects RETRY_JITTER outside 0..1", () => {
    expect(() => parseEnv(makeValidEnv({ RETRY_JITTER: "1.5" }))).toThrow(ZodError);
  });
});

describe("describeEnvIssues", () => {
  it("maps each failing variable to its first message", () => {
    try {
      parseEnv(makeValidEnv({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "200" }));
      expect.unreachable("parseEnv should throw");
    } catch (err) {
      expect(err).toBeInstanceOf(ZodError);
      if (err instanceof ZodError) {
        expect(describeEnvIssues(err)).toEqual({
          CHUNK_OVERLAP: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
        });
      }
    }
  });
});
