import { z } from "zod";
import type { PipelineConfig } from "@ingestline/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value));

/**
 * Zod schema for the pipeline's environment variables.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed PipelineConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
    INGEST_CONCURRENCY: positiveInt("4"),

    // ---------- Chunking ----------
    CHUNK_SIZE: positiveInt("1024"),
    CHUNK_OVERLAP: nonNegativeInt("128"),
    TOKENIZER: z.enum(["tiktoken", "whitespace"]).default("tiktoken"),
    TOKENIZER_ENCODING: z.string().min(1).default("cl100k_base"),

    // ---------- Text recognition ----------
    EXTRACTION_SERVICE_URL: optionalString.pipe(z.string().url().optional()),
    EXTRACTION_SERVICE_API_KEY: optionalString,
    EXTRACTION_TIMEOUT_MS: positiveInt("60000"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    COHERE_API_KEY: optionalString,
    COHERE_EMBED_MODEL: z.string().min(1).default("embed-v4.0"),
    BGE_M3_URL: optionalString.pipe(z.string().url().optional()),
    EMBEDDING_DIMENSIONS: positiveInt("1024"),
    EMBEDDING_MAX_BATCH_SIZE: positiveInt("16"),
    EMBEDDING_MAX_BATCH_TOKENS: positiveInt("16384"),
    EMBEDDING_MAX_INPUT_TOKENS: positiveInt("8191"),
    EMBEDDING_CONCURRENCY: positiveInt("4"),

    // ---------- Retry ----------
    RETRY_MAX_ATTEMPTS: positiveInt("5"),
    RETRY_BASE_DELAY_MS: nonNegativeInt("500"),
    RETRY_MAX_DELAY_MS: nonNegativeInt("20000"),
    RETRY_JITTER: z.string().default("0.5").transform(Number).pipe(z.number().min(0).max(1)),

    // ---------- Vector index ----------
    VECTOR_STORE: z.enum(["qdrant", "pgvector"]).default("qdrant"),
    QDRANT_URL: optionalString.pipe(z.string().url().optional()),
    QDRANT_API_KEY: optionalString,
    DATABASE_URL: optionalString.pipe(
      z
        .string()
        .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
          message: "DATABASE_URL must start with postgresql://",
        })
        .optional(),
    ),
    INDEX_NAME: z
      .string()
      .regex(/^[a-z][a-z0-9_-]{0,62}$/, "INDEX_NAME must be lowercase alphanumeric, _ or -")
      .default("documents"),

    // ---------- Blob store ----------
    BLOB_STORE: z.enum(["filesystem", "postgres"]).default("filesystem"),
    BLOB_ROOT: z.string().min(1).default(".blobs"),
    BLOB_CONTAINER: z
      .string()
      .regex(/^[a-z0-9][a-z0-9-]{0,62}$/, "BLOB_CONTAINER must be lowercase alphanumeric or -")
      .default("content"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (env.EMBEDDING_MAX_BATCH_TOKENS < env.EMBEDDING_MAX_INPUT_TOKENS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["EMBEDDING_MAX_BATCH_TOKENS"],
        message: "EMBEDDING_MAX_BATCH_TOKENS must be at least EMBEDDING_MAX_INPUT_TOKENS",
      });
    }
    if (env.RETRY_MAX_DELAY_MS < env.RETRY_BASE_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RETRY_MAX_DELAY_MS"],
        message: "RETRY_MAX_DELAY_MS must be at least RETRY_BASE_DELAY_MS",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is cohere",
      });
    }
    if (env.EMBEDDING_PROVIDER === "bge-m3" && !env.BGE_M3_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_M3_URL"],
        message: "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
      });
    }
    if (env.VECTOR_STORE === "qdrant" && !env.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required when VECTOR_STORE is qdrant",
      });
    }
    if ((env.VECTOR_STORE === "pgvector" || env.BLOB_STORE === "postgres") && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required for the pgvector index and the postgres blob store",
      });
    }
  });

export type ParsedEnv = z.infer<typeof envSchema>;

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link PipelineConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    concurrency: parsed.INGEST_CONCURRENCY,

    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
    },

    tokenizer: {
      kind: parsed.TOKENIZER,
      encoding: parsed.TOKENIZER_ENCODING,
    },

    extraction: {
      serviceUrl: parsed.EXTRACTION_SERVICE_URL,
      apiKey: parsed.EXTRACTION_SERVICE_API_KEY,
      timeoutMs: parsed.EXTRACTION_TIMEOUT_MS,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      cohere: parsed.COHERE_API_KEY
        ? { apiKey: parsed.COHERE_API_KEY, model: parsed.COHERE_EMBED_MODEL }
        : undefined,
      bgeM3: parsed.BGE_M3_URL ? { baseUrl: parsed.BGE_M3_URL } : undefined,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      maxBatchSize: parsed.EMBEDDING_MAX_BATCH_SIZE,
      maxBatchTokens: parsed.EMBEDDING_MAX_BATCH_TOKENS,
      maxInputTokens: parsed.EMBEDDING_MAX_INPUT_TOKENS,
      concurrency: parsed.EMBEDDING_CONCURRENCY,
    },

    retry: {
      maxAttempts: parsed.RETRY_MAX_ATTEMPTS,
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
      jitter: parsed.RETRY_JITTER,
    },

    vectorStore: {
      kind: parsed.VECTOR_STORE,
      indexName: parsed.INDEX_NAME,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
      databaseUrl: parsed.DATABASE_URL,
    },

    blobStore: {
      kind: parsed.BLOB_STORE,
      root: parsed.BLOB_ROOT,
      container: parsed.BLOB_CONTAINER,
      databaseUrl: parsed.DATABASE_URL,
    },
  };
}

/**
 * Flatten a ZodError into `{ VARIABLE: message }` pairs for error reporting.
 */
export function describeEnvIssues(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.join(".") || "(root)";
    fields[key] ??= issue.message;
  }
  return fields;
}
