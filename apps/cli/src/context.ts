import type { PipelineConfig } from "@ingestline/types";
import { createChildLogger, type Logger } from "@ingestline/logger";
import { RetryPolicy } from "@ingestline/errors";
import { Semaphore } from "@ingestline/queue";
import {
  ExtractorRegistry,
  HttpTextRecognitionService,
  RecognitionExtractor,
  TextExtractor,
} from "@ingestline/extractor";
import { createTokenizer, TokenWindowChunker } from "@ingestline/chunker";
import { createEmbeddingProvider, Embedder } from "@ingestline/embeddings";
import { createVectorStore } from "@ingestline/vector-store";
import { createBlobStore } from "@ingestline/blob-store";
import { Indexer, type IngestionDependencies } from "@ingestline/core";

export interface ContextOptions {
  logger: Logger;
  category?: string | null;
  skipBlobs?: boolean;
}

/**
 * Everything one run shares across documents: HTTP clients and their
 * breakers, the embedding limiter and the store connections.
 */
export interface PipelineContext {
  deps: IngestionDependencies;
  /** Names of the services that failed their health check. */
  checkHealth(): Promise<string[]>;
  close(): Promise<void>;
}

export interface HealthCheckable {
  healthCheck(): Promise<boolean>;
}

export async function findUnhealthy(
  services: ReadonlyArray<readonly [string, HealthCheckable]>,
): Promise<string[]> {
  const results = await Promise.all(
    services.map(async ([name, service]) => ((await service.healthCheck()) ? null : name)),
  );
  return results.filter((name): name is string => name !== null);
}

export function createPipelineContext(
  config: PipelineConfig,
  options: ContextOptions,
): PipelineContext {
  const { logger } = options;
  const retry = RetryPolicy.fromConfig(config.retry);

  const extractionLogger = createChildLogger(logger, { component: "extractor" });
  const embeddingLogger = createChildLogger(logger, { component: "embedder" });

  const extractors = new ExtractorRegistry([new TextExtractor()]);
  let recognition: HttpTextRecognitionService | undefined;
  if (config.extraction.serviceUrl) {
    recognition = new HttpTextRecognitionService({
      baseUrl: config.extraction.serviceUrl,
      apiKey: config.extraction.apiKey,
      timeoutMs: config.extraction.timeoutMs,
      logger: extractionLogger,
    });
    extractors.register(
      new RecognitionExtractor({ service: recognition, retry, logger: extractionLogger }),
    );
  } else {
    logger.debug("no text-recognition service configured, PDFs and images are unsupported");
  }

  const chunker = new TokenWindowChunker(createTokenizer(config.tokenizer), config.chunking);

  const provider = createEmbeddingProvider(config.embedding, { logger: embeddingLogger });
  const embedder = new Embedder({
    provider,
    retry,
    limiter: new Semaphore(config.embedding.concurrency),
    dimensions: config.embedding.dimensions,
    maxBatchSize: config.embedding.maxBatchSize,
    maxBatchTokens: config.embedding.maxBatchTokens,
    maxInputTokens: config.embedding.maxInputTokens,
    logger: embeddingLogger,
  });

  const vectorStore = createVectorStore(config.vectorStore, config.embedding.dimensions);
  const blobStore = createBlobStore(config.blobStore);
  const indexer = new Indexer({
    vectorStore,
    blobStore,
    collectionName: config.vectorStore.indexName,
    container: config.blobStore.container,
    dimensions: config.embedding.dimensions,
    skipBlobs: options.skipBlobs,
    category: options.category,
  });

  logger.debug(
    {
      tokenizer: config.tokenizer.kind,
      embedding: { provider: provider.name, model: provider.model },
      vectorStore: vectorStore.kind,
      blobStore: blobStore.kind,
    },
    "pipeline context ready",
  );

  return {
    deps: { extractors, chunker, embedder, indexer },
    checkHealth() {
      const services: Array<readonly [string, HealthCheckable]> = [
        [`embedding provider ${provider.name}`, provider],
        [`vector store ${vectorStore.kind}`, vectorStore],
      ];
      if (!options.skipBlobs) {
        services.push([`blob store ${blobStore.kind}`, blobStore]);
      }
      return findUnhealthy(services);
    },
    async close() {
      recognition?.shutdown();
      provider.shutdown?.();
      await Promise.all([vectorStore.close(), blobStore.close()]);
    },
  };
}
