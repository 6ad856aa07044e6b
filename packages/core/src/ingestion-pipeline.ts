import type { Chunk, SourceDocument, TextBlock } from "@ingestline/types";
import type { ExtractorRegistry } from "@ingestline/extractor";
import type { TokenWindowChunker } from "@ingestline/chunker";
import type { Embedder } from "@ingestline/embeddings";
import { CancelledError } from "@ingestline/errors";
import type { Indexer } from "./indexer.js";
import type { DocumentStateMachine } from "./document-state.js";

export interface IngestionDependencies {
  extractors: ExtractorRegistry;
  chunker: TokenWindowChunker;
  embedder: Embedder;
  indexer: Indexer;
  onExtracted?: (blocks: readonly TextBlock[]) => void;
  onChunked?: (chunks: readonly Chunk[]) => void;
}

export interface IngestionResult {
  documentId: string;
  chunkCount: number;
  tokensUsed: number;
}

function checkpoint(document: SourceDocument, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(`Ingestion of ${document.id} cancelled`, { documentId: document.id });
  }
}

/**
 * Ingestion pipeline for one document: Extract -> Chunk -> Embed -> Index.
 *
 * The abort signal is checked before every stage and passed into the
 * extraction and embedding calls. Indexing never sees it: once started, a
 * document's writes run to completion or fail as a whole.
 */
export async function ingest(
  document: SourceDocument,
  machine: DocumentStateMachine,
  deps: IngestionDependencies,
  signal?: AbortSignal,
): Promise<IngestionResult> {
  // Phase 1: Extract
  checkpoint(document, signal);
  machine.transition("extracting");
  const extractor = deps.extractors.getExtractor(document.mediaType);
  const blocks: TextBlock[] = [];
  for await (const block of extractor.extract(document, { signal })) {
    blocks.push(block);
  }
  deps.onExtracted?.(blocks);

  // Phase 2: Chunk
  checkpoint(document, signal);
  machine.transition("chunking");
  const chunks = deps.chunker.chunk(document.id, blocks);
  deps.onChunked?.(chunks);

  // Phase 3: Embed
  checkpoint(document, signal);
  machine.transition("embedding");
  const { vectors, tokensUsed } = await deps.embedder.embed(chunks, { signal });

  // Phase 4: Index
  checkpoint(document, signal);
  machine.transition("indexing");
  await deps.indexer.index(document, chunks, vectors);
  machine.transition("done");

  return { documentId: document.id, chunkCount: chunks.length, tokensUsed };
}
