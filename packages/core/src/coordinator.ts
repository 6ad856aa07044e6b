import type { IngestionRunSummary, SourceDocument } from "@ingestline/types";
import type { Logger } from "@ingestline/logger";
import { WorkerPool } from "@ingestline/queue";
import { classifyError } from "@ingestline/errors";
import { DocumentStateMachine, type StateChange } from "./document-state.js";
import { ingest, type IngestionDependencies } from "./ingestion-pipeline.js";
import { IngestionRun } from "./ingestion-run.js";
import { readSourceDocument, type DiscoveredDocument } from "./discovery.js";

export interface CoordinatorOptions {
  concurrency: number;
  /** Skip documents whose committed blob already has the same content hash. */
  skipUnchanged?: boolean;
  /** First cancellation: stop dispatching, let in-flight documents finish. */
  stopSignal?: AbortSignal;
  /** Second cancellation: abort in-flight documents at their next checkpoint. */
  abortSignal?: AbortSignal;
  onStateChange?: (change: StateChange) => void;
  logger?: Logger;
  /** Replaced in tests. */
  readDocument?: (document: DiscoveredDocument) => Promise<SourceDocument>;
  now?: () => number;
}

/**
 * Drives every discovered document through the pipeline on a bounded worker
 * pool. A failing document is recorded and the run moves on.
 */
export class PipelineCoordinator {
  private readonly readDocument: (document: DiscoveredDocument) => Promise<SourceDocument>;

  constructor(
    private readonly deps: IngestionDependencies,
    private readonly options: CoordinatorOptions,
  ) {
    this.readDocument = options.readDocument ?? readSourceDocument;
  }

  async run(documents: readonly DiscoveredDocument[]): Promise<IngestionRunSummary> {
    const run = new IngestionRun(this.options.now);
    const logger = this.options.logger;

    logger?.info(
      { documents: documents.length, concurrency: this.options.concurrency },
      "ingestion run started",
    );

    const pool = new WorkerPool<DiscoveredDocument>(
      (document) => this.process(document, run),
      { concurrency: this.options.concurrency, signal: this.options.stopSignal },
    );
    const { undispatched } = await pool.run(documents);

    for (const document of undispatched) {
      const machine = this.machineFor(document);
      machine.transition("skipped");
      run.record({ documentId: document.id, state: "skipped", reason: "cancelled" });
    }

    const cancelled = this.options.stopSignal?.aborted === true;
    const summary = run.summarize(cancelled);
    logger?.info(
      {
        counts: summary.counts,
        chunksUploaded: summary.chunksUploaded,
        embeddingTokens: summary.embeddingTokens,
        durationMs: summary.durationMs,
        cancelled,
      },
      "ingestion run finished",
    );
    return summary;
  }

  private machineFor(document: DiscoveredDocument): DocumentStateMachine {
    return new DocumentStateMachine(document.id, this.options.onStateChange);
  }

  private async process(discovered: DiscoveredDocument, run: IngestionRun): Promise<void> {
    const machine = this.machineFor(discovered);

    try {
      const document = await this.readDocument(discovered);

      if (this.options.skipUnchanged && (await this.deps.indexer.isUnchanged(document))) {
        machine.transition("skipped");
        run.record({ documentId: document.id, state: "skipped", reason: "unchanged" });
        return;
      }

      const result = await ingest(document, machine, this.deps, this.options.abortSignal);
      run.record({
        documentId: result.documentId,
        state: "done",
        chunkCount: result.chunkCount,
        tokensUsed: result.tokensUsed,
      });
    } catch (err: unknown) {
      const { kind, message } = classifyError(err);
      if (machine.canTransition("failed")) {
        machine.transition("failed");
      }
      run.record({ documentId: discovered.id, state: "failed", errorKind: kind, message });
      this.options.logger?.error(
        { documentId: discovered.id, errorKind: kind, err },
        "document failed",
      );
    }
  }
}
