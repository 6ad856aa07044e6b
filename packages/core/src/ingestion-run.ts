import type { DocumentOutcome, IngestionRunSummary, TerminalState } from "@ingestline/types";

/**
 * Collects per-document outcomes for one run. Outcomes are keyed by document
 * id; recording a document twice keeps the latest outcome.
 */
export class IngestionRun {
  private readonly outcomes = new Map<string, DocumentOutcome>();
  private readonly startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  record(outcome: DocumentOutcome): void {
    this.outcomes.set(outcome.documentId, outcome);
  }

  summarize(cancelled: boolean): IngestionRunSummary {
    const outcomes = [...this.outcomes.values()].sort((a, b) =>
      a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0,
    );
    const counts: Record<TerminalState, number> = { done: 0, failed: 0, skipped: 0 };
    let chunksUploaded = 0;
    let embeddingTokens = 0;

    for (const outcome of outcomes) {
      counts[outcome.state]++;
      if (outcome.state === "done") {
        chunksUploaded += outcome.chunkCount;
        embeddingTokens += outcome.tokensUsed;
      }
    }

    return {
      outcomes,
      counts,
      documentsProcessed: counts.done + counts.failed,
      chunksUploaded,
      embeddingTokens,
      durationMs: Math.max(0, this.now() - this.startedAt),
      cancelled,
    };
  }
}

/** Non-zero exactly when at least one document failed. */
export function exitCodeFor(summary: IngestionRunSummary): number {
  return summary.counts.failed > 0 ? 1 : 0;
}
