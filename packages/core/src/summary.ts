import type { IngestionRunSummary } from "@ingestline/types";

function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${String(ms)}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${String(minutes)}m ${String(Math.round(seconds - minutes * 60))}s`;
}

/**
 * Human-readable run summary for stdout. Failed documents are always listed
 * with their error kind and message.
 */
export function formatSummary(summary: IngestionRunSummary): string {
  const { counts } = summary;
  const total = counts.done + counts.failed + counts.skipped;
  const lines = [
    `Ingestion ${summary.cancelled ? "cancelled" : "finished"} in ${formatDuration(summary.durationMs)}`,
    `  documents:        ${String(total)} (${String(counts.done)} done, ${String(counts.skipped)} skipped, ${String(counts.failed)} failed)`,
    `  chunks uploaded:  ${String(summary.chunksUploaded)}`,
    `  embedding tokens: ${String(summary.embeddingTokens)}`,
  ];

  const failed = summary.outcomes.flatMap((outcome) =>
    outcome.state === "failed"
      ? [`  - ${outcome.documentId}: [${outcome.errorKind}] ${outcome.message}`]
      : [],
  );
  if (failed.length > 0) {
    lines.push("", "Failed documents:", ...failed);
  }

  const skipped = summary.outcomes.flatMap((outcome) =>
    outcome.state === "skipped" ? [`  - ${outcome.documentId}: ${outcome.reason}`] : [],
  );
  if (skipped.length > 0) {
    lines.push("", "Skipped documents:", ...skipped);
  }

  return `${lines.join("\n")}\n`;
}
