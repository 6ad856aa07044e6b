export { ingest } from "./ingestion-pipeline.js";
export type { IngestionDependencies, IngestionResult } from "./ingestion-pipeline.js";

export { PipelineCoordinator } from "./coordinator.js";
export type { CoordinatorOptions } from "./coordinator.js";

export { Indexer } from "./indexer.js";
export type { IndexerOptions } from "./indexer.js";

export { discoverDocuments, readSourceDocument, staticBase } from "./discovery.js";
export type { DiscoveredDocument, DiscoverOptions } from "./discovery.js";

export { DocumentStateMachine, InvalidTransitionError, isTerminal } from "./document-state.js";
export type { StateChange } from "./document-state.js";

export { IngestionRun, exitCodeFor } from "./ingestion-run.js";
export { formatSummary } from "./summary.js";
export { logStateChanges } from "./state-logger.js";
