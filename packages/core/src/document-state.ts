import type { DocumentState, TerminalState } from "@ingestline/types";

const TRANSITIONS: Record<DocumentState, readonly DocumentState[]> = {
  // Reading the file and the unchanged check happen while discovered.
  discovered: ["extracting", "skipped", "failed"],
  extracting: ["chunking", "failed"],
  chunking: ["embedding", "failed"],
  embedding: ["indexing", "failed"],
  indexing: ["done", "failed"],
  done: [],
  failed: [],
  skipped: [],
};

export class InvalidTransitionError extends Error {
  constructor(
    readonly documentId: string,
    readonly from: DocumentState,
    readonly to: DocumentState,
  ) {
    super(`Invalid state transition for ${documentId}: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export interface StateChange {
  documentId: string;
  from: DocumentState;
  to: DocumentState;
}

export function isTerminal(state: DocumentState): state is TerminalState {
  return state === "done" || state === "failed" || state === "skipped";
}

export class DocumentStateMachine {
  private current: DocumentState = "discovered";

  constructor(
    readonly documentId: string,
    private readonly onChange?: (change: StateChange) => void,
  ) {}

  get state(): DocumentState {
    return this.current;
  }

  canTransition(to: DocumentState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: DocumentState): void {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this.documentId, this.current, to);
    }
    const from = this.current;
    this.current = to;
    this.onChange?.({ documentId: this.documentId, from, to });
  }
}
