import type { Logger } from "@ingestline/logger";

export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface Cancellation {
  /** Aborted on the first signal: no new documents are started. */
  stop: AbortSignal;
  /** Aborted on the second signal: in-flight documents fail as cancelled. */
  abort: AbortSignal;
  dispose(): void;
}

const SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function handleSignals(source: SignalSource, logger: Logger): Cancellation {
  const stop = new AbortController();
  const abort = new AbortController();

  const onSignal = (): void => {
    if (!stop.signal.aborted) {
      logger.warn("stopping: in-flight documents will finish, send the signal again to abort them");
      stop.abort();
      return;
    }
    if (!abort.signal.aborted) {
      logger.warn("aborting in-flight documents");
      abort.abort();
    }
  };

  for (const signal of SIGNALS) {
    source.on(signal, onSignal);
  }

  return {
    stop: stop.signal,
    abort: abort.signal,
    dispose() {
      for (const signal of SIGNALS) {
        source.off(signal, onSignal);
      }
    },
  };
}
