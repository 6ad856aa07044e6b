import type { Logger } from "@ingestline/logger";
import type { StateChange } from "./document-state.js";

/** `onStateChange` hook that turns state transitions into log lines. */
export function logStateChanges(logger: Pick<Logger, "debug" | "info">) {
  return ({ documentId, from, to }: StateChange): void => {
    if (to === "done" || to === "skipped") {
      logger.info({ documentId, from, state: to }, `document ${to}`);
    } else {
      logger.debug({ documentId, from, state: to }, "document state changed");
    }
  };
}
