/**
 * Structured Pino loggers with credential redaction, pretty-printing in
 * development and JSON output everywhere else.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactFields } from "./redaction.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /**
   * File descriptor to write to. Defaults to stdout; the CLI passes 2 so the
   * run summary owns stdout.
   */
  destination?: number;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

/**
 * - In **development** we pipe through `pino-pretty` for human-readable output.
 * - In **production / test** we emit structured JSON (no transport needed).
 */
function buildTransport(destination: number): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        destination,
      },
    };
  }
  return undefined;
}

/**
 * Create a new root Pino logger.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "ingestline";
  const destination = options?.destination ?? 1;

  const transport = buildTransport(destination);

  const loggerOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    formatters: {
      log: redactFields,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (transport) {
    return pino({ ...loggerOptions, transport });
  }

  // Synchronous writes so nothing is lost when the CLI exits right after the summary.
  return pino(loggerOptions, pino.destination({ dest: destination, sync: true }));
}

/**
 * Create a child logger that inherits the parent's configuration and adds
 * scoped bindings (e.g. `documentId`, `component`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
