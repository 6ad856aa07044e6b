import { ZodError } from "zod";
import { describeEnvIssues, parseEnv } from "@ingestline/config";
import { ConfigurationError } from "@ingestline/errors";
import { createLogger, type Logger } from "@ingestline/logger";
import type { PipelineConfig } from "@ingestline/types";
import {
  PipelineCoordinator,
  discoverDocuments,
  exitCodeFor,
  formatSummary,
  logStateChanges,
} from "@ingestline/core";
import { USAGE, UsageError, parseCliArgs, type CliArgs } from "./args.js";
import { createPipelineContext, type ContextOptions, type PipelineContext } from "./context.js";
import { handleSignals, type SignalSource } from "./signals.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  env: Record<string, string | undefined>;
  cwd: string;
  stdout: { write(text: string): unknown };
  stderr: { write(text: string): unknown };
  signals: SignalSource;
  createLogger?: (config: PipelineConfig) => Logger;
  createContext?: (config: PipelineConfig, options: ContextOptions) => PipelineContext;
}

function formatFields(fields: Record<string, string>): string {
  return Object.entries(fields)
    .map(([key, message]) => `  ${key}: ${message}\n`)
    .join("");
}

function reportUsageError(err: unknown, io: CliIO): number | null {
  if (err instanceof UsageError) {
    io.stderr.write(`ingestline: ${err.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }
  if (err instanceof ZodError) {
    io.stderr.write(`ingestline: invalid configuration\n${formatFields(describeEnvIssues(err))}`);
    return EXIT_USAGE;
  }
  if (err instanceof ConfigurationError) {
    io.stderr.write(`ingestline: ${err.message}\n${formatFields(err.fields)}`);
    return EXIT_USAGE;
  }
  return null;
}

/** Runs one ingestion and resolves to the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let config: PipelineConfig;
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
    if (args.help) {
      io.stdout.write(USAGE);
      return EXIT_OK;
    }
    config = parseEnv({ ...io.env, ...args.envOverrides });
  } catch (err: unknown) {
    const code = reportUsageError(err, io);
    if (code !== null) return code;
    throw err;
  }

  const logger = io.createLogger
    ? io.createLogger(config)
    : createLogger({ level: config.logLevel, service: "ingestline", destination: 2 });
  const cancellation = handleSignals(io.signals, logger);
  let context: PipelineContext | undefined;

  try {
    const documents = await discoverDocuments(args.selectors, {
      cwd: io.cwd,
      root: args.root ?? undefined,
    });
    logger.info(
      { documents: documents.length, index: config.vectorStore.indexName },
      "discovered documents",
    );

    context = (io.createContext ?? createPipelineContext)(config, {
      logger,
      category: args.category,
      skipBlobs: args.skipBlobs,
    });
    const unhealthy = await context.checkHealth();
    if (unhealthy.length > 0) {
      logger.error({ unhealthy }, "health check failed before the run");
      io.stderr.write(`ingestline: unreachable: ${unhealthy.join(", ")}\n`);
      return EXIT_FAILED;
    }
    await context.deps.indexer.prepare();

    const coordinator = new PipelineCoordinator(context.deps, {
      concurrency: config.concurrency,
      skipUnchanged: args.skipUnchanged,
      stopSignal: cancellation.stop,
      abortSignal: cancellation.abort,
      onStateChange: logStateChanges(logger),
      logger,
    });
    const summary = await coordinator.run(documents);

    io.stdout.write(formatSummary(summary));
    return exitCodeFor(summary);
  } catch (err: unknown) {
    const code = reportUsageError(err, io);
    if (code !== null) return code;
    logger.error({ err }, "ingestion run aborted");
    io.stderr.write(`ingestline: ${err instanceof Error ? err.message : String(err)}\n`);
    return EXIT_FAILED;
  } finally {
    cancellation.dispose();
    await context?.close();
  }
}
