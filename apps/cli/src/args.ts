import { parseArgs } from "node:util";

export const USAGE = `Usage: ingestline [options] <selector...>

Ingest files, directories and glob patterns into the vector index.

Options:
  -v, --verbose            log at debug level
  -q, --quiet              log warnings and errors only
      --index <name>       target index (overrides INDEX_NAME)
      --container <name>   blob container (overrides BLOB_CONTAINER)
      --concurrency <n>    documents processed at once (overrides INGEST_CONCURRENCY)
      --chunk-size <n>     tokens per chunk (overrides CHUNK_SIZE)
      --chunk-overlap <n>  tokens shared by adjacent chunks (overrides CHUNK_OVERLAP)
      --category <name>    category stored on every record
      --root <dir>         directory document ids are relative to
      --skip-blobs         do not upload source files to the blob store
      --skip-unchanged     skip files whose stored content hash is unchanged
  -h, --help               show this help

Document ids are file paths relative to --root. Without it they are
relative to the common directory of the selectors, so ingesting a
subdirectory on its own gives its files different ids (and a second copy
in the index). Pass the same --root on every run to keep ids stable.

Everything else is configured through environment variables.
`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliArgs {
  help: boolean;
  selectors: string[];
  category: string | null;
  /** Directory document ids are relative to; null means the selectors' common root. */
  root: string | null;
  skipBlobs: boolean;
  skipUnchanged: boolean;
  /** Environment overrides derived from flags, validated with the rest of the env. */
  envOverrides: Record<string, string>;
}

const options = {
  verbose: { type: "boolean", short: "v" },
  quiet: { type: "boolean", short: "q" },
  index: { type: "string" },
  container: { type: "string" },
  concurrency: { type: "string" },
  "chunk-size": { type: "string" },
  "chunk-overlap": { type: "string" },
  category: { type: "string" },
  root: { type: "string" },
  "skip-blobs": { type: "boolean" },
  "skip-unchanged": { type: "boolean" },
  help: { type: "boolean", short: "h" },
} as const;

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options, allowPositionals: true, strict: true });
  } catch (err: unknown) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = parseFlags(argv);

  if (values.verbose && values.quiet) {
    throw new UsageError("--verbose and --quiet cannot be combined");
  }
  const help = values.help ?? false;
  if (!help && positionals.length === 0) {
    throw new UsageError("at least one file, directory or glob pattern is required");
  }

  const envOverrides: Record<string, string> = {};
  if (values.verbose) envOverrides["LOG_LEVEL"] = "debug";
  if (values.quiet) envOverrides["LOG_LEVEL"] = "warn";
  if (values.index !== undefined) envOverrides["INDEX_NAME"] = values.index;
  if (values.container !== undefined) envOverrides["BLOB_CONTAINER"] = values.container;
  if (values.concurrency !== undefined) envOverrides["INGEST_CONCURRENCY"] = values.concurrency;
  if (values["chunk-size"] !== undefined) envOverrides["CHUNK_SIZE"] = values["chunk-size"];
  if (values["chunk-overlap"] !== undefined) envOverrides["CHUNK_OVERLAP"] = values["chunk-overlap"];

  return {
    help,
    selectors: positionals,
    category: values.category ?? null,
    root: values.root ?? null,
    skipBlobs: values["skip-blobs"] ?? false,
    skipUnchanged: values["skip-unchanged"] ?? false,
    envOverrides,
  };
}
