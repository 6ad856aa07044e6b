/**
 * Credential redaction for log output.
 *
 * Configuration objects, request options and service errors end up in log
 * lines; API keys and database passwords must not.
 */

const REDACTED = "[REDACTED]";

/** Normalized key suffixes (lowercase, no `_` or `-`) whose values are secret. */
const SECRET_SUFFIXES = ["apikey", "password", "secret", "token", "authorization", "cookie"];

/** Keys holding a connection string; only the password part is hidden. */
const URL_KEYS: ReadonlySet<string> = new Set(["databaseurl", "connectionstring", "url"]);

const URL_CREDENTIALS = /([a-z][a-z0-9+.-]*:\/\/[^:/@\s]+):[^@\s]+@/gi;

function normalize(key: string): string {
  return key.toLowerCase().replace(/[-_]/g, "");
}

export function isSecretKey(key: string): boolean {
  const normalized = normalize(key);
  return SECRET_SUFFIXES.some((suffix) => normalized.endsWith(suffix));
}

/** `postgresql://ingest:hunter2@db/x` becomes `postgresql://ingest:[REDACTED]@db/x`. */
export function maskUrlCredentials(value: string): string {
  return value.replace(URL_CREDENTIALS, `$1:${REDACTED}@`);
}

export function redactValue(key: string, value: unknown): unknown {
  if (isSecretKey(key)) {
    return REDACTED;
  }
  if (typeof value === "string" && (URL_KEYS.has(normalize(key)) || value.includes("://"))) {
    return maskUrlCredentials(value);
  }
  return value;
}

/** Applies {@link redactValue} to every top-level property of a log object. */
export function redactFields(fields: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    result[key] = redactValue(key, value);
  }
  return result;
}

const NESTED_SECRET_PATHS = [
  "apiKey",
  "headers.authorization",
  "headers[\"api-key\"]",
  "cohere.apiKey",
  "extraction.apiKey",
  "vectorStore.qdrantApiKey",
];

/**
 * Paths for Pino's `redact` option. Covers secrets nested one level inside
 * logged config and request objects, which `redactFields` does not reach.
 */
export const REDACT_PATHS: string[] = [
  ...NESTED_SECRET_PATHS,
  ...NESTED_SECRET_PATHS.map((path) => `*.${path}`),
];
