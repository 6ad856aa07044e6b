export { envSchema, parseEnv, describeEnvIssues } from "./env.js";
export type { ParsedEnv } from "./env.js";
