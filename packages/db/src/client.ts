import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

const DEFAULT_POOL = { max: 10 };

/**
 * Drizzle over postgres.js. Connections are opened lazily on the first query.
 */
export function createDbClient(options: DbClientOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_POOL.max,
    idle_timeout: 30,
    connect_timeout: 10,
    onnotice: () => undefined,
  });

  return drizzle(connection);
}

export type DbClient = ReturnType<typeof createDbClient>;

export async function closeDbClient(db: DbClient): Promise<void> {
  await db.$client.end({ timeout: 5 });
}
