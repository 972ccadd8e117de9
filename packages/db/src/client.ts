import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema";

export interface DbClientOptions {
  // Pool size per process; api, dispatcher and every worker connect concurrently
  maxConnections?: number;
  logNotices?: boolean;
}

export function createDbClient(connectionString: string, options: DbClientOptions = {}) {
  const client = postgres(connectionString, {
    max: options.maxConnections ?? 3,
    onnotice: options.logNotices
      ? (notice) => console.warn("[Postgres NOTICE]", notice)
      : () => {},
  });
  const db = drizzle(client, { schema });

  return {
    db,
    client,
    async close(): Promise<void> {
      await client.end({ timeout: 5 });
    },
  };
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient["db"];
export { sql };
