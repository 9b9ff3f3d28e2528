import { drizzle } from "drizzle-orm/postgres-js";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

const DEFAULT_POOL_MAX = 10;

export type Database = PostgresJsDatabase<typeof schema>;

export interface DbClient {
  db: Database;
  close(): Promise<void>;
}

export function createDbClient(options: DbClientOptions): DbClient {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_POOL_MAX,
    idle_timeout: 30,
    connect_timeout: 10,
  });

  return {
    db: drizzle(connection, { schema }),
    close: () => connection.end({ timeout: 5 }),
  };
}
