import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { config, isDev } from "@/config";
import { dbLogger } from "@/lib/logger";
import * as schema from "./schema/index";

// Log database connection info (redacted)
const dbHost = config.DATABASE_URL.includes("@")
  ? config.DATABASE_URL.split("@")[1]?.split(":")[0]?.split("/")[0]
  : "unknown";
dbLogger.info({ host: dbHost }, "Connecting to PostgreSQL");

// Connections are opened lazily on first use
const client = postgres(config.DATABASE_URL, {
  max: config.DATABASE_POOL_MAX,
  idle_timeout: 20, // Close idle connections after 20s
  connect_timeout: 10,
  prepare: true,
});

export type Database = PostgresJsDatabase<typeof schema>;

/**
 * Run `work` against a store session scoped to a single unit of work.
 *
 * A dedicated connection is reserved from the pool for the duration of the
 * callback and handed back in `finally`, whether the callback resolves or
 * throws. Each statement commits on its own; no transaction is opened.
 *
 * @example
 * const ticket = await withSession((session) => ticketsService.get(session, 42));
 */
export async function withSession<T>(work: (session: Database) => Promise<T>): Promise<T> {
  const reserved = await client.reserve();
  try {
    return await work(drizzle(reserved, { schema, logger: isDev }));
  } finally {
    reserved.release();
  }
}

// Health check function
export async function checkDatabaseConnection(): Promise<boolean> {
  try {
    await client`SELECT 1`;
    return true;
  } catch (error) {
    dbLogger.error({ err: error }, "Database connection failed");
    return false;
  }
}

// Graceful shutdown
export async function closeDatabaseConnection(): Promise<void> {
  await client.end();
}
