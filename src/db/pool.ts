/**
 * PostgreSQL connection pool shared by the sink, the checkpoint store
 * and the event source.
 */

import { Pool } from "pg";
import { setTimeout as sleep } from "timers/promises";
import { createChildLogger } from "../logger.js";
import { config } from "../config.js";

const logger = createChildLogger("db");

const DATABASE_RETRY_INTERVAL_MS = 10000;

/** Subset of pg.Pool used for plain queries */
export type Queryable = Pick<Pool, "query">;

let pool: Pool | null = null;

export interface PoolOptions {
  connectionString: string;
  max: number;
  ssl: boolean;
  sslVerify: boolean;
}

export function createPool(options: PoolOptions): Pool {
  logger.info({ maxConnections: options.max, ssl: options.ssl }, "Creating PostgreSQL connection pool");
  const created = new Pool({
    connectionString: options.connectionString,
    ssl: options.ssl ? { rejectUnauthorized: options.sslVerify } : undefined,
    max: options.max,
    connectionTimeoutMillis: 10000,
    idleTimeoutMillis: 30000,
  });
  created.on("error", (err) => {
    logger.error({ error: err.message, stack: err.stack }, "Unexpected pool error");
  });
  created.on("connect", () => {
    logger.debug("New database connection established");
  });
  return created;
}

export function getPool(): Pool {
  if (!pool) {
    if (!config.databaseUrl) {
      throw new Error("DATABASE_URL is required");
    }
    pool = createPool({
      connectionString: config.databaseUrl,
      max: config.dbPoolMax,
      ssl: config.dbSsl,
      sslVerify: config.dbSslVerify,
    });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    await closing.end();
    logger.info("Database pool closed");
  }
}

/**
 * Block until the database answers, retrying every 10s.
 * Resolves false if `signal` aborts first.
 */
export async function waitForDatabase(db: Queryable, signal?: AbortSignal): Promise<boolean> {
  for (;;) {
    try {
      await db.query("SELECT 1");
      return true;
    } catch (error) {
      logger.warn(
        { error: error instanceof Error ? error.message : String(error), retryInMs: DATABASE_RETRY_INTERVAL_MS },
        "Database not reachable, waiting"
      );
    }
    try {
      await sleep(DATABASE_RETRY_INTERVAL_MS, undefined, { signal });
    } catch {
      return false;
    }
  }
}
