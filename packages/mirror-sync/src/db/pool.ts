import { Pool } from "pg";

import { createLogger, type Logger } from "../logger";

export interface PoolOptions {
  maxConnections?: number;
  logger?: Logger;
}

/**
 * An idle client dropped by the server emits `error` on the pool; without a
 * listener that event would take the process down.
 */
export function createPool(databaseUrl: string, options: PoolOptions = {}): Pool {
  const logger = options.logger ?? createLogger();
  const pool = new Pool({
    connectionString: databaseUrl,
    max: options.maxConnections ?? 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000
  });

  pool.on("error", (error) => {
    logger.error("idle database client failed", error);
  });

  return pool;
}
