/**
 * PostgreSQL connection pool and the small query surface the adapters use.
 *
 * Adapters depend on `SqlDatabase`, not on pg directly, so tests can swap in
 * a recording fake.
 */
import { config } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";
import pg from "pg";

export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface SqlDatabase extends SqlExecutor {
  /** Runs `fn` inside BEGIN/COMMIT on one connection; rolls back on error. */
  transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function createPool(): pg.Pool {
  const pool = new pg.Pool({
    host: config.db.host,
    port: config.db.port,
    user: config.db.user,
    password: config.db.password,
    database: config.db.database,
    max: config.db.max,
    idleTimeoutMillis: config.db.idleTimeoutMs,
    connectionTimeoutMillis: config.db.connectionTimeoutMs,
  });

  pool.on("error", (err) => {
    logger.log("error", "PG_POOL_ERROR", { message: err.message });
  });

  return pool;
}

export function createSqlDatabase(pool: pg.Pool): SqlDatabase {
  return {
    async query(text, values) {
      const result = await pool.query(text, values);
      return { rows: result.rows };
    },

    async transaction(fn) {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        const result = await fn({
          async query(text, values) {
            const res = await client.query(text, values);
            return { rows: res.rows };
          },
        });
        await client.query("COMMIT");
        return result;
      } catch (error: unknown) {
        await client.query("ROLLBACK").catch((rollbackError: unknown) => {
          logger.log("error", "PG_ROLLBACK_FAILED", {
            message:
              rollbackError instanceof Error
                ? rollbackError.message
                : String(rollbackError),
          });
        });
        throw error;
      } finally {
        client.release();
      }
    },

    async close() {
      await pool.end();
    },
  };
}
