import { Pool, type PoolClient } from "pg";
import { createLogger } from "../logger.js";

const log = createLogger("db");

export interface SqlResult<R> {
  rows: R[];
  rowCount: number | null;
}

/** One checked-out connection. Never shared between concurrent jobs. */
export interface SqlClient {
  query<R>(text: string, values?: unknown[]): Promise<SqlResult<R>>;
  release(): void;
}

export interface SqlPool {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

function wrapClient(client: PoolClient): SqlClient {
  return {
    async query<R>(text: string, values: unknown[] = []): Promise<SqlResult<R>> {
      const res = await client.query(text, values);
      return { rows: res.rows, rowCount: res.rowCount };
    },
    release() {
      client.release();
    },
  };
}

export function createPgPool(connectionString: string, max = 10): SqlPool {
  const pool = new Pool({ connectionString, max });

  pool.on("error", (err) => {
    log.error("Unexpected PG pool error", err);
  });

  return {
    async connect() {
      return wrapClient(await pool.connect());
    },
    end() {
      return pool.end();
    },
  };
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client. Any error rolls the
 * transaction back and is rethrown; the client is released on every path.
 */
export async function withTransaction<T>(
  pool: SqlPool,
  fn: (client: SqlClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      log.error("rollback failed", rollbackErr);
    }
    throw err;
  } finally {
    client.release();
  }
}

/** Single statement on a pooled client, outside any explicit transaction. */
export async function queryOnce<R>(
  pool: SqlPool,
  text: string,
  values: unknown[] = []
): Promise<SqlResult<R>> {
  const client = await pool.connect();
  try {
    return await client.query<R>(text, values);
  } finally {
    client.release();
  }
}
