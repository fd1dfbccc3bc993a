import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "@pdfshrink/shared/config.js";
import { createPgPool, queryOnce, withTransaction, type SqlPool } from "@pdfshrink/shared/db/index.js";
import { createLogger } from "@pdfshrink/shared/logger.js";

const log = createLogger("migrate");

export const MIGRATIONS_DIR = path.join(__dirname, "migrations");

async function ensureSchemaTable(pool: SqlPool) {
  await queryOnce(
    pool,
    `CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename TEXT NOT NULL UNIQUE,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`
  );
}

async function getApplied(pool: SqlPool): Promise<Set<string>> {
  const res = await queryOnce<{ filename: string }>(pool, "SELECT filename FROM schema_migrations");
  return new Set(res.rows.map((r) => r.filename));
}

/** Apply every pending .sql file in name order, each in its own transaction. */
export async function runMigrations(pool: SqlPool, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await ensureSchemaTable(pool);
  const applied = await getApplied(pool);
  const files = (await fs.promises.readdir(dir)).filter((f) => f.endsWith(".sql")).sort();

  const ran: string[] = [];
  for (const file of files) {
    if (applied.has(file)) continue;
    const sql = await fs.promises.readFile(path.join(dir, file), "utf8");
    log.info(`applying ${file}`);
    await withTransaction(pool, async (client) => {
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations(filename) VALUES ($1)", [file]);
    });
    ran.push(file);
  }
  return ran;
}

async function main() {
  const { databaseUrl } = loadConfig();
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required to run migrations");
  }
  const pool = createPgPool(databaseUrl, 1);
  try {
    const ran = await runMigrations(pool);
    log.info(ran.length ? `done (${ran.join(", ")})` : "done (nothing to apply)");
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((err) => {
    log.error("fatal", err);
    process.exit(1);
  });
}
