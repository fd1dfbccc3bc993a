import type { AppConfig } from "./config.js";
import { createPgPool } from "./db/index.js";
import { PgJobStore, type JobStore } from "./jobStore.js";
import { createLogger } from "./logger.js";
import { MemoryDatabase, MemoryJobStore, MemoryPrincipalStore } from "./memoryStore.js";
import { PgPrincipalStore, type PrincipalStore } from "./principals.js";

const log = createLogger("stores");

export interface Stores {
  jobs: JobStore;
  principals: PrincipalStore;
  close(): Promise<void>;
}

/** Postgres when DATABASE_URL is set, otherwise an in-process database. */
export function openStores(config: Pick<AppConfig, "databaseUrl">): Stores {
  if (config.databaseUrl) {
    const pool = createPgPool(config.databaseUrl);
    return {
      jobs: new PgJobStore(pool),
      principals: new PgPrincipalStore(pool),
      close: () => pool.end(),
    };
  }

  log.warn("DATABASE_URL not set; jobs are kept in memory and lost on restart");
  const db = new MemoryDatabase();
  return {
    jobs: new MemoryJobStore(db),
    principals: new MemoryPrincipalStore(db),
    close: async () => {},
  };
}
