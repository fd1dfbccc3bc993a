import type { ConnectionOptions } from "bullmq";
import { createClient } from "redis";
import { createLogger } from "./logger.js";

export type RedisClient = ReturnType<typeof createClient>;

const log = createLogger("redis");

/**
 * Connect a node-redis client. Errors after connect are logged rather than
 * crashing the process; the client reconnects on its own.
 */
export async function connectRedis(url: string): Promise<RedisClient> {
  const client = createClient({ url });
  client.on("error", (err: unknown) => {
    log.error("client error", err);
  });
  await client.connect();
  log.info("connected to", redactRedisUrl(url));
  return client;
}

/** Host and port only; never log credentials. */
export function redactRedisUrl(url: string): string {
  try {
    const u = new URL(url);
    const port = u.port || (u.protocol === "rediss:" ? "6380" : "6379");
    return `${u.protocol}//${u.hostname}:${port}`;
  } catch {
    return "<unparseable redis url>";
  }
}

/**
 * BullMQ takes ioredis-style connection options rather than a URL client.
 *
 * Workers block on Redis and must retry forever. A producer sits on a
 * request path, so its commands fail fast while Redis is down instead of
 * queueing until it returns.
 */
export function bullConnectionFromUrl(url: string, role: "worker" | "producer" = "worker"): ConnectionOptions {
  const u = new URL(url);
  const db = u.pathname.replace(/^\//, "");
  return {
    host: u.hostname || "localhost",
    port: u.port ? Number(u.port) : 6379,
    ...(u.username ? { username: decodeURIComponent(u.username) } : {}),
    ...(u.password ? { password: decodeURIComponent(u.password) } : {}),
    ...(db ? { db: Number(db) } : {}),
    ...(u.protocol === "rediss:" ? { tls: {} } : {}),
    ...(role === "producer"
      ? { enableOfflineQueue: false, maxRetriesPerRequest: 1, connectTimeout: 5_000 }
      : { maxRetriesPerRequest: null }),
  };
}
