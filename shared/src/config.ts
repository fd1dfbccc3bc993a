import path from "node:path";
import dotenv from "dotenv";
import { parseQuota } from "./rateLimiter.js";

dotenv.config();

export type DispatchMode = "inline" | "queue";

export interface AppConfig {
  nodeEnv: string;
  port: number;
  host: string;
  publicOrigin: string[];
  databaseUrl: string | null;
  redisUrl: string;
  dispatchMode: DispatchMode;
  queueName: string;
  workerConcurrency: number;
  uploadFolder: string;
  compressedFolder: string;
  maxContentLength: number;
  compressRateLimit: string;
  rateLimitEnabled: boolean;
  rateLimitStorageUri: string;
  rateLimitKeyPrefix: string;
  apiKeys: string | null;
  ghostscriptCommand: string | null;
  toolTimeoutMs: number;
  staleJobMs: number;
  appVersion: string;
  buildCommit: string | null;
  buildTime: string | null;
}

export const DEFAULT_MAX_CONTENT_LENGTH = 100 * 1024 * 1024;
export const DEFAULT_COMPRESS_RATE_LIMIT = "10 per minute";
export const DEFAULT_QUEUE_NAME = "pdf-compress";

export function getEnvBoolean(
  key: string,
  defaultValue = false,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  const raw = env[key];
  if (raw === undefined || raw === null || raw === "") {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;

  return defaultValue;
}

function optional(env: NodeJS.ProcessEnv, key: string): string | null {
  const raw = env[key]?.trim();
  return raw ? raw : null;
}

/**
 * Build the typed configuration from an environment map. Every problem is
 * collected first so a bad deployment reports all of them at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const issues: string[] = [];

  const int = (key: string, fallback: number, min: number): number => {
    const raw = optional(env, key);
    if (raw === null) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      issues.push(`${key} must be an integer >= ${min} (got "${raw}")`);
      return fallback;
    }
    return value;
  };

  const nodeEnv = optional(env, "NODE_ENV") ?? "development";
  const port = int("PORT", 5000, 0);
  const maxContentLength = int("MAX_CONTENT_LENGTH", DEFAULT_MAX_CONTENT_LENGTH, 1);
  const workerConcurrency = int("WORKER_CONCURRENCY", 2, 1);
  const toolTimeoutMs = int("TOOL_TIMEOUT_MS", 120_000, 1);
  const staleJobMs = int("STALE_JOB_MS", 600_000, 1_000);
  // Nothing touches a running job while the tool works, so a live job must finish before it looks stale.
  if (staleJobMs <= toolTimeoutMs) {
    issues.push(`STALE_JOB_MS (${staleJobMs}) must be greater than TOOL_TIMEOUT_MS (${toolTimeoutMs})`);
  }

  const dispatchRaw = (optional(env, "DISPATCH_MODE") ?? "inline").toLowerCase();
  let dispatchMode: DispatchMode = "inline";
  if (dispatchRaw === "inline" || dispatchRaw === "queue") {
    dispatchMode = dispatchRaw;
  } else {
    issues.push(`DISPATCH_MODE must be "inline" or "queue" (got "${dispatchRaw}")`);
  }

  const compressRateLimit = optional(env, "COMPRESS_RATE_LIMIT") ?? DEFAULT_COMPRESS_RATE_LIMIT;
  try {
    parseQuota(compressRateLimit);
  } catch (err) {
    issues.push(`COMPRESS_RATE_LIMIT: ${err instanceof Error ? err.message : String(err)}`);
  }

  const rateLimitStorageUri = optional(env, "RATELIMIT_STORAGE_URI") ?? "memory://";
  if (!/^(memory|rediss?):\/\//.test(rateLimitStorageUri)) {
    issues.push(`RATELIMIT_STORAGE_URI must start with memory://, redis:// or rediss://`);
  }

  const databaseUrl = optional(env, "DATABASE_URL");
  if (dispatchMode === "queue" && !databaseUrl) {
    issues.push("DISPATCH_MODE=queue requires DATABASE_URL so the worker can see submitted jobs");
  }

  if (issues.length) {
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  const cwd = process.cwd();

  return {
    nodeEnv,
    port,
    host: optional(env, "HOST") ?? (nodeEnv === "production" ? "0.0.0.0" : "127.0.0.1"),
    publicOrigin: optional(env, "PUBLIC_ORIGIN")
      ? (env.PUBLIC_ORIGIN ?? "").split(",").map((v) => v.trim()).filter(Boolean)
      : ["http://localhost:5173", "http://localhost:5000"],
    databaseUrl,
    redisUrl: optional(env, "REDIS_URL") ?? "redis://localhost:6379",
    dispatchMode,
    queueName: optional(env, "COMPRESSION_QUEUE_NAME") ?? DEFAULT_QUEUE_NAME,
    workerConcurrency,
    uploadFolder: path.resolve(cwd, optional(env, "UPLOAD_FOLDER") ?? "uploads"),
    compressedFolder: path.resolve(cwd, optional(env, "COMPRESSED_FOLDER") ?? "compressed"),
    maxContentLength,
    compressRateLimit,
    rateLimitEnabled: getEnvBoolean("RATELIMIT_ENABLED", true, env),
    rateLimitStorageUri,
    rateLimitKeyPrefix: optional(env, "RATELIMIT_KEY_PREFIX") ?? "pdf-compress",
    apiKeys: optional(env, "API_KEYS"),
    ghostscriptCommand: optional(env, "GHOSTSCRIPT_COMMAND"),
    toolTimeoutMs,
    staleJobMs,
    appVersion: optional(env, "APP_VERSION") ?? "1.0.0",
    buildCommit: optional(env, "APP_COMMIT"),
    buildTime: optional(env, "APP_BUILD_TIME"),
  };
}
