import type { RedisClient } from "./redisClient.js";

export interface Quota {
  limit: number;
  windowMs: number;
  raw: string;
}

const UNIT_MS: Record<string, number> = {
  second: 1000,
  minute: 60 * 1000,
  hour: 60 * 60 * 1000,
  day: 24 * 60 * 60 * 1000,
};

/**
 * Parse a quota such as "10 per minute", "100 per 15 minutes" or "5/hour".
 */
export function parseQuota(raw: string): Quota {
  const match = /^\s*(\d+)\s*(?:per|\/)\s*(\d+)?\s*(second|minute|hour|day)s?\s*$/i.exec(raw);
  if (!match) {
    throw new Error(`unrecognised quota "${raw}" (expected e.g. "10 per minute")`);
  }
  const limit = Number(match[1]);
  const multiplier = match[2] ? Number(match[2]) : 1;
  if (limit < 1 || multiplier < 1) {
    throw new Error(`quota "${raw}" must allow at least one request per window`);
  }
  return { limit, windowMs: multiplier * UNIT_MS[match[3].toLowerCase()], raw };
}

export function rateLimitKey(prefix: string, scope: string, address: string): string {
  return `${prefix}:${scope}:${address}`;
}

export interface WindowCount {
  count: number;
  resetAt: number;
}

/**
 * Backing store for fixed-window counters. `hit` must be atomic for callers
 * sharing a key.
 */
export interface CounterStore {
  hit(key: string, windowMs: number): Promise<WindowCount>;
  reset(): Promise<void>;
}

const DEFAULT_MAX_ENTRIES = 10_000;

export class MemoryCounterStore implements CounterStore {
  private readonly counters = new Map<string, WindowCount>();
  private nextPurgeAt = 0;

  constructor(
    private readonly now: () => number = Date.now,
    private readonly maxEntries = DEFAULT_MAX_ENTRIES
  ) {}

  async hit(key: string, windowMs: number): Promise<WindowCount> {
    // No await between read and write: concurrent callers cannot interleave.
    const now = this.now();
    this.purgeExpired(now, windowMs);

    const existing = this.counters.get(key);
    if (!existing || existing.resetAt <= now) {
      if (!existing && this.counters.size >= this.maxEntries) {
        this.evictOldest();
      }
      const fresh = { count: 1, resetAt: now + windowMs };
      this.counters.set(key, fresh);
      return { ...fresh };
    }

    existing.count += 1;
    return { ...existing };
  }

  async reset(): Promise<void> {
    this.counters.clear();
    this.nextPurgeAt = 0;
  }

  get size(): number {
    return this.counters.size;
  }

  private purgeExpired(now: number, windowMs: number) {
    if (now < this.nextPurgeAt) return;
    for (const [key, entry] of this.counters) {
      if (entry.resetAt <= now) this.counters.delete(key);
    }
    this.nextPurgeAt = now + Math.min(windowMs, 60_000);
  }

  private evictOldest() {
    let oldestKey: string | undefined;
    let oldestResetAt = Number.POSITIVE_INFINITY;
    for (const [key, entry] of this.counters) {
      if (entry.resetAt < oldestResetAt) {
        oldestResetAt = entry.resetAt;
        oldestKey = key;
      }
    }
    if (oldestKey !== undefined) this.counters.delete(oldestKey);
  }
}

// INCR and PEXPIRE in one round trip so the window starts exactly once.
const HIT_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
end
return { count, redis.call('PTTL', KEYS[1]) }
`;

export class RedisCounterStore implements CounterStore {
  constructor(
    private readonly client: RedisClient,
    private readonly keyPattern: string,
    private readonly now: () => number = Date.now
  ) {}

  async hit(key: string, windowMs: number): Promise<WindowCount> {
    const reply = await this.client.eval(HIT_SCRIPT, {
      keys: [key],
      arguments: [String(windowMs)],
    });
    if (!Array.isArray(reply)) {
      throw new Error(`unexpected rate-limit reply for ${key}`);
    }
    const [count, pttl] = reply;
    if (typeof count !== "number" || typeof pttl !== "number") {
      throw new Error(`unexpected rate-limit reply for ${key}`);
    }
    return { count, resetAt: this.now() + (pttl > 0 ? pttl : windowMs) };
  }

  async reset(): Promise<void> {
    for await (const key of this.client.scanIterator({ MATCH: this.keyPattern })) {
      await this.client.del(key);
    }
  }
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAt: number;
  retryAfterSeconds: number;
}

interface RateLimiterCapabilities {
  allow(scope: string, address: string): Promise<RateLimitDecision>;
  /** Forget every counter. Used between tests. */
  reset(): Promise<void>;
}

export interface EnforcingRateLimiter extends RateLimiterCapabilities {
  readonly kind: "enforcing";
  readonly prefix: string;
  readonly quotas: Readonly<Record<string, Quota>>;
}

export interface DisabledRateLimiter extends RateLimiterCapabilities {
  readonly kind: "disabled";
}

export type RateLimiter = EnforcingRateLimiter | DisabledRateLimiter;

const UNLIMITED: RateLimitDecision = {
  allowed: true,
  limit: Number.POSITIVE_INFINITY,
  remaining: Number.POSITIVE_INFINITY,
  resetAt: 0,
  retryAfterSeconds: 0,
};

export function createEnforcingRateLimiter(options: {
  prefix: string;
  store: CounterStore;
  quotas: Record<string, string>;
  now?: () => number;
}): EnforcingRateLimiter {
  const now = options.now ?? Date.now;
  const quotas: Record<string, Quota> = {};
  for (const [scope, raw] of Object.entries(options.quotas)) {
    quotas[scope] = parseQuota(raw);
  }

  return {
    kind: "enforcing",
    prefix: options.prefix,
    quotas,
    async allow(scope, address) {
      const quota = quotas[scope];
      if (!quota) return UNLIMITED;

      const { count, resetAt } = await options.store.hit(
        rateLimitKey(options.prefix, scope, address),
        quota.windowMs
      );
      const allowed = count <= quota.limit;
      return {
        allowed,
        limit: quota.limit,
        remaining: Math.max(0, quota.limit - count),
        resetAt,
        retryAfterSeconds: allowed ? 0 : Math.max(1, Math.ceil((resetAt - now()) / 1000)),
      };
    },
    reset() {
      return options.store.reset();
    },
  };
}

export function createDisabledRateLimiter(): DisabledRateLimiter {
  return {
    kind: "disabled",
    async allow() {
      return UNLIMITED;
    },
    async reset() {},
  };
}
