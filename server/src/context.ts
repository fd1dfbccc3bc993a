import type { AppConfig } from "@pdfshrink/shared/config.js";
import {
  CompressionInvoker,
  resolveGhostscriptCommand,
  type CommandRunner,
} from "@pdfshrink/shared/compression/ghostscript.js";
import { ToolUnavailableError } from "@pdfshrink/shared/errors.js";
import { IdentityResolver, parseApiKeys } from "@pdfshrink/shared/identity.js";
import type { JobStore } from "@pdfshrink/shared/jobStore.js";
import { createLogger } from "@pdfshrink/shared/logger.js";
import {
  recoverySweepIntervalMs,
  startRecoveryLoop,
  type Dispatcher,
  type Invoker,
  type ProcessorDeps,
} from "@pdfshrink/shared/pipeline.js";
import type { PrincipalStore } from "@pdfshrink/shared/principals.js";
import {
  InlineDispatcher,
  QueueDispatcher,
  createCompressionQueue,
} from "@pdfshrink/shared/queue.js";
import {
  MemoryCounterStore,
  RedisCounterStore,
  createDisabledRateLimiter,
  createEnforcingRateLimiter,
  type CounterStore,
  type RateLimiter,
} from "@pdfshrink/shared/rateLimiter.js";
import { connectRedis, type RedisClient } from "@pdfshrink/shared/redisClient.js";
import { openStores } from "@pdfshrink/shared/stores.js";

const log = createLogger("context");

/** Rate-limit scope of the submission route. */
export const COMPRESS_SCOPE = "compress";

export interface AppContext {
  config: AppConfig;
  jobs: JobStore;
  principals: PrincipalStore;
  identity: IdentityResolver;
  limiter: RateLimiter;
  /** Ghostscript command in use, or null when none was configured or found. */
  toolCommand: string | null;
  dispatcher: Dispatcher;
  close(): Promise<void>;
}

export interface ContextOverrides {
  /** Replaces process spawning; tests plug a stub in here. */
  runner?: CommandRunner;
  /** Replaces the dispatcher built from DISPATCH_MODE. */
  dispatcher?: (deps: ProcessorDeps) => Dispatcher;
  env?: NodeJS.ProcessEnv;
}

/**
 * Wire the stores, gates and dispatcher described by `config`. Without
 * DATABASE_URL everything lives in this process.
 */
export async function buildContext(config: AppConfig, overrides: ContextOverrides = {}): Promise<AppContext> {
  const closers: Array<() => Promise<void>> = [];

  const { jobs, principals, close: closeStores } = openStores(config);
  closers.push(closeStores);

  // A shared database outlives this process; sweep jobs a crashed server left running.
  if (config.databaseUrl) {
    const recovery = startRecoveryLoop(jobs, config.staleJobMs, recoverySweepIntervalMs(config.staleJobMs));
    closers.push(async () => recovery.stop());
  }

  let limiter: RateLimiter;
  if (!config.rateLimitEnabled) {
    limiter = createDisabledRateLimiter();
  } else {
    let counters: CounterStore;
    if (config.rateLimitStorageUri.startsWith("memory://")) {
      counters = new MemoryCounterStore();
    } else {
      const client: RedisClient = await connectRedis(config.rateLimitStorageUri);
      closers.push(async () => {
        await client.quit();
      });
      counters = new RedisCounterStore(client, `${config.rateLimitKeyPrefix}:*`);
    }
    limiter = createEnforcingRateLimiter({
      prefix: config.rateLimitKeyPrefix,
      store: counters,
      quotas: { [COMPRESS_SCOPE]: config.compressRateLimit },
    });
  }

  const toolCommand = await resolveGhostscriptCommand(config.ghostscriptCommand, overrides.env);
  if (!toolCommand && config.dispatchMode === "inline") {
    log.warn("Ghostscript not found on PATH; compression requests will be refused");
  }
  const invoker: Invoker = toolCommand
    ? new CompressionInvoker({
        executable: toolCommand,
        runner: overrides.runner,
        timeoutMs: config.toolTimeoutMs,
      })
    : {
        async invoke() {
          throw new ToolUnavailableError();
        },
      };

  const processorDeps: ProcessorDeps = {
    store: jobs,
    invoker,
    maxContentLength: config.maxContentLength,
    staleJobMs: config.staleJobMs,
  };

  let dispatcher: Dispatcher;
  if (overrides.dispatcher) {
    dispatcher = overrides.dispatcher(processorDeps);
  } else if (config.dispatchMode === "queue") {
    dispatcher = new QueueDispatcher(createCompressionQueue(config.queueName, config.redisUrl));
  } else {
    dispatcher = new InlineDispatcher(processorDeps);
  }
  closers.push(() => dispatcher.close());

  return {
    config,
    jobs,
    principals,
    identity: new IdentityResolver(principals, parseApiKeys(config.apiKeys)),
    limiter,
    toolCommand,
    dispatcher,
    async close() {
      for (const close of [...closers].reverse()) {
        await close();
      }
    },
  };
}
