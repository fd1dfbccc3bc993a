import { Worker } from "bullmq";
import { CompressionInvoker, resolveGhostscriptCommand } from "@pdfshrink/shared/compression/ghostscript.js";
import { loadConfig } from "@pdfshrink/shared/config.js";
import { ToolUnavailableError } from "@pdfshrink/shared/errors.js";
import { createLogger } from "@pdfshrink/shared/logger.js";
import {
  recoverySweepIntervalMs,
  startRecoveryLoop,
  type Invoker,
} from "@pdfshrink/shared/pipeline.js";
import { bullConnectionFromUrl, redactRedisUrl } from "@pdfshrink/shared/redisClient.js";
import { openStores } from "@pdfshrink/shared/stores.js";
import type { CompressionJobPayload } from "@pdfshrink/shared/types.js";
import { createJobHandler, type HandlerResult } from "./processor.js";

const log = createLogger("worker");

async function main() {
  const config = loadConfig();
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required: the worker reads jobs the server submitted");
  }
  const stores = openStores(config);

  const toolCommand = await resolveGhostscriptCommand(config.ghostscriptCommand);
  if (!toolCommand) {
    log.error("Ghostscript not found; every job will fail until it is installed");
  }
  const invoker: Invoker = toolCommand
    ? new CompressionInvoker({ executable: toolCommand, timeoutMs: config.toolTimeoutMs })
    : {
        async invoke() {
          throw new ToolUnavailableError();
        },
      };

  const recovery = startRecoveryLoop(stores.jobs, config.staleJobMs, recoverySweepIntervalMs(config.staleJobMs));

  const worker = new Worker<CompressionJobPayload, HandlerResult>(
    config.queueName,
    createJobHandler({
      store: stores.jobs,
      invoker,
      maxContentLength: config.maxContentLength,
      staleJobMs: config.staleJobMs,
    }),
    {
      connection: bullConnectionFromUrl(config.redisUrl),
      concurrency: config.workerConcurrency,
    }
  );

  worker.on("completed", (job, result) => {
    const note = result.skipped ? "skipped" : `${result.status}, ${result.compressedSizeBytes ?? 0} bytes`;
    log.info(`queue job ${job.id} done (${note})`);
  });
  worker.on("failed", (job, err) => {
    log.warn(`queue job ${job?.id ?? "?"} failed: ${err.message}`);
  });
  worker.on("error", (err) => {
    log.error("worker error", err);
  });

  await worker.waitUntilReady();
  log.info(
    `listening on queue "${config.queueName}" (redis ${redactRedisUrl(config.redisUrl)}, concurrency ${config.workerConcurrency}, tool ${toolCommand ?? "none"})`
  );

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`${signal} received; waiting for active jobs`);
    recovery.stop();
    try {
      await worker.close();
      await stores.close();
      process.exit(0);
    } catch (err) {
      log.error("shutdown failed", err);
      process.exit(1);
    }
  };
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((e) => {
  log.error("fatal startup error:", e);
  process.exit(1);
});
