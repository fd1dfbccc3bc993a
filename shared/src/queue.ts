import { Queue, type JobsOptions } from "bullmq";
import { DispatchError, describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import {
  processCompressionJob,
  type Dispatcher,
  type DispatchResult,
  type ProcessorDeps,
} from "./pipeline.js";
import { bullConnectionFromUrl } from "./redisClient.js";
import type { CompressionJobPayload } from "./types.js";

export const COMPRESS_JOB_NAME = "compress";

const log = createLogger("queue");

/** Runs the job on the calling request and hands back the compressed bytes. */
export class InlineDispatcher implements Dispatcher {
  readonly mode = "inline";

  constructor(private readonly deps: ProcessorDeps) {}

  async dispatch(payload: CompressionJobPayload): Promise<DispatchResult> {
    const outcome = await processCompressionJob(this.deps, payload, { readOutput: true });
    return { mode: "inline", outcome };
  }

  async close(): Promise<void> {}
}

/** The slice of a BullMQ queue the dispatcher needs. */
export interface PayloadQueue {
  add(name: string, data: CompressionJobPayload, opts?: JobsOptions): Promise<{ id?: string }>;
  close(): Promise<void>;
}

export function createCompressionQueue(queueName: string, redisUrl: string): Queue<CompressionJobPayload> {
  return new Queue<CompressionJobPayload>(queueName, {
    connection: bullConnectionFromUrl(redisUrl, "producer"),
    defaultJobOptions: {
      // Redelivery is handled by the processor's claim; a failed job stays failed.
      attempts: 1,
      removeOnComplete: 1000,
      removeOnFail: 5000,
    },
  });
}

export const DEFAULT_ENQUEUE_TIMEOUT_MS = 10_000;

function withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`queue did not accept the job within ${ms} ms`)), ms);
  });
  return Promise.race([work, expired]).finally(() => clearTimeout(timer));
}

/**
 * Hands jobs to background workers. The job id doubles as the BullMQ job
 * id, so adding the same job twice is a no-op on the queue side. An add
 * that neither succeeds nor fails within `enqueueTimeoutMs` counts as failed.
 */
export class QueueDispatcher implements Dispatcher {
  readonly mode = "queue";

  constructor(
    private readonly queue: PayloadQueue,
    private readonly enqueueTimeoutMs = DEFAULT_ENQUEUE_TIMEOUT_MS
  ) {}

  async dispatch(payload: CompressionJobPayload): Promise<DispatchResult> {
    try {
      const added = await withTimeout(
        this.queue.add(COMPRESS_JOB_NAME, payload, { jobId: payload.jobId }),
        this.enqueueTimeoutMs
      );
      log.info(`job ${payload.jobId} enqueued (request ${payload.requestId})`);
      return { mode: "queue", queueJobId: added.id ?? payload.jobId };
    } catch (err) {
      throw new DispatchError(`enqueue failed for job ${payload.jobId}: ${describeError(err)}`);
    }
  }

  close(): Promise<void> {
    return this.queue.close();
  }
}
