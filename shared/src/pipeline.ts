import * as fs from "node:fs/promises";
import { isCompressionProfile } from "./compression/profiles.js";
import { hasPdfSignature, readFileHead } from "./compression/pdfInput.js";
import type { InvokeRequest, InvokeResult } from "./compression/ghostscript.js";
import {
  IllegalTransitionError,
  PayloadTooLargeError,
  StorageError,
  UnsupportedMediaError,
  ValidationError,
  describeError,
  jobErrorCodeFor,
} from "./errors.js";
import type { JobStore } from "./jobStore.js";
import { createLogger, type Logger } from "./logger.js";
import { allocateTempFiles, restoreTempFiles, type TempFilePair, type TempFolders } from "./tempFiles.js";
import type { CompressionJob, CompressionJobPayload, JobId, NewJobInput } from "./types.js";

export interface Invoker {
  invoke(req: InvokeRequest): Promise<InvokeResult>;
}

export interface ProcessorDeps {
  store: JobStore;
  invoker: Invoker;
  maxContentLength: number;
  /** A running job whose record has not moved for this long is presumed orphaned. */
  staleJobMs: number;
  now?: () => Date;
  logger?: Logger;
}

export type ProcessOutcome =
  | {
      kind: "completed";
      job: CompressionJob;
      bytesIn: number;
      bytesOut: number;
      /** Compressed bytes, present only when requested with `readOutput`. */
      output: Buffer | null;
    }
  | { kind: "failed"; job: CompressionJob | null; error: unknown }
  | { kind: "skipped"; job: CompressionJob };

export interface ProcessOptions {
  readOutput?: boolean;
}

const INTERRUPTED_MESSAGE = "The worker processing this job stopped before it finished.";

function isStale(job: CompressionJob, staleJobMs: number, now: Date): boolean {
  return now.getTime() - Date.parse(job.updatedAt) > staleJobMs;
}

/**
 * Re-check the persisted upload before any work is spent on it. Throws the
 * same typed errors the submission route raises.
 */
export async function validateStoredInput(
  payload: CompressionJobPayload,
  maxContentLength: number
): Promise<void> {
  if (!isCompressionProfile(payload.profile)) {
    throw new ValidationError("invalid_profile", "Profile must be one of: low, medium, high.");
  }
  const head = await readFileHead(payload.inputPath);
  if (head === null) {
    throw new StorageError(`input file ${payload.inputPath} is missing`);
  }
  if (!hasPdfSignature(head)) {
    throw new UnsupportedMediaError();
  }
  const { size } = await fs.stat(payload.inputPath);
  if (size > maxContentLength) {
    throw new PayloadTooLargeError(maxContentLength);
  }
}

/**
 * Drive one job from queued to a terminal state.
 *
 * Safe to call more than once for the same payload (queue redelivery, two
 * workers): only the caller that wins `claim` runs the tool, the others get
 * `skipped`. Temp files are released on every path except `skipped` while
 * another execution still owns them.
 */
export async function processCompressionJob(
  deps: ProcessorDeps,
  payload: CompressionJobPayload,
  options: ProcessOptions = {}
): Promise<ProcessOutcome> {
  const log = deps.logger ?? createLogger("processor");
  const now = deps.now ?? (() => new Date());
  const files = restoreTempFiles(payload.inputPath, payload.outputPath);
  const { jobId } = payload;

  let releaseFiles = true;
  let claimedHere = false;
  try {
    let job = await deps.store.get(jobId);

    if (job.status === "queued") {
      const rejection = await validateStoredInput(payload, deps.maxContentLength).then(
        () => null,
        (err: unknown) => err
      );
      if (rejection === null) {
        const claimed = await deps.store.claim(jobId);
        if (claimed) {
          claimedHere = true;
          log.info(`job ${jobId} running (profile=${claimed.profile}, preserve_images=${claimed.preserveImages})`);
          return await execute(deps, log, claimed, payload, files.outputPath, options);
        }
      } else {
        const rejected = await rejectQueued(deps.store, jobId, rejection);
        if (rejected) {
          log.warn(`job ${jobId} rejected before execution:`, describeError(rejection));
          return { kind: "failed", job: rejected, error: rejection };
        }
      }
      // Lost a race with another execution; judge by what it left behind.
      job = await deps.store.get(jobId);
    }

    if (job.status === "running") {
      if (isStale(job, deps.staleJobMs, now())) {
        log.warn(`job ${jobId} has been running since ${job.updatedAt}; marking interrupted`);
        return await failJob(deps.store, log, jobId, new Error(INTERRUPTED_MESSAGE), "worker_interrupted");
      }
      releaseFiles = false;
      log.info(`job ${jobId} is already running elsewhere; skipping`);
      return { kind: "skipped", job };
    }

    log.info(`job ${jobId} already ${job.status}; skipping`);
    return { kind: "skipped", job };
  } catch (err) {
    log.error(`job ${jobId} could not be processed:`, describeError(err));
    if (claimedHere) {
      // This call moved the job to running; nobody else will finish it.
      try {
        return await failJob(deps.store, log, jobId, err, "internal_error");
      } catch (failErr) {
        log.error(`job ${jobId} left running; the recovery sweep will fail it:`, describeError(failErr));
      }
    }
    return { kind: "failed", job: null, error: err };
  } finally {
    if (releaseFiles) await files.release();
  }
}

async function execute(
  deps: ProcessorDeps,
  log: Logger,
  job: CompressionJob,
  payload: CompressionJobPayload,
  outputPath: string,
  options: ProcessOptions
): Promise<ProcessOutcome> {
  let result: InvokeResult;
  try {
    result = await deps.invoker.invoke({
      jobId: job.id,
      inputPath: payload.inputPath,
      outputPath,
      profile: job.profile,
      preserveImages: job.preserveImages,
    });
  } catch (err) {
    log.error(`job ${job.id} failed:`, describeError(err));
    return failJob(deps.store, log, job.id, err);
  }

  let output: Buffer | null = null;
  try {
    if (options.readOutput) output = await fs.readFile(outputPath);
  } catch (err) {
    return failJob(deps.store, log, job.id, new StorageError(`could not read output: ${describeError(err)}`));
  }

  try {
    const completed = await deps.store.transition(job.id, "completed", {
      compressedSizeBytes: result.bytesOut,
    });
    log.info(`job ${job.id} completed: ${result.bytesIn} -> ${result.bytesOut} bytes`);
    return { kind: "completed", job: completed, bytesIn: result.bytesIn, bytesOut: result.bytesOut, output };
  } catch (err) {
    if (err instanceof IllegalTransitionError) {
      log.error(err.message);
      return { kind: "failed", job: null, error: err };
    }
    throw err;
  }
}

/** queued -> failed; null when the job already left queued. */
async function rejectQueued(store: JobStore, jobId: JobId, cause: unknown): Promise<CompressionJob | null> {
  try {
    return await store.transition(jobId, "failed", {
      errorCode: jobErrorCodeFor(cause),
      errorMessage: describeError(cause),
    });
  } catch (err) {
    if (err instanceof IllegalTransitionError) return null;
    throw err;
  }
}

/**
 * Record a failure on the job. An illegal transition here (the job already
 * reached a terminal state) is logged and reported, never rethrown.
 */
async function failJob(
  store: JobStore,
  log: Logger,
  jobId: JobId,
  cause: unknown,
  code = jobErrorCodeFor(cause)
): Promise<ProcessOutcome> {
  const message = describeError(cause);
  try {
    const job = await store.transition(jobId, "failed", { errorCode: code, errorMessage: message });
    return { kind: "failed", job, error: cause };
  } catch (err) {
    if (err instanceof IllegalTransitionError) {
      log.error(err.message);
      return { kind: "failed", job: null, error: err };
    }
    throw err;
  }
}

/**
 * Fail every running job whose record has not moved within `staleJobMs`.
 * Returns the number of jobs swept.
 */
export async function recoverInterruptedJobs(
  store: JobStore,
  staleJobMs: number,
  now: Date = new Date(),
  log: Logger = createLogger("recovery")
): Promise<number> {
  const cutoff = new Date(now.getTime() - staleJobMs);
  const stale = await store.findStale("running", cutoff);
  let swept = 0;
  for (const job of stale) {
    try {
      await store.transition(job.id, "failed", {
        errorCode: "worker_interrupted",
        errorMessage: INTERRUPTED_MESSAGE,
      });
      swept++;
    } catch (err) {
      if (!(err instanceof IllegalTransitionError)) throw err;
      // Finished between the scan and the update.
      log.debug(err.message);
    }
  }
  if (swept) log.warn(`marked ${swept} interrupted job(s) as failed`);
  return swept;
}

/** How often to sweep for a given stale threshold: twice per window, at most every 10 s. */
export function recoverySweepIntervalMs(staleJobMs: number): number {
  return Math.max(10_000, Math.floor(staleJobMs / 2));
}

export interface RecoveryLoop {
  stop(): void;
}

/**
 * Sweep orphaned running jobs now and then every `intervalMs`. A failed
 * sweep is logged and retried on the next tick.
 */
export function startRecoveryLoop(
  store: JobStore,
  staleJobMs: number,
  intervalMs: number,
  logger: Logger = createLogger("recovery")
): RecoveryLoop {
  let running = false;
  const sweep = async () => {
    if (running) return;
    running = true;
    try {
      await recoverInterruptedJobs(store, staleJobMs, new Date(), logger);
    } catch (err) {
      logger.error("stale job sweep failed:", describeError(err));
    } finally {
      running = false;
    }
  };

  void sweep();
  const timer = setInterval(() => void sweep(), intervalMs);
  timer.unref();
  return {
    stop() {
      clearInterval(timer);
    },
  };
}

export interface Dispatcher {
  readonly mode: "inline" | "queue";
  dispatch(payload: CompressionJobPayload): Promise<DispatchResult>;
  close(): Promise<void>;
}

export type DispatchResult =
  | { mode: "inline"; outcome: ProcessOutcome }
  | { mode: "queue"; queueJobId: string };

export interface SubmitDeps {
  store: JobStore;
  dispatcher: Dispatcher;
  folders: TempFolders;
  logger?: Logger;
}

export interface Submission extends NewJobInput {
  content: Buffer;
  requestId: string;
}

export interface SubmitResult {
  job: CompressionJob;
  dispatch: DispatchResult;
}

/**
 * Create the job record, persist the upload and hand the job to the
 * dispatcher. Failures after the record exists move it queued -> failed
 * and release the temp files before the error is rethrown.
 */
export async function submitCompressionJob(deps: SubmitDeps, submission: Submission): Promise<SubmitResult> {
  const log = deps.logger ?? createLogger("submit");
  const { content, requestId, ...input } = submission;
  const job = await deps.store.create(input);
  log.info(`job ${job.id} queued for principal ${job.principalId} (${job.originalSizeBytes} bytes)`);

  let files: TempFilePair | undefined;
  try {
    files = await allocateTempFiles(deps.folders);
    await fs.writeFile(files.inputPath, content);
  } catch (err) {
    const storageError = new StorageError(`could not persist upload: ${describeError(err)}`);
    await files?.release();
    await failJob(deps.store, log, job.id, storageError);
    throw storageError;
  }

  const payload: CompressionJobPayload = {
    jobId: job.id,
    inputPath: files.inputPath,
    outputPath: files.outputPath,
    profile: job.profile,
    preserveImages: job.preserveImages,
    requestId,
    enqueuedAt: new Date().toISOString(),
  };

  let dispatch: DispatchResult;
  try {
    dispatch = await deps.dispatcher.dispatch(payload);
  } catch (err) {
    log.error(`job ${job.id} could not be dispatched:`, describeError(err));
    await files.release();
    await failJob(deps.store, log, job.id, err, "dispatch_error");
    throw err;
  }

  const latest = dispatch.mode === "inline" && dispatch.outcome.job ? dispatch.outcome.job : job;
  return { job: latest, dispatch };
}
