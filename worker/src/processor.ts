import type { Job } from "bullmq";
import { isCompressionProfile } from "@pdfshrink/shared/compression/profiles.js";
import { describeError } from "@pdfshrink/shared/errors.js";
import { createLogger } from "@pdfshrink/shared/logger.js";
import { processCompressionJob, type ProcessorDeps } from "@pdfshrink/shared/pipeline.js";
import type { CompressionJobPayload, JobStatus } from "@pdfshrink/shared/types.js";

const log = createLogger("worker");

export interface HandlerResult {
  jobId: string;
  status: JobStatus;
  compressedSizeBytes: number | null;
  skipped: boolean;
}

/**
 * Check a queue message before trusting it. Messages come from Redis and may
 * have been written by an older server build.
 */
export function parsePayload(data: unknown): CompressionJobPayload {
  if (typeof data !== "object" || data === null) {
    throw new Error("compression payload is not an object");
  }
  const get = (key: string): unknown => Reflect.get(data, key);

  const jobId = get("jobId");
  const inputPath = get("inputPath");
  const outputPath = get("outputPath");
  const profile = get("profile");
  const preserveImages = get("preserveImages");
  const requestId = get("requestId");
  const enqueuedAt = get("enqueuedAt");

  if (typeof jobId !== "string" || !jobId) throw new Error("compression payload has no jobId");
  if (typeof inputPath !== "string" || typeof outputPath !== "string") {
    throw new Error(`compression payload for ${jobId} is missing file paths`);
  }
  if (typeof profile !== "string" || !isCompressionProfile(profile)) {
    throw new Error(`compression payload for ${jobId} has unknown profile "${String(profile)}"`);
  }

  return {
    jobId,
    inputPath,
    outputPath,
    profile,
    preserveImages: preserveImages === true,
    requestId: typeof requestId === "string" ? requestId : "unknown",
    enqueuedAt: typeof enqueuedAt === "string" ? enqueuedAt : new Date(0).toISOString(),
  };
}

/**
 * BullMQ processor. A failed outcome is rethrown so the queue records the
 * failure too; the job row already holds the diagnostic.
 */
export function createJobHandler(deps: ProcessorDeps) {
  return async (job: Pick<Job, "id" | "data">): Promise<HandlerResult> => {
    const payload = parsePayload(job.data);
    log.info(`picked up queue job ${job.id} for job ${payload.jobId} (request ${payload.requestId})`);

    const outcome = await processCompressionJob(deps, payload);
    switch (outcome.kind) {
      case "completed":
        return {
          jobId: payload.jobId,
          status: outcome.job.status,
          compressedSizeBytes: outcome.job.compressedSizeBytes,
          skipped: false,
        };
      case "skipped":
        return {
          jobId: payload.jobId,
          status: outcome.job.status,
          compressedSizeBytes: outcome.job.compressedSizeBytes,
          skipped: true,
        };
      case "failed":
        throw new Error(`job ${payload.jobId} failed: ${describeError(outcome.error)}`);
    }
  };
}
