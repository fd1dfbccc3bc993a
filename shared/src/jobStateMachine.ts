import { IllegalTransitionError } from "./errors.js";
import type { CompressionJob, JobStatus, TerminalJobStatus, TransitionPatch } from "./types.js";

// queued -> running -> completed | failed, plus queued -> failed when a job
// is rejected before execution. Terminal states have no exits.
const ALLOWED: Record<JobStatus, readonly JobStatus[]> = {
  queued: ["running", "failed"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

export const JOB_STATUSES: readonly JobStatus[] = ["queued", "running", "completed", "failed"];

export function isJobStatus(value: string): value is JobStatus {
  return (JOB_STATUSES as readonly string[]).includes(value);
}

export function isTerminal(status: JobStatus): status is TerminalJobStatus {
  return status === "completed" || status === "failed";
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED[from].includes(to);
}

/**
 * Compute the record that results from moving `job` to `to`.
 *
 * Owns every field the state machine governs: status, completion timestamp,
 * compressed size and error fields. Stores persist the returned value as is.
 */
export function applyTransition(
  job: CompressionJob,
  to: JobStatus,
  patch: TransitionPatch,
  now: Date = new Date()
): CompressionJob {
  if (!canTransition(job.status, to)) {
    throw new IllegalTransitionError(job.id, job.status, to);
  }

  const stamp = now.toISOString();
  const next: CompressionJob = { ...job, status: to, updatedAt: stamp };

  if (to === "completed") {
    const size = patch.compressedSizeBytes;
    if (size === undefined || !Number.isInteger(size) || size < 0) {
      throw new RangeError(`completed job ${job.id} needs a non-negative compressed size`);
    }
    next.compressedSizeBytes = size;
    next.errorCode = null;
    next.errorMessage = null;
  } else if (to === "failed") {
    next.compressedSizeBytes = null;
    next.errorCode = patch.errorCode ?? "internal_error";
    next.errorMessage = patch.errorMessage?.trim() || "Job failed without a diagnostic.";
  }

  next.completedAt = isTerminal(to) ? stamp : null;
  return next;
}
