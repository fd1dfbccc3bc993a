import type { JobErrorCode, JobId, JobStatus } from "./types.js";

/**
 * Base class for every failure the pipeline knows how to report.
 *
 * `code` and `status` are what callers see; `message` may carry internal
 * detail (stderr, paths) and is only ever logged. `detail` is the generic,
 * caller-safe text.
 */
export class PipelineError extends Error {
  readonly code: string;
  readonly status: number;
  readonly detail: string;

  constructor(code: string, status: number, detail: string, message?: string) {
    super(message ?? detail);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.detail = detail;
  }
}

export class ValidationError extends PipelineError {
  constructor(code: "missing_file" | "invalid_profile" | "invalid_pagination", detail: string) {
    super(code, 400, detail);
  }
}

export class UnsupportedMediaError extends PipelineError {
  constructor() {
    super("unsupported_media_type", 415, "Only PDF documents are supported for compression.");
  }
}

export class PayloadTooLargeError extends PipelineError {
  constructor(limitBytes: number) {
    super("payload_too_large", 413, `The uploaded file exceeds the ${formatMiB(limitBytes)} MiB limit.`);
  }
}

export class UnauthorizedError extends PipelineError {
  constructor(message?: string) {
    super(
      "unauthorized",
      401,
      "A valid API key must be supplied via the X-API-Key header.",
      message
    );
  }
}

export class RateLimitedError extends PipelineError {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super("rate_limited", 429, "Too many requests, please try again later.");
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class JobNotFoundError extends PipelineError {
  readonly jobId: string;

  constructor(jobId: string) {
    super("job_not_found", 404, "No compression job exists with that id.", `job ${jobId} not found`);
    this.jobId = jobId;
  }
}

export class StorageError extends PipelineError {
  constructor(message: string) {
    super("storage_error", 500, "Failed to save the uploaded file.", message);
  }
}

export class ToolUnavailableError extends PipelineError {
  constructor() {
    super(
      "tool_unavailable",
      503,
      "Ghostscript is not available on the server. Please install it and ensure it can be executed."
    );
  }
}

export class ToolNotFoundError extends PipelineError {
  readonly executable: string;

  constructor(executable: string) {
    super(
      "tool_not_found",
      500,
      "Ghostscript is not installed on the server.",
      `executable not found: ${executable}`
    );
    this.executable = executable;
  }
}

export class ExternalToolError extends PipelineError {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, exitCode: number | null, stderr: string) {
    super("tool_error", 500, "Ghostscript failed while compressing the file.", message);
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class DispatchError extends PipelineError {
  constructor(message: string) {
    super("dispatch_error", 500, "The compression job could not be scheduled.", message);
  }
}

/** Raised by the job store when the state machine forbids a move. */
export class IllegalTransitionError extends PipelineError {
  readonly jobId: JobId;
  readonly from: JobStatus;
  readonly to: JobStatus;

  constructor(jobId: JobId, from: JobStatus, to: JobStatus) {
    super(
      "internal_error",
      500,
      "An internal error occurred.",
      `illegal transition ${from} -> ${to} for job ${jobId}`
    );
    this.jobId = jobId;
    this.from = from;
    this.to = to;
  }
}

export class DuplicateExecutionError extends PipelineError {
  constructor(jobId: JobId) {
    super("internal_error", 500, "An internal error occurred.", `job ${jobId} is already executing`);
  }
}

export function formatMiB(bytes: number): string {
  const mib = bytes / (1024 * 1024);
  return Number.isInteger(mib) ? mib.toFixed(0) : mib.toFixed(2);
}

/**
 * Category to persist on a failed job for an error thrown while it was
 * being processed.
 */
export function jobErrorCodeFor(err: unknown): JobErrorCode {
  if (
    err instanceof ValidationError ||
    err instanceof UnsupportedMediaError ||
    err instanceof PayloadTooLargeError
  ) {
    return "invalid_input";
  }
  if (err instanceof ToolNotFoundError || err instanceof ToolUnavailableError) return "tool_not_found";
  if (err instanceof ExternalToolError) return "tool_error";
  if (err instanceof StorageError) return "storage_error";
  if (err instanceof DispatchError) return "dispatch_error";
  return "internal_error";
}

/** Full diagnostic text for the job record and server logs. */
export function describeError(err: unknown): string {
  if (err instanceof ExternalToolError) {
    const exit = err.exitCode === null ? "no exit code" : `exit code ${err.exitCode}`;
    const stderr = err.stderr.trim();
    return stderr ? `${err.message} (${exit}): ${stderr}` : `${err.message} (${exit})`;
  }
  const message = messageOf(err);
  return message ?? String(err);
}

/**
 * Node system errors (fs, child_process) can come from another realm, so
 * these look at the shape rather than `instanceof Error`.
 */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function messageOf(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return undefined;
}
