export type PrincipalId = string;
export type JobId = string;

export interface Principal {
  id: PrincipalId;
  email: string;
  fullName: string;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

/**
 * Compression intensity. Each profile maps to a fixed Ghostscript
 * `-dPDFSETTINGS` preset (see compression/profiles.ts).
 */
export type CompressionProfile = "low" | "medium" | "high";

export type JobStatus = "queued" | "running" | "completed" | "failed";

export type TerminalJobStatus = Extract<JobStatus, "completed" | "failed">;

/**
 * Machine-readable failure category stored next to the diagnostic text.
 */
export type JobErrorCode =
  | "invalid_input"
  | "storage_error"
  | "dispatch_error"
  | "tool_not_found"
  | "tool_error"
  | "worker_interrupted"
  | "internal_error";

export interface CompressionJob {
  id: JobId;
  principalId: PrincipalId;
  originalFilename: string;
  originalSizeBytes: number;
  profile: CompressionProfile;
  preserveImages: boolean;
  status: JobStatus;
  compressedSizeBytes: number | null;
  errorCode: JobErrorCode | null;
  errorMessage: string | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export interface NewJobInput {
  principalId: PrincipalId;
  filename: string;
  sizeBytes: number;
  profile: CompressionProfile;
  preserveImages: boolean;
}

export interface TransitionPatch {
  errorCode?: JobErrorCode;
  errorMessage?: string;
  compressedSizeBytes?: number;
}

export interface JobListQuery {
  principalId?: PrincipalId;
  limit: number;
  offset: number;
}

export interface JobPage {
  items: CompressionJob[];
  total: number;
}

/**
 * Message carried across the queue boundary. Paths point at the temp
 * files the submitting process wrote; the consumer owns their removal.
 */
export interface CompressionJobPayload {
  jobId: JobId;
  inputPath: string;
  outputPath: string;
  profile: CompressionProfile;
  preserveImages: boolean;
  requestId: string;
  enqueuedAt: string;
}
