import { v4 as uuidv4 } from "uuid";
import { queryOnce, withTransaction, type SqlClient, type SqlPool } from "./db/index.js";
import { JobNotFoundError } from "./errors.js";
import { applyTransition, isJobStatus } from "./jobStateMachine.js";
import { isCompressionProfile } from "./compression/profiles.js";
import type {
  CompressionJob,
  JobErrorCode,
  JobId,
  JobListQuery,
  JobPage,
  JobStatus,
  NewJobInput,
  TransitionPatch,
} from "./types.js";

/**
 * Persistence boundary for compression jobs.
 *
 * `transition` (and `claim`, which is the queued -> running transition that
 * tolerates losing a race) is the only way status, sizes, error fields and
 * timestamps change.
 */
export interface JobStore {
  create(input: NewJobInput): Promise<CompressionJob>;
  transition(jobId: JobId, to: JobStatus, patch?: TransitionPatch): Promise<CompressionJob>;
  /** Atomically move a queued job to running; null when it is no longer queued. */
  claim(jobId: JobId): Promise<CompressionJob | null>;
  get(jobId: JobId): Promise<CompressionJob>;
  list(query: JobListQuery): Promise<JobPage>;
  findStale(status: JobStatus, olderThan: Date): Promise<CompressionJob[]>;
}

type JobRow = {
  id: string;
  user_id: string;
  original_filename: string;
  original_size_bytes: number;
  compressed_size_bytes: number | null;
  compression_level: string;
  preserve_images: boolean;
  status: string;
  error_code: string | null;
  error_message: string | null;
  created_at: Date | string;
  updated_at: Date | string;
  completed_at: Date | string | null;
};

const JOB_ERROR_CODES: readonly JobErrorCode[] = [
  "invalid_input",
  "storage_error",
  "dispatch_error",
  "tool_not_found",
  "tool_error",
  "worker_interrupted",
  "internal_error",
];

function isJobErrorCode(value: string): value is JobErrorCode {
  return (JOB_ERROR_CODES as readonly string[]).includes(value);
}

function toErrorCode(value: string | null): JobErrorCode | null {
  if (value === null) return null;
  return isJobErrorCode(value) ? value : "internal_error";
}

function iso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function rowToJob(row: JobRow): CompressionJob {
  if (!isJobStatus(row.status)) {
    throw new Error(`job ${row.id} has unknown status "${row.status}"`);
  }
  if (!isCompressionProfile(row.compression_level)) {
    throw new Error(`job ${row.id} has unknown profile "${row.compression_level}"`);
  }
  return {
    id: row.id,
    principalId: row.user_id,
    originalFilename: row.original_filename,
    originalSizeBytes: Number(row.original_size_bytes),
    profile: row.compression_level,
    preserveImages: row.preserve_images,
    status: row.status,
    compressedSizeBytes:
      row.compressed_size_bytes === null ? null : Number(row.compressed_size_bytes),
    errorCode: toErrorCode(row.error_code),
    errorMessage: row.error_message,
    createdAt: iso(row.created_at),
    updatedAt: iso(row.updated_at),
    completedAt: row.completed_at === null ? null : iso(row.completed_at),
  };
}

const JOB_COLUMNS = `id, user_id, original_filename, original_size_bytes, compressed_size_bytes,
  compression_level, preserve_images, status, error_code, error_message,
  created_at, updated_at, completed_at`;

export class PgJobStore implements JobStore {
  constructor(
    private readonly pool: SqlPool,
    private readonly now: () => Date = () => new Date()
  ) {}

  async create(input: NewJobInput): Promise<CompressionJob> {
    return withTransaction(this.pool, async (client) => {
      const stamp = this.now();
      const res = await client.query<JobRow>(
        `INSERT INTO compression_jobs
           (id, user_id, original_filename, original_size_bytes, compression_level,
            preserve_images, status, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, 'queued', $7, $7)
         RETURNING ${JOB_COLUMNS}`,
        [
          uuidv4(),
          input.principalId,
          input.filename,
          input.sizeBytes,
          input.profile,
          input.preserveImages,
          stamp,
        ]
      );
      return rowToJob(res.rows[0]);
    });
  }

  async transition(
    jobId: JobId,
    to: JobStatus,
    patch: TransitionPatch = {}
  ): Promise<CompressionJob> {
    const job = await this.mutate(jobId, (current) => applyTransition(current, to, patch, this.now()));
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  async claim(jobId: JobId): Promise<CompressionJob | null> {
    return this.mutate(jobId, (current) =>
      current.status === "queued" ? applyTransition(current, "running", {}, this.now()) : null
    );
  }

  async get(jobId: JobId): Promise<CompressionJob> {
    const res = await queryOnce<JobRow>(
      this.pool,
      `SELECT ${JOB_COLUMNS} FROM compression_jobs WHERE id = $1`,
      [jobId]
    );
    if (!res.rows.length) throw new JobNotFoundError(jobId);
    return rowToJob(res.rows[0]);
  }

  async list(query: JobListQuery): Promise<JobPage> {
    const owner = query.principalId ?? null;
    const client = await this.pool.connect();
    try {
      const items = await client.query<JobRow>(
        `SELECT ${JOB_COLUMNS} FROM compression_jobs
         WHERE ($1::varchar IS NULL OR user_id = $1)
         ORDER BY created_at DESC, id DESC
         LIMIT $2 OFFSET $3`,
        [owner, query.limit, query.offset]
      );
      const count = await client.query<{ total: string }>(
        `SELECT COUNT(*) AS total FROM compression_jobs WHERE ($1::varchar IS NULL OR user_id = $1)`,
        [owner]
      );
      return {
        items: items.rows.map(rowToJob),
        total: Number(count.rows[0]?.total ?? 0),
      };
    } finally {
      client.release();
    }
  }

  async findStale(status: JobStatus, olderThan: Date): Promise<CompressionJob[]> {
    const res = await queryOnce<JobRow>(
      this.pool,
      `SELECT ${JOB_COLUMNS} FROM compression_jobs
       WHERE status = $1 AND updated_at < $2
       ORDER BY updated_at ASC`,
      [status, olderThan]
    );
    return res.rows.map(rowToJob);
  }

  /**
   * Lock the row, let `decide` compute the next state, write it back. A
   * null decision leaves the row untouched and still commits, releasing
   * the lock.
   */
  private async mutate(
    jobId: JobId,
    decide: (current: CompressionJob) => CompressionJob | null
  ): Promise<CompressionJob | null> {
    return withTransaction(this.pool, async (client) => {
      const current = await this.lockRow(client, jobId);
      if (!current) throw new JobNotFoundError(jobId);
      const next = decide(current);
      if (!next) return null;

      const res = await client.query<JobRow>(
        `UPDATE compression_jobs
            SET status = $2,
                compressed_size_bytes = $3,
                error_code = $4,
                error_message = $5,
                updated_at = $6,
                completed_at = $7
          WHERE id = $1
          RETURNING ${JOB_COLUMNS}`,
        [
          jobId,
          next.status,
          next.compressedSizeBytes,
          next.errorCode,
          next.errorMessage,
          next.updatedAt,
          next.completedAt,
        ]
      );
      return rowToJob(res.rows[0]);
    });
  }

  private async lockRow(client: SqlClient, jobId: JobId): Promise<CompressionJob | null> {
    const res = await client.query<JobRow>(
      `SELECT ${JOB_COLUMNS} FROM compression_jobs WHERE id = $1 FOR UPDATE`,
      [jobId]
    );
    return res.rows.length ? rowToJob(res.rows[0]) : null;
  }
}
