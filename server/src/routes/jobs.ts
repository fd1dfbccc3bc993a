import { Router, type Request, type Response } from "express";
import { JobNotFoundError, ValidationError } from "@pdfshrink/shared/errors.js";
import type { CompressionJob, JobErrorCode } from "@pdfshrink/shared/types.js";
import type { AppContext } from "../context.js";
import { asyncHandler, authenticate, identityOf } from "../middleware/gate.js";

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

// Callers get the category and a fixed sentence; the stored diagnostic
// (stderr, paths) stays server-side.
const PUBLIC_ERROR_MESSAGES: Record<JobErrorCode, string> = {
  invalid_input: "The uploaded file was rejected before compression.",
  storage_error: "Failed to save the uploaded file.",
  dispatch_error: "The compression job could not be scheduled.",
  tool_not_found: "Ghostscript is not installed on the server.",
  tool_error: "Ghostscript failed while compressing the file.",
  worker_interrupted: "The worker processing this job stopped before it finished.",
  internal_error: "An internal error occurred.",
};

export function serializeJob(job: CompressionJob) {
  return {
    id: job.id,
    status: job.status,
    profile: job.profile,
    preserve_images: job.preserveImages,
    original_filename: job.originalFilename,
    original_size_bytes: job.originalSizeBytes,
    compressed_size_bytes: job.compressedSizeBytes,
    error: job.errorCode ? { code: job.errorCode, message: PUBLIC_ERROR_MESSAGES[job.errorCode] } : null,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
    completed_at: job.completedAt,
  };
}

function queryInt(req: Request, name: string, fallback: number): number | null {
  const raw = req.query[name];
  if (raw === undefined) return fallback;
  if (typeof raw !== "string" || !/^\d+$/.test(raw.trim())) return null;
  const value = Number(raw.trim());
  return Number.isSafeInteger(value) ? value : null;
}

export function parsePagination(req: Request): { limit: number; offset: number } {
  const limit = queryInt(req, "limit", DEFAULT_PAGE_SIZE);
  const offset = queryInt(req, "offset", 0);
  if (limit === null || offset === null || limit < 1 || limit > MAX_PAGE_SIZE) {
    throw new ValidationError(
      "invalid_pagination",
      `limit must be an integer between 1 and ${MAX_PAGE_SIZE}; offset must be a non-negative integer.`
    );
  }
  return { limit, offset };
}

export function jobsRouter(ctx: AppContext) {
  const r = Router();

  r.get(
    "/jobs",
    authenticate(ctx.identity),
    asyncHandler(async (req: Request, res: Response) => {
      const { principal, admin } = identityOf(req);
      const { limit, offset } = parsePagination(req);
      const page = await ctx.jobs.list({
        principalId: admin ? undefined : principal.id,
        limit,
        offset,
      });
      res.json({ items: page.items.map(serializeJob), total: page.total, limit, offset });
    })
  );

  r.get(
    "/jobs/:id",
    authenticate(ctx.identity),
    asyncHandler(async (req: Request, res: Response) => {
      const { principal, admin } = identityOf(req);
      const job = await ctx.jobs.get(req.params.id);
      // Someone else's job is indistinguishable from a missing one.
      if (!admin && job.principalId !== principal.id) {
        throw new JobNotFoundError(req.params.id);
      }
      res.json(serializeJob(job));
    })
  );

  return r;
}
