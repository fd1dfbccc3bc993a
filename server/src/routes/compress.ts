// server/src/routes/compress.ts
import { Router, type Request, type Response } from "express";
import multer from "multer";
import {
  DEFAULT_PROFILE,
  isCompressionProfile,
} from "@pdfshrink/shared/compression/profiles.js";
import { downloadNameFor, isPdfUpload } from "@pdfshrink/shared/compression/pdfInput.js";
import {
  PipelineError,
  ToolUnavailableError,
  UnsupportedMediaError,
  ValidationError,
} from "@pdfshrink/shared/errors.js";
import { submitCompressionJob, type ProcessOutcome } from "@pdfshrink/shared/pipeline.js";
import type { CompressionJob } from "@pdfshrink/shared/types.js";
import { COMPRESS_SCOPE, type AppContext } from "../context.js";
import { asyncHandler, authenticate, identityOf, rateLimit, requestIdOf } from "../middleware/gate.js";

const TRUTHY = new Set(["1", "true", "yes", "on"]);

function formField(req: Request, name: string): string | undefined {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null) return undefined;
  const value: unknown = Reflect.get(body, name);
  return typeof value === "string" ? value : undefined;
}

export function isTruthyFlag(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

/** JSON only when the caller prefers it over the PDF itself. */
function wantsJson(req: Request): boolean {
  return req.accepts(["application/pdf", "application/json"]) === "application/json";
}

function ratio(original: number, compressed: number): number {
  return original > 0 ? Math.round((compressed / original) * 10_000) / 10_000 : 0;
}

function failureOf(outcome: Exclude<ProcessOutcome, { kind: "completed" }>, job: CompressionJob): Error {
  if (outcome.kind === "failed" && outcome.error instanceof PipelineError) return outcome.error;
  return new Error(`job ${job.id} finished inline as ${outcome.kind} (${job.status})`);
}

export function compressRouter(ctx: AppContext) {
  const r = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: ctx.config.maxContentLength, files: 1 },
  });

  r.post(
    "/compress",
    rateLimit(ctx.limiter, COMPRESS_SCOPE),
    authenticate(ctx.identity),
    upload.single("file"),
    asyncHandler(async (req: Request, res: Response) => {
      const file = req.file;
      if (!file || !file.originalname) {
        throw new ValidationError("missing_file", "A PDF file must be provided in the 'file' form field.");
      }

      const profile = (formField(req, "profile") ?? DEFAULT_PROFILE).trim().toLowerCase();
      if (!isCompressionProfile(profile)) {
        throw new ValidationError("invalid_profile", "Profile must be one of: low, medium, high.");
      }

      const preserveImages =
        isTruthyFlag(formField(req, "keep_images")) || isTruthyFlag(formField(req, "preserve_images"));

      if (!isPdfUpload(file)) {
        throw new UnsupportedMediaError();
      }

      if (ctx.dispatcher.mode === "inline" && !ctx.toolCommand) {
        throw new ToolUnavailableError();
      }

      const requestId = requestIdOf(req);
      const { principal } = identityOf(req);
      const { job, dispatch } = await submitCompressionJob(
        {
          store: ctx.jobs,
          dispatcher: ctx.dispatcher,
          folders: ctx.config,
        },
        {
          principalId: principal.id,
          filename: file.originalname,
          sizeBytes: file.size,
          profile,
          preserveImages,
          content: file.buffer,
          requestId,
        }
      );

      res.setHeader("X-Job-Id", job.id);

      if (dispatch.mode === "queue") {
        res.status(202).json({
          ok: true,
          job_id: job.id,
          status: job.status,
          status_url: `/api/jobs/${job.id}`,
          request_id: requestId,
        });
        return;
      }

      const { outcome } = dispatch;
      if (outcome.kind !== "completed") {
        throw failureOf(outcome, job);
      }

      if (wantsJson(req)) {
        res.json({
          ok: true,
          original_bytes: outcome.bytesIn,
          compressed_bytes: outcome.bytesOut,
          ratio: ratio(outcome.bytesIn, outcome.bytesOut),
          profile,
          request_id: requestId,
          job_id: job.id,
        });
        return;
      }

      res.attachment(downloadNameFor(file.originalname));
      res.type("application/pdf");
      res.send(outcome.output ?? Buffer.alloc(0));
    })
  );

  return r;
}
