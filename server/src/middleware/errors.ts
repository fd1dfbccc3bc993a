import type { ErrorRequestHandler } from "express";
import multer from "multer";
import {
  PayloadTooLargeError,
  PipelineError,
  RateLimitedError,
  ValidationError,
} from "@pdfshrink/shared/errors.js";
import { createLogger } from "@pdfshrink/shared/logger.js";
import { requestIdOf } from "./gate.js";

const log = createLogger("http");

function toPipelineError(err: unknown, maxContentLength: number): PipelineError | null {
  if (err instanceof PipelineError) return err;
  if (err instanceof multer.MulterError) {
    if (err.code === "LIMIT_FILE_SIZE") return new PayloadTooLargeError(maxContentLength);
    return new ValidationError("missing_file", "A PDF file must be provided in the 'file' form field.");
  }
  return null;
}

/**
 * Terminal handler: every failure leaves as
 * `{ ok: false, error, detail, request_id }`. Internal messages are logged,
 * never sent.
 */
export function errorHandler(maxContentLength: number): ErrorRequestHandler {
  return (err, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const requestId = requestIdOf(req);
    const known = toPipelineError(err, maxContentLength);

    if (known) {
      if (known.status >= 500) {
        log.error(`${req.method} ${req.originalUrl} -> ${known.code} (${requestId}):`, known.message);
      } else {
        log.info(`${req.method} ${req.originalUrl} -> ${known.code} (${requestId})`);
      }
      if (known instanceof RateLimitedError) {
        res.setHeader("Retry-After", String(known.retryAfterSeconds));
      }
      res.status(known.status).json({
        ok: false,
        error: known.code,
        detail: known.detail,
        request_id: requestId,
      });
      return;
    }

    log.error(`${req.method} ${req.originalUrl} failed (${requestId})`, err);
    res.status(500).json({
      ok: false,
      error: "internal_error",
      detail: "An internal error occurred.",
      request_id: requestId,
    });
  };
}
