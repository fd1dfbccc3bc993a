import { Router, type Request, type Response } from "express";
import { findExecutable } from "@pdfshrink/shared/compression/ghostscript.js";
import type { AppContext } from "../context.js";
import { asyncHandler, authenticate } from "../middleware/gate.js";

export function healthRouter(ctx: AppContext) {
  const r = Router();

  // Liveness plus tool status; never touches the job store.
  r.get(
    "/healthz",
    asyncHandler(async (_req: Request, res: Response) => {
      const tool = ctx.toolCommand;
      res.json({
        status: "ok",
        tool,
        tool_available: tool ? (await findExecutable(tool)) !== null : false,
        version: ctx.config.appVersion,
      });
    })
  );

  r.get(
    "/api/version",
    authenticate(ctx.identity),
    (_req: Request, res: Response) => {
      const { appVersion, buildCommit, buildTime } = ctx.config;
      res.json({
        version: appVersion,
        ...(buildCommit !== null ? { commit: buildCommit } : {}),
        ...(buildTime !== null ? { build_time: buildTime } : {}),
      });
    }
  );

  return r;
}
