import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import type { AppContext } from "./context.js";
import { errorHandler } from "./middleware/errors.js";
import { requestId } from "./middleware/gate.js";
import { compressRouter } from "./routes/compress.js";
import { healthRouter } from "./routes/health.js";
import { jobsRouter } from "./routes/jobs.js";

export function createApp(ctx: AppContext): Express {
  const { config } = ctx;
  const app: Express = express();

  // Rate-limit keys use the client address from X-Forwarded-For behind one proxy hop.
  app.set("trust proxy", 1);

  app.use(requestId());
  app.use(
    cors({
      origin: config.publicOrigin,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Accept", "X-API-Key"],
      exposedHeaders: [
        "Content-Disposition",
        "X-Job-Id",
        "X-Request-Id",
        "Retry-After",
        "X-RateLimit-Limit",
        "X-RateLimit-Remaining",
        "X-RateLimit-Reset",
      ],
    })
  );
  app.use(helmet());
  if (config.nodeEnv !== "test") {
    app.use(morgan(config.nodeEnv === "production" ? "combined" : "dev"));
  }

  app.use(healthRouter(ctx));
  app.use("/api", compressRouter(ctx));
  app.use("/api", jobsRouter(ctx));

  app.use(errorHandler(config.maxContentLength));
  return app;
}
