// server/src/index.ts
import { loadConfig } from "@pdfshrink/shared/config.js";
import { createLogger } from "@pdfshrink/shared/logger.js";
import { createApp } from "./app.js";
import { buildContext } from "./context.js";

const log = createLogger("server");

async function main() {
  const config = loadConfig();
  const ctx = await buildContext(config);
  const app = createApp(ctx);

  const server = app.listen(config.port, config.host, () => {
    log.info(
      `listening on ${config.host}:${config.port} (NODE_ENV=${config.nodeEnv}, dispatch=${config.dispatchMode}, tool=${ctx.toolCommand ?? "none"})`
    );
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      ctx
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error("shutdown failed", err);
          process.exit(1);
        });
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((e) => {
  log.error("fatal startup error:", e);
  process.exit(1);
});
