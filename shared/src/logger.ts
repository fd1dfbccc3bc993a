/**
 * Tagged console logging shared by the server and the worker.
 *
 * Every line is prefixed with its tag (`[jobs] ...`) so the two processes
 * can be grepped apart in a combined log stream. The threshold comes from
 * LOG_LEVEL:
 * - debug / info / warn / error: emit that level and above
 * - silent: emit nothing (the default under NODE_ENV=test)
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.LOG_LEVEL ?? "").trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return env.NODE_ENV === "test" ? "silent" : "info";
}

const threshold: LogLevel = resolveLevel();

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(...args) {
      if (enabled("debug")) console.debug(prefix, ...args);
    },
    info(...args) {
      if (enabled("info")) console.log(prefix, ...args);
    },
    warn(...args) {
      if (enabled("warn")) console.warn(prefix, ...args);
    },
    error(...args) {
      if (enabled("error")) console.error(prefix, ...args);
    },
  };
}
