import { spawn } from "node:child_process";
import { constants as fsConstants } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  DuplicateExecutionError,
  ExternalToolError,
  ToolNotFoundError,
  describeError,
  errnoCode,
} from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { CompressionProfile, JobId } from "../types.js";
import { presetFor } from "./profiles.js";

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Runs an executable to completion. Rejects only when the process could not
 * be started (the error keeps Node's `code`, e.g. ENOENT); a non-zero exit
 * resolves normally and is judged by the caller.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: { timeoutMs?: number }
) => Promise<CommandResult>;

const MAX_CAPTURE_CHARS = 16 * 1024;

function appendCapped(buffer: string, chunk: string): string {
  const next = buffer + chunk;
  return next.length > MAX_CAPTURE_CHARS ? next.slice(next.length - MAX_CAPTURE_CHARS) : next;
}

export const spawnCommand: CommandRunner = (command, args, options) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], windowsHide: true });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout = appendCapped(stdout, chunk);
    });
    child.stderr.on("data", (chunk: string) => {
      stderr = appendCapped(stderr, chunk);
    });

    const timer =
      options.timeoutMs && options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, options.timeoutMs)
        : undefined;

    child.once("error", (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(err);
    });
    child.once("close", (exitCode, signal) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ exitCode, signal, stdout, stderr, timedOut });
    });
  });

/** Ghostscript wants forward slashes, even on Windows hosts. */
export function normalizePathForTool(p: string): string {
  return p.replace(/\\/g, "/");
}

export interface GhostscriptCommandOptions {
  executable: string;
  inputPath: string;
  outputPath: string;
  profile: CompressionProfile;
  preserveImages: boolean;
}

/** Full argv, executable first. Deterministic for a given input. */
export function buildGhostscriptCommand(opts: GhostscriptCommandOptions): string[] {
  const command = [
    opts.executable,
    "-sDEVICE=pdfwrite",
    "-dCompatibilityLevel=1.4",
    `-dPDFSETTINGS=${presetFor(opts.profile)}`,
    "-dNOPAUSE",
    "-dQUIET",
    "-dBATCH",
    `-sOutputFile=${normalizePathForTool(opts.outputPath)}`,
  ];

  if (opts.preserveImages) {
    command.push(
      "-dDownsampleColorImages=false",
      "-dDownsampleGrayImages=false",
      "-dDownsampleMonoImages=false"
    );
  }

  command.push(normalizePathForTool(opts.inputPath));
  return command;
}

async function fileSize(p: string): Promise<number | null> {
  try {
    const stat = await fs.stat(p);
    return stat.size;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
}

export interface InvokeRequest {
  jobId: JobId;
  inputPath: string;
  outputPath: string;
  profile: CompressionProfile;
  preserveImages: boolean;
}

export interface InvokeResult {
  bytesIn: number;
  bytesOut: number;
}

export interface CompressionInvokerOptions {
  executable: string;
  runner?: CommandRunner;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Runs Ghostscript for one job. Reports success or a typed failure; it
 * never touches the job record, that is the dispatcher's job.
 */
export class CompressionInvoker {
  readonly executable: string;
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly inFlight = new Set<JobId>();

  constructor(options: CompressionInvokerOptions) {
    this.executable = options.executable;
    this.runner = options.runner ?? spawnCommand;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.log = options.logger ?? createLogger("ghostscript");
  }

  async invoke(req: InvokeRequest): Promise<InvokeResult> {
    if (this.inFlight.has(req.jobId)) {
      throw new DuplicateExecutionError(req.jobId);
    }
    this.inFlight.add(req.jobId);

    try {
      const [command, ...args] = buildGhostscriptCommand({ executable: this.executable, ...req });
      this.log.debug(`job ${req.jobId}:`, command, args.join(" "));

      let result: CommandResult;
      try {
        result = await this.runner(command, args, { timeoutMs: this.timeoutMs });
      } catch (err) {
        if (errnoCode(err) === "ENOENT") {
          throw new ToolNotFoundError(command);
        }
        throw new ExternalToolError(`failed to start ${command}: ${describeError(err)}`, null, "");
      }

      if (result.timedOut) {
        throw new ExternalToolError(
          `Ghostscript timed out after ${this.timeoutMs} ms`,
          result.exitCode,
          result.stderr
        );
      }
      if (result.exitCode !== 0) {
        const how = result.signal ? `was killed by ${result.signal}` : `exited with code ${result.exitCode}`;
        throw new ExternalToolError(`Ghostscript ${how}`, result.exitCode, result.stderr);
      }

      const bytesOut = await fileSize(req.outputPath);
      if (bytesOut === null) {
        throw new ExternalToolError("Ghostscript produced no output file", 0, result.stderr);
      }
      const bytesIn = (await fileSize(req.inputPath)) ?? 0;
      return { bytesIn, bytesOut };
    } finally {
      this.inFlight.delete(req.jobId);
    }
  }
}

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    await fs.access(candidate, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Resolve `name` against PATH the way a shell would. */
export async function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | null> {
  if (name.includes("/") || name.includes("\\")) {
    return (await isExecutableFile(name)) ? path.resolve(name) : null;
  }

  const dirs = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  const exts = process.platform === "win32" ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")] : [""];
  for (const dir of dirs) {
    for (const ext of exts) {
      const candidate = path.join(dir, name + ext);
      if (await isExecutableFile(candidate)) return candidate;
    }
  }
  return null;
}

const GHOSTSCRIPT_CANDIDATES = ["gs", "gswin64c", "gswin32c"];

/**
 * The command to run: the configured one as given, otherwise the first
 * Ghostscript binary on PATH, otherwise null (tool unavailable).
 */
export async function resolveGhostscriptCommand(
  configured: string | null,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | null> {
  if (configured) return configured;
  for (const candidate of GHOSTSCRIPT_CANDIDATES) {
    const found = await findExecutable(candidate, env);
    if (found) return found;
  }
  return null;
}
