import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { CompressionInvoker, type CommandRunner } from "../compression/ghostscript.js";
import { DispatchError, StorageError } from "../errors.js";
import { createLogger } from "../logger.js";
import { MemoryDatabase, MemoryJobStore, MemoryPrincipalStore } from "../memoryStore.js";
import {
  processCompressionJob,
  recoverInterruptedJobs,
  recoverySweepIntervalMs,
  startRecoveryLoop,
  submitCompressionJob,
  type Dispatcher,
  type ProcessorDeps,
} from "../pipeline.js";
import { InlineDispatcher } from "../queue.js";
import { allocateTempFiles } from "../tempFiles.js";
import type { CompressionJobPayload } from "../types.js";

const PDF = Buffer.from("%PDF-1.5\n" + "0".repeat(191));
const SMALL_PDF = "%PDF-1.4\n" + "1".repeat(41);

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

describe("compression pipeline", () => {
  let root: string;
  let clock: Date;
  let db: MemoryDatabase;
  let jobs: MemoryJobStore;
  let principals: MemoryPrincipalStore;
  let runs: number;
  let runnerResult: "ok" | "fail";
  let deps: ProcessorDeps;

  const folders = () => ({
    uploadFolder: path.join(root, "uploads"),
    compressedFolder: path.join(root, "compressed"),
  });

  const runner: CommandRunner = async (_command, args) => {
    runs++;
    // Yield so concurrent callers get a chance to interleave.
    await new Promise((resolve) => setImmediate(resolve));
    if (runnerResult === "fail") {
      return { exitCode: 1, signal: null, stdout: "", stderr: "Unrecoverable error, exit code 1", timedOut: false };
    }
    const out = args.find((a) => a.startsWith("-sOutputFile="));
    await fs.writeFile((out ?? "").slice("-sOutputFile=".length), SMALL_PDF);
    return { exitCode: 0, signal: null, stdout: "", stderr: "", timedOut: false };
  };

  async function queuedJob(content: Buffer = PDF): Promise<CompressionJobPayload> {
    const principal = await principals.upsertByEmail({ email: "anonymous@localhost", fullName: "Anonymous" });
    const job = await jobs.create({
      principalId: principal.id,
      filename: "doc.pdf",
      sizeBytes: content.length,
      profile: "medium",
      preserveImages: false,
    });
    const files = await allocateTempFiles(folders());
    await fs.writeFile(files.inputPath, content);
    return {
      jobId: job.id,
      inputPath: files.inputPath,
      outputPath: files.outputPath,
      profile: "medium",
      preserveImages: false,
      requestId: "req-1",
      enqueuedAt: clock.toISOString(),
    };
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "pipeline-"));
    clock = new Date("2024-06-01T12:00:00.000Z");
    db = new MemoryDatabase(() => clock);
    jobs = new MemoryJobStore(db);
    principals = new MemoryPrincipalStore(db);
    runs = 0;
    runnerResult = "ok";
    deps = {
      store: jobs,
      invoker: new CompressionInvoker({ executable: "gs", runner }),
      maxContentLength: 1024,
      staleJobMs: 60_000,
      now: () => clock,
    };
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("completes a job, returns the output and removes temp files", async () => {
    const payload = await queuedJob();
    const outcome = await processCompressionJob(deps, payload, { readOutput: true });

    expect(outcome.kind).toBe("completed");
    if (outcome.kind !== "completed") return;
    expect(outcome.bytesIn).toBe(200);
    expect(outcome.bytesOut).toBe(50);
    expect(outcome.output?.toString()).toBe(SMALL_PDF);
    expect(outcome.job).toMatchObject({ status: "completed", compressedSizeBytes: 50 });
    expect(outcome.job.completedAt).toBe("2024-06-01T12:00:00.000Z");
    expect(await exists(payload.inputPath)).toBe(false);
    expect(await exists(payload.outputPath)).toBe(false);
  });

  it("records a tool failure with its diagnostic and still cleans up", async () => {
    runnerResult = "fail";
    const payload = await queuedJob();
    const outcome = await processCompressionJob(deps, payload);

    expect(outcome.kind).toBe("failed");
    const job = await jobs.get(payload.jobId);
    expect(job.status).toBe("failed");
    expect(job.errorCode).toBe("tool_error");
    expect(job.errorMessage).toBe("Ghostscript exited with code 1 (exit code 1): Unrecoverable error, exit code 1");
    expect(job.compressedSizeBytes).toBeNull();
    expect(await exists(payload.inputPath)).toBe(false);
  });

  it("fails a job whose stored input is not a PDF without running it", async () => {
    const payload = await queuedJob(Buffer.from("GIF89a not a pdf"));
    const outcome = await processCompressionJob(deps, payload);

    expect(outcome.kind).toBe("failed");
    expect(runs).toBe(0);
    const job = await jobs.get(payload.jobId);
    expect(job.status).toBe("failed");
    expect(job.errorCode).toBe("invalid_input");
    expect(await exists(payload.inputPath)).toBe(false);
  });

  it("fails an oversized stored input", async () => {
    const payload = await queuedJob(Buffer.concat([PDF, Buffer.alloc(2000)]));
    await processCompressionJob(deps, payload);
    const job = await jobs.get(payload.jobId);
    expect(job.errorCode).toBe("invalid_input");
    expect(job.errorMessage).toBe("The uploaded file exceeds the 0.00 MiB limit.");
  });

  it("fails as a storage error when the input vanished", async () => {
    const payload = await queuedJob();
    await fs.unlink(payload.inputPath);
    await processCompressionJob(deps, payload);
    const job = await jobs.get(payload.jobId);
    expect(job.errorCode).toBe("storage_error");
    expect(runs).toBe(0);
  });

  it("runs the tool once when the same job is processed concurrently", async () => {
    const payload = await queuedJob();
    const outcomes = await Promise.all(Array.from({ length: 5 }, () => processCompressionJob(deps, payload)));

    expect(runs).toBe(1);
    expect(outcomes.filter((o) => o.kind === "completed")).toHaveLength(1);
    expect(outcomes.filter((o) => o.kind === "skipped")).toHaveLength(4);
    expect((await jobs.get(payload.jobId)).status).toBe("completed");
    expect(await exists(payload.inputPath)).toBe(false);
  });

  it("skips a redelivered job that already finished", async () => {
    const payload = await queuedJob();
    await processCompressionJob(deps, payload);
    const again = await processCompressionJob(deps, payload);
    expect(again.kind).toBe("skipped");
    expect(runs).toBe(1);
  });

  it("fails a running job that has gone stale instead of skipping it", async () => {
    const payload = await queuedJob();
    await jobs.claim(payload.jobId);

    const fresh = await processCompressionJob(deps, payload);
    expect(fresh.kind).toBe("skipped");
    expect(await exists(payload.inputPath)).toBe(true);

    clock = new Date(clock.getTime() + 60_001);
    const stale = await processCompressionJob(deps, payload);
    expect(stale.kind).toBe("failed");
    const job = await jobs.get(payload.jobId);
    expect(job.errorCode).toBe("worker_interrupted");
    expect(await exists(payload.inputPath)).toBe(false);
    expect(runs).toBe(0);
  });

  it("reports an unknown job as failed without throwing", async () => {
    const payload = await queuedJob();
    const outcome = await processCompressionJob(deps, { ...payload, jobId: "missing" });
    expect(outcome).toMatchObject({ kind: "failed", job: null });
    expect(await exists(payload.inputPath)).toBe(false);
  });

  it("fails a claimed job when recording its completion throws", async () => {
    const payload = await queuedJob();
    const original = jobs.transition.bind(jobs);
    let failNext = true;
    jest.spyOn(jobs, "transition").mockImplementation(async (id, to, patch) => {
      if (to === "completed" && failNext) {
        failNext = false;
        throw new Error("connection reset");
      }
      return original(id, to, patch);
    });

    const outcome = await processCompressionJob(deps, payload);

    expect(outcome.kind).toBe("failed");
    const job = await jobs.get(payload.jobId);
    expect(job.status).toBe("failed");
    expect(job.errorCode).toBe("internal_error");
    expect(job.errorMessage).toBe("connection reset");
    expect(job.completedAt).toBe("2024-06-01T12:00:00.000Z");
    expect(await exists(payload.inputPath)).toBe(false);
  });

  it("sweeps interrupted jobs older than the threshold", async () => {
    const old = await queuedJob();
    await jobs.claim(old.jobId);
    clock = new Date(clock.getTime() + 120_000);
    const recent = await queuedJob();
    await jobs.claim(recent.jobId);

    const swept = await recoverInterruptedJobs(jobs, 60_000, clock);
    expect(swept).toBe(1);
    expect((await jobs.get(old.jobId)).errorCode).toBe("worker_interrupted");
    expect((await jobs.get(recent.jobId)).status).toBe("running");
  });

  describe("submitCompressionJob", () => {
    it("creates, stores and runs a job inline", async () => {
      const principal = await principals.upsertByEmail({ email: "a@example.com", fullName: "A" });
      const result = await submitCompressionJob(
        { store: jobs, dispatcher: new InlineDispatcher(deps), folders: folders() },
        {
          principalId: principal.id,
          filename: "in.pdf",
          sizeBytes: PDF.length,
          profile: "low",
          preserveImages: true,
          content: PDF,
          requestId: "req-9",
        }
      );
      expect(result.job.status).toBe("completed");
      expect(result.dispatch.mode).toBe("inline");
      expect(await fs.readdir(folders().uploadFolder)).toEqual([]);
    });

    it("fails the job and removes the upload when dispatch fails", async () => {
      const principal = await principals.upsertByEmail({ email: "a@example.com", fullName: "A" });
      const broken: Dispatcher = {
        mode: "queue",
        async dispatch() {
          throw new DispatchError("redis unreachable");
        },
        async close() {},
      };
      await expect(
        submitCompressionJob(
          { store: jobs, dispatcher: broken, folders: folders() },
          {
            principalId: principal.id,
            filename: "in.pdf",
            sizeBytes: PDF.length,
            profile: "medium",
            preserveImages: false,
            content: PDF,
            requestId: "req-10",
          }
        )
      ).rejects.toBeInstanceOf(DispatchError);

      const page = await jobs.list({ limit: 10, offset: 0 });
      expect(page.items[0]).toMatchObject({ status: "failed", errorCode: "dispatch_error" });
      expect(await fs.readdir(folders().uploadFolder)).toEqual([]);
    });

    it("fails the job as a storage error when the upload cannot be written", async () => {
      const principal = await principals.upsertByEmail({ email: "a@example.com", fullName: "A" });
      const blocked = path.join(root, "not-a-dir");
      await fs.writeFile(blocked, "file in the way");
      await expect(
        submitCompressionJob(
          {
            store: jobs,
            dispatcher: new InlineDispatcher(deps),
            folders: { uploadFolder: blocked, compressedFolder: path.join(root, "compressed") },
          },
          {
            principalId: principal.id,
            filename: "in.pdf",
            sizeBytes: PDF.length,
            profile: "medium",
            preserveImages: false,
            content: PDF,
            requestId: "req-11",
          }
        )
      ).rejects.toBeInstanceOf(StorageError);

      const page = await jobs.list({ limit: 10, offset: 0 });
      expect(page.items[0]).toMatchObject({ status: "failed", errorCode: "storage_error" });
      expect(runs).toBe(0);
    });
  });
});

describe("startRecoveryLoop", () => {
  it("sweeps once at start and stops cleanly", async () => {
    const db = new MemoryDatabase();
    const jobs = new MemoryJobStore(db);
    const findStale = jest.spyOn(jobs, "findStale");

    const loop = startRecoveryLoop(jobs, 60_000, 60_000, createLogger("test"));
    loop.stop();
    await new Promise((resolve) => setImmediate(resolve));

    expect(findStale).toHaveBeenCalledTimes(1);
    expect(findStale.mock.calls[0][0]).toBe("running");
  });
});

describe("recoverySweepIntervalMs", () => {
  it("sweeps twice per stale window, no more than every 10 s", () => {
    expect(recoverySweepIntervalMs(600_000)).toBe(300_000);
    expect(recoverySweepIntervalMs(5_000)).toBe(10_000);
  });
});
