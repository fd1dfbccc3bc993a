import * as fs from "node:fs/promises";
import * as path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { describeError, errnoCode } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("tempfiles");

/**
 * The uploaded input and the tool's output for one job.
 *
 * `release()` removes both files. It may be called any number of times from
 * any path (success, failure, crash recovery); only the first call does work
 * and a missing file is not an error.
 */
export interface TempFilePair {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly released: boolean;
  release(): Promise<void>;
}

class ReleasableFiles implements TempFilePair {
  private pending: Promise<void> | null = null;

  constructor(
    readonly inputPath: string,
    readonly outputPath: string
  ) {}

  get released(): boolean {
    return this.pending !== null;
  }

  release(): Promise<void> {
    if (!this.pending) {
      this.pending = Promise.all([removeQuietly(this.inputPath), removeQuietly(this.outputPath)]).then(
        () => undefined
      );
    }
    return this.pending;
  }
}

async function removeQuietly(file: string): Promise<void> {
  try {
    await fs.unlink(file);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return;
    // Cleanup never masks the job outcome, but a file left behind is worth a line.
    log.warn(`could not remove ${file}:`, describeError(err));
  }
}

export interface TempFolders {
  uploadFolder: string;
  compressedFolder: string;
}

/** Create both folders (if needed) and reserve unique paths in them. */
export async function allocateTempFiles(folders: TempFolders): Promise<TempFilePair> {
  await Promise.all([
    fs.mkdir(folders.uploadFolder, { recursive: true }),
    fs.mkdir(folders.compressedFolder, { recursive: true }),
  ]);
  const token = uuidv4().replace(/-/g, "");
  return new ReleasableFiles(
    path.join(folders.uploadFolder, `${token}.pdf`),
    path.join(folders.compressedFolder, `${token}-compressed.pdf`)
  );
}

/** Rebuild a handle for paths written by another process (queue consumers). */
export function restoreTempFiles(inputPath: string, outputPath: string): TempFilePair {
  return new ReleasableFiles(inputPath, outputPath);
}

/** Run `fn` with a fresh pair and release it however `fn` ends. */
export async function withTempFiles<T>(
  folders: TempFolders,
  fn: (files: TempFilePair) => Promise<T>
): Promise<T> {
  const files = await allocateTempFiles(folders);
  try {
    return await fn(files);
  } finally {
    await files.release();
  }
}
