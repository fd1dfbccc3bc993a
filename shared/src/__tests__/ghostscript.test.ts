import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  CompressionInvoker,
  buildGhostscriptCommand,
  findExecutable,
  normalizePathForTool,
  resolveGhostscriptCommand,
  spawnCommand,
  type CommandRunner,
} from "../compression/ghostscript.js";
import { DuplicateExecutionError, ExternalToolError, ToolNotFoundError, describeError } from "../errors.js";

describe("buildGhostscriptCommand", () => {
  it("builds the pdfwrite command for a profile", () => {
    expect(
      buildGhostscriptCommand({
        executable: "gs",
        inputPath: "/tmp/in.pdf",
        outputPath: "/tmp/out.pdf",
        profile: "high",
        preserveImages: false,
      })
    ).toEqual([
      "gs",
      "-sDEVICE=pdfwrite",
      "-dCompatibilityLevel=1.4",
      "-dPDFSETTINGS=/screen",
      "-dNOPAUSE",
      "-dQUIET",
      "-dBATCH",
      "-sOutputFile=/tmp/out.pdf",
      "/tmp/in.pdf",
    ]);
  });

  it("disables downsampling when images are preserved", () => {
    const command = buildGhostscriptCommand({
      executable: "gs",
      inputPath: "in.pdf",
      outputPath: "out.pdf",
      profile: "low",
      preserveImages: true,
    });
    expect(command.slice(3, 4)).toEqual(["-dPDFSETTINGS=/printer"]);
    expect(command.slice(-4)).toEqual([
      "-dDownsampleColorImages=false",
      "-dDownsampleGrayImages=false",
      "-dDownsampleMonoImages=false",
      "in.pdf",
    ]);
  });

  it("uses forward slashes for Windows paths", () => {
    expect(normalizePathForTool("C:\\data\\uploads\\a.pdf")).toBe("C:/data/uploads/a.pdf");
    const command = buildGhostscriptCommand({
      executable: "gswin64c",
      inputPath: "C:\\in\\a.pdf",
      outputPath: "C:\\out\\a.pdf",
      profile: "medium",
      preserveImages: false,
    });
    expect(command).toContain("-sOutputFile=C:/out/a.pdf");
    expect(command).toContain("-dPDFSETTINGS=/ebook");
    expect(command[command.length - 1]).toBe("C:/in/a.pdf");
  });
});

describe("CompressionInvoker", () => {
  let dir: string;
  let inputPath: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "invoker-"));
    inputPath = path.join(dir, "in.pdf");
    outputPath = path.join(dir, "out.pdf");
    await fs.writeFile(inputPath, "%PDF-1.7\n" + "x".repeat(91));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const request = () => ({ jobId: "job-1", inputPath, outputPath, profile: "medium" as const, preserveImages: false });

  it("reports input and output sizes after a clean exit", async () => {
    const calls: string[][] = [];
    const runner: CommandRunner = async (command, args) => {
      calls.push([command, ...args]);
      await fs.writeFile(outputPath, "%PDF-1.4\nsmall");
      return { exitCode: 0, signal: null, stdout: "", stderr: "", timedOut: false };
    };
    const result = await new CompressionInvoker({ executable: "gs", runner }).invoke(request());
    expect(result).toEqual({ bytesIn: 100, bytesOut: 14 });
    expect(calls[0][0]).toBe("gs");
    expect(calls[0][calls[0].length - 1]).toBe(normalizePathForTool(inputPath));
  });

  it("turns a missing executable into ToolNotFoundError", async () => {
    const runner: CommandRunner = async () => {
      throw Object.assign(new Error("spawn gs ENOENT"), { code: "ENOENT" });
    };
    const err = await new CompressionInvoker({ executable: "gs", runner }).invoke(request()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolNotFoundError);
  });

  it("detects a missing executable with the real spawner", async () => {
    const invoker = new CompressionInvoker({ executable: path.join(dir, "no-such-gs") });
    await expect(invoker.invoke(request())).rejects.toBeInstanceOf(ToolNotFoundError);
  });

  it("carries stderr and exit code of a failed run", async () => {
    const runner: CommandRunner = async () => ({
      exitCode: 1,
      signal: null,
      stdout: "",
      stderr: "Error: /syntaxerror in --token--\n",
      timedOut: false,
    });
    const err = await new CompressionInvoker({ executable: "gs", runner }).invoke(request()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalToolError);
    expect(describeError(err)).toBe("Ghostscript exited with code 1 (exit code 1): Error: /syntaxerror in --token--");
  });

  it("reports a timeout as a tool failure", async () => {
    const seen: Array<number | undefined> = [];
    const runner: CommandRunner = async (_command, _args, options) => {
      seen.push(options.timeoutMs);
      return { exitCode: null, signal: "SIGKILL", stdout: "", stderr: "", timedOut: true };
    };
    const err = await new CompressionInvoker({ executable: "gs", runner, timeoutMs: 500 })
      .invoke(request())
      .catch((e: unknown) => e);
    expect(seen).toEqual([500]);
    expect(describeError(err)).toBe("Ghostscript timed out after 500 ms (no exit code)");
  });

  it("fails when the tool exits cleanly without writing output", async () => {
    const runner: CommandRunner = async () => ({ exitCode: 0, signal: null, stdout: "", stderr: "", timedOut: false });
    await expect(new CompressionInvoker({ executable: "gs", runner }).invoke(request())).rejects.toThrow(
      "Ghostscript produced no output file"
    );
  });

  it("refuses a second concurrent run of the same job", async () => {
    let finish: () => void = () => {};
    const runner: CommandRunner = async () => {
      await new Promise<void>((resolve) => {
        finish = resolve;
      });
      await fs.writeFile(outputPath, "%PDF-");
      return { exitCode: 0, signal: null, stdout: "", stderr: "", timedOut: false };
    };
    const invoker = new CompressionInvoker({ executable: "gs", runner });
    const first = invoker.invoke(request());
    await expect(invoker.invoke(request())).rejects.toBeInstanceOf(DuplicateExecutionError);

    finish();
    await expect(first).resolves.toEqual({ bytesIn: 100, bytesOut: 5 });

    const again = invoker.invoke(request());
    finish();
    await expect(again).resolves.toEqual({ bytesIn: 100, bytesOut: 5 });
  });
});

describe("spawnCommand", () => {
  it("rejects with ENOENT for an unknown binary", async () => {
    await expect(spawnCommand("definitely-not-a-real-binary-xyz", [], {})).rejects.toMatchObject({ code: "ENOENT" });
  });
});

describe("executable discovery", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "gs-path-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("prefers the configured command as given", async () => {
    await expect(resolveGhostscriptCommand("/opt/gs/bin/gs", { PATH: "" })).resolves.toBe("/opt/gs/bin/gs");
  });

  it("finds an executable on PATH", async () => {
    if (process.platform === "win32") return;
    const bin = path.join(dir, "gs");
    await fs.writeFile(bin, "#!/bin/sh\nexit 0\n");
    await fs.chmod(bin, 0o755);
    await expect(findExecutable("gs", { PATH: dir })).resolves.toBe(bin);
    await expect(resolveGhostscriptCommand(null, { PATH: dir })).resolves.toBe(bin);
  });

  it("ignores files that are not executable", async () => {
    if (process.platform === "win32") return;
    const bin = path.join(dir, "gs");
    await fs.writeFile(bin, "not a program");
    await fs.chmod(bin, 0o644);
    await expect(findExecutable("gs", { PATH: dir })).resolves.toBeNull();
  });

  it("returns null when nothing is installed", async () => {
    await expect(resolveGhostscriptCommand(null, { PATH: dir })).resolves.toBeNull();
  });
});
