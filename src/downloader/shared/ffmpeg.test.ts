import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { execa, ExecaError } from "execa";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildConcatArgs, concatWithManifest } from "./ffmpeg.js";

vi.mock("execa", () => {
  class ExecaError extends Error {
    code: string | undefined;
    exitCode: number | undefined;
    stderr = "";
    shortMessage = "";
  }
  return { execa: vi.fn(), ExecaError };
});

const execaMock = vi.mocked(execa);

function execaFailure(message: string, fields: Record<string, unknown>): ExecaError {
  return Object.assign(new ExecaError(), { message }, fields);
}

describe("buildConcatArgs", () => {
  it("builds a concat-demuxer stream copy without a shell", () => {
    expect(buildConcatArgs("/tmp/work/file_list.txt", "/videos/out file.mp4")).toEqual([
      "-y",
      "-nostdin",
      "-f",
      "concat",
      "-safe",
      "0",
      "-i",
      "/tmp/work/file_list.txt",
      "-c",
      "copy",
      "/videos/out file.mp4",
    ]);
  });

  it("passes paths with quotes as single arguments", () => {
    const args = buildConcatArgs("/tmp/it's/list.txt", '/out/"a".mp4');
    expect(args[7]).toBe("/tmp/it's/list.txt");
    expect(args.at(-1)).toBe('/out/"a".mp4');
  });
});

describe("concatWithManifest", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "segstitch-ffmpeg-"));
    execaMock.mockReset();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns exit code and stderr on success", async () => {
    execaMock.mockResolvedValueOnce({ exitCode: 0, stderr: "video:1024kB" } as never);
    const manifest = join(dir, "file_list.txt");
    const output = join(dir, "out", "video.mp4");

    const result = await concatWithManifest(manifest, output);

    expect(result).toEqual({ success: true, exitCode: 0, stderr: "video:1024kB", outputPath: output });
    expect(execaMock).toHaveBeenCalledWith("ffmpeg", buildConcatArgs(manifest, output), {
      stdin: "ignore",
    });
  });

  it("creates the output directory before running ffmpeg", async () => {
    execaMock.mockResolvedValueOnce({ exitCode: 0, stderr: "" } as never);
    const output = join(dir, "nested", "deeper", "video.mp4");

    await concatWithManifest(join(dir, "file_list.txt"), output);

    expect(existsSync(join(dir, "nested", "deeper"))).toBe(true);
  });

  it("reports a non-zero exit as a merge failure", async () => {
    execaMock.mockRejectedValueOnce(
      execaFailure("Command failed with exit code 1", {
        exitCode: 1,
        stderr: "file_list.txt: Invalid data found when processing input",
        shortMessage: "Command failed with exit code 1: ffmpeg -y",
      })
    );

    const result = await concatWithManifest(join(dir, "file_list.txt"), join(dir, "out.mp4"));

    expect(result).toEqual({
      success: false,
      exitCode: 1,
      stderr: "file_list.txt: Invalid data found when processing input",
      error: "ffmpeg error: Command failed with exit code 1: ffmpeg -y",
      errorCode: "MERGE_FAILED",
    });
  });

  it("reports a missing binary distinctly", async () => {
    execaMock.mockRejectedValueOnce(
      execaFailure("spawn ffmpeg ENOENT", { code: "ENOENT", shortMessage: "spawn ffmpeg ENOENT" })
    );

    const result = await concatWithManifest(join(dir, "file_list.txt"), join(dir, "out.mp4"));

    expect(result).toEqual({
      success: false,
      stderr: "",
      error: "ffmpeg is not installed or not on PATH",
      errorCode: "FFMPEG_NOT_FOUND",
    });
  });

  it("rethrows unexpected errors", async () => {
    execaMock.mockRejectedValueOnce(new Error("boom"));

    await expect(
      concatWithManifest(join(dir, "file_list.txt"), join(dir, "out.mp4"))
    ).rejects.toThrow("boom");
  });
});
