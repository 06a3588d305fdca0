/**
 * FFmpeg utilities for stitching downloaded segments.
 */
import * as path from "node:path";
import { execa, ExecaError } from "execa";
import { ensureDir } from "../../shared/fs.js";
import type { MuxResult } from "./types.js";

// ============================================================================
// FFmpeg Availability
// ============================================================================

/**
 * Checks if ffmpeg is available on the system.
 */
/* v8 ignore next 8 */
export async function checkFfmpeg(): Promise<boolean> {
  try {
    await execa("ffmpeg", ["-version"]);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// FFmpeg Operations
// ============================================================================

/**
 * Builds the ffmpeg argument vector for a concat-demuxer stream copy.
 *
 * `-safe 0` lets the manifest name arbitrary files; `-c copy` remuxes
 * without re-encoding.
 */
export function buildConcatArgs(manifestPath: string, outputPath: string): string[] {
  return [
    "-y",
    "-nostdin",
    "-f",
    "concat",
    "-safe",
    "0",
    "-i",
    manifestPath,
    "-c",
    "copy",
    outputPath,
  ];
}

/**
 * Concatenates the segments listed in a concat manifest into one file.
 * Relative names inside the manifest resolve against the manifest's directory.
 */
export async function concatWithManifest(
  manifestPath: string,
  outputPath: string
): Promise<MuxResult> {
  await ensureDir(path.dirname(outputPath));

  try {
    const result = await execa("ffmpeg", buildConcatArgs(manifestPath, outputPath), {
      stdin: "ignore",
    });
    return { success: true, exitCode: result.exitCode, stderr: result.stderr, outputPath };
  } catch (error) {
    if (!(error instanceof ExecaError)) {
      throw error;
    }

    const stderr = typeof error.stderr === "string" ? error.stderr : "";
    if (error.code === "ENOENT") {
      return {
        success: false,
        stderr,
        error: "ffmpeg is not installed or not on PATH",
        errorCode: "FFMPEG_NOT_FOUND",
      };
    }

    return {
      success: false,
      exitCode: error.exitCode,
      stderr,
      error: `ffmpeg error: ${error.shortMessage}`,
      errorCode: "MERGE_FAILED",
    };
  }
}
