/**
 * End-to-end run: fetch segments, write the concat manifest, mux, clean up.
 */
import type { KyInstance } from "ky";
import type { StitchConfig } from "../config/schema.js";
import { cleanupSegments } from "./cleanup.js";
import { writeConcatManifest } from "./manifest.js";
import { fetchSegments } from "./segmentFetcher.js";
import { concatWithManifest } from "./shared/ffmpeg.js";
import type {
  FetchEventCallback,
  FetchStopReason,
  MuxResult,
  SleepFunction,
} from "./shared/types.js";

/**
 * Final state of a run.
 * - `done`: output written (and segments removed unless kept)
 * - `empty`: nothing was downloaded, so nothing else ran
 * - `mux-failed`: ffmpeg failed; segments and manifest are left on disk
 */
export type StitchState = "done" | "empty" | "mux-failed";

export type StitchPhase = "fetching" | "writing-manifest" | "muxing" | "cleanup";

export interface StitchResult {
  state: StitchState;
  files: string[];
  stopReason: FetchStopReason;
  outputPath: string;
  manifestPath?: string | undefined;
  mux?: MuxResult | undefined;
  /** Segment files deleted by cleanup */
  removed: string[];
}

export interface StitchHooks {
  onEvent?: FetchEventCallback | undefined;
  onPhase?: ((phase: StitchPhase) => void) | undefined;
  shouldContinue?: (() => boolean) | undefined;
  client?: KyInstance | undefined;
  sleep?: SleepFunction | undefined;
}

/**
 * The pipeline steps, replaceable in tests.
 */
export interface StitchSteps {
  fetchSegments: typeof fetchSegments;
  writeConcatManifest: typeof writeConcatManifest;
  concatWithManifest: typeof concatWithManifest;
  cleanupSegments: typeof cleanupSegments;
}

const defaultSteps: StitchSteps = {
  fetchSegments,
  writeConcatManifest,
  concatWithManifest,
  cleanupSegments,
};

export async function stitchSegments(
  config: StitchConfig,
  hooks: StitchHooks = {},
  steps: StitchSteps = defaultSteps
): Promise<StitchResult> {
  const { onEvent, onPhase, shouldContinue, client, sleep } = hooks;

  onPhase?.("fetching");
  const fetched = await steps.fetchSegments({
    baseUrl: config.baseUrl,
    workDir: config.workDir,
    retries: config.retries,
    backoffMs: config.backoffMs,
    timeoutMs: config.timeoutMs,
    maxConsecutiveFailures: config.maxConsecutiveFailures,
    client,
    sleep,
    onEvent,
    shouldContinue,
  });

  const base = {
    files: fetched.files,
    stopReason: fetched.stopReason,
    outputPath: config.outputPath,
  };

  if (fetched.files.length === 0) {
    return { ...base, state: "empty", removed: [] };
  }

  onPhase?.("writing-manifest");
  const manifestPath = await steps.writeConcatManifest(fetched.files, config.workDir);

  onPhase?.("muxing");
  const mux = await steps.concatWithManifest(manifestPath, config.outputPath);

  if (!mux.success) {
    return { ...base, state: "mux-failed", manifestPath, mux, removed: [] };
  }

  if (config.keepSegments) {
    return { ...base, state: "done", manifestPath, mux, removed: [] };
  }

  onPhase?.("cleanup");
  const removed = await steps.cleanupSegments(config.workDir);

  return { ...base, state: "done", manifestPath, mux, removed };
}
