/**
 * Shared utilities for the segment pipeline.
 */

// Types
export type {
  CommonErrorCode,
  DownloadResult,
  FetchEvent,
  FetchEventCallback,
  FetchStopReason,
  MuxResult,
  SegmentAttemptResult,
  SegmentFetchOptions,
  SegmentFetchResult,
  SleepFunction,
} from "./types.js";

// FFmpeg utilities
export { buildConcatArgs, checkFfmpeg, concatWithManifest } from "./ffmpeg.js";
