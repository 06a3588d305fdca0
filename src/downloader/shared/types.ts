/**
 * Shared types for the segment download pipeline.
 */
import type { KyInstance } from "ky";

// ============================================================================
// Result Types
// ============================================================================

/**
 * Base result interface for download and merge operations.
 */
export interface DownloadResult {
  success: boolean;
  error?: string | undefined;
  errorCode?: CommonErrorCode | undefined;
  outputPath?: string | undefined;
}

/**
 * Result of one HTTP attempt for a single segment.
 */
export interface SegmentAttemptResult extends DownloadResult {
  /** HTTP status code, absent when the request never got a response */
  statusCode?: number | undefined;
  /** Bytes written to disk */
  bytes?: number | undefined;
}

/**
 * Why the fetch loop ended.
 * - `max-failures`: the consecutive-failure threshold was reached
 * - `aborted`: the caller asked to stop (e.g. Ctrl+C)
 */
export type FetchStopReason = "max-failures" | "aborted";

/**
 * Result of a whole fetch run.
 */
export interface SegmentFetchResult {
  /** Saved segment paths, in increasing index order */
  files: string[];
  /** Number of segment indices that were tried */
  attemptedSegments: number;
  stopReason: FetchStopReason;
}

/**
 * Result of running ffmpeg against a concat manifest.
 */
export interface MuxResult extends DownloadResult {
  /** Process exit code, absent when the process could not be spawned */
  exitCode?: number | undefined;
  /** Captured stderr of the ffmpeg process */
  stderr: string;
}

// ============================================================================
// Events
// ============================================================================

/**
 * Progress events emitted by the segment fetcher.
 * The fetcher never prints; callers decide how to render these.
 */
export type FetchEvent =
  | { type: "attempt"; index: number; url: string; attempt: number; retries: number }
  | {
      type: "attempt-failed";
      index: number;
      url: string;
      attempt: number;
      retries: number;
      error: string;
      statusCode?: number | undefined;
      /** Milliseconds until the next attempt, absent after the last one */
      retryInMs?: number | undefined;
    }
  | { type: "segment-saved"; index: number; url: string; path: string; bytes: number }
  | {
      type: "segment-failed";
      index: number;
      url: string;
      retries: number;
      consecutiveFailures: number;
    }
  | { type: "stopped"; reason: FetchStopReason; downloaded: number };

export type FetchEventCallback = (event: FetchEvent) => void;

// ============================================================================
// Options
// ============================================================================

/**
 * Sleep function used between retry attempts.
 */
export type SleepFunction = (ms: number) => Promise<void>;

/**
 * Options for fetching a run of numbered segments.
 */
export interface SegmentFetchOptions {
  /** URL containing the `-000000.ts` marker */
  baseUrl: string;
  /** Directory segments are written to */
  workDir: string;
  /** Attempts per segment */
  retries?: number | undefined;
  /** Base backoff in milliseconds; the wait before attempt k+1 is `backoffMs * k` */
  backoffMs?: number | undefined;
  /** Per-attempt timeout in milliseconds */
  timeoutMs?: number | undefined;
  /** Whole-segment failures in a row that end the run */
  maxConsecutiveFailures?: number | undefined;
  /** HTTP client, defaults to a client built from `timeoutMs` */
  client?: KyInstance | undefined;
  sleep?: SleepFunction | undefined;
  onEvent?: FetchEventCallback | undefined;
  /** Returns false to stop before the next segment */
  shouldContinue?: (() => boolean) | undefined;
}

// ============================================================================
// Common Error Codes
// ============================================================================

/**
 * Standard error codes used across the pipeline.
 */
export type CommonErrorCode =
  // Network errors
  | "NETWORK_ERROR"
  | "HTTP_ERROR"
  // Download errors
  | "DOWNLOAD_FAILED"
  // Tool errors
  | "FFMPEG_NOT_FOUND"
  | "MERGE_FAILED";
