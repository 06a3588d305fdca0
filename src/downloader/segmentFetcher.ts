/**
 * Sequential segment fetcher.
 * Walks a numbered segment URL from index 0 until the server stops answering.
 */
import { createWriteStream } from "node:fs";
import { join } from "node:path";
import { pipeline } from "node:stream/promises";
import delay from "delay";
import type { KyInstance } from "ky";
import { ensureDir, removeFile } from "../shared/fs.js";
import { getSegmentFilename } from "../shared/filename.js";
import { createSegmentClient, DEFAULT_TIMEOUT_MS } from "../shared/http.js";
import { buildSegmentUrl, isSegmentTemplate, SEGMENT_MARKER } from "../shared/url.js";
import type {
  FetchEvent,
  FetchStopReason,
  SegmentAttemptResult,
  SegmentFetchOptions,
  SegmentFetchResult,
} from "./shared/types.js";

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_RETRIES = 3;
export const DEFAULT_BACKOFF_MS = 2000;

/**
 * Whole-segment failures in a row that end a run.
 * Without a playlist there is no other end-of-stream signal, so a gap of
 * this many missing segments is taken to mean the stream is over.
 */
export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 5;

/**
 * Size of the chunks a response body is written to disk in.
 */
export const SEGMENT_CHUNK_SIZE = 8192;

// ============================================================================
// Errors
// ============================================================================

/**
 * Thrown when a base URL lacks the segment marker and cannot be templated.
 */
export class SegmentTemplateError extends Error {
  public readonly url: string;

  constructor(url: string) {
    super(`URL does not contain the segment marker "${SEGMENT_MARKER}": ${url}`);
    this.name = "SegmentTemplateError";
    this.url = url;
  }
}

/**
 * Thrown when a response body sends no data for longer than the idle timeout.
 */
export class BodyStallError extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No data received for ${timeoutMs}ms`);
    this.name = "BodyStallError";
    this.timeoutMs = timeoutMs;
  }
}

// ============================================================================
// Pure helpers
// ============================================================================

/**
 * Wait before retrying after failed attempt `attempt` (1-based).
 * Linear: 1×, 2×, 3× the base.
 */
export function backoffDelay(backoffMs: number, attempt: number): number {
  return backoffMs * attempt;
}

function readWithin(reader: ReadableStreamDefaultReader<Uint8Array>, timeoutMs: number) {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const stalled = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new BodyStallError(timeoutMs)), timeoutMs);
  });
  return Promise.race([reader.read(), stalled]).finally(() => clearTimeout(timer));
}

/**
 * Re-chunks a response body into fixed-size buffers.
 * The last buffer may be shorter.
 *
 * Each read must deliver data within `idleTimeoutMs`, otherwise a
 * `BodyStallError` is thrown. A body left unfinished, by a stall or by the
 * consumer stopping early, is cancelled.
 */
export async function* chunkBody(
  body: ReadableStream<Uint8Array>,
  chunkSize = SEGMENT_CHUNK_SIZE,
  idleTimeoutMs = DEFAULT_TIMEOUT_MS
): AsyncGenerator<Buffer> {
  const reader = body.getReader();
  let pending: Buffer = Buffer.alloc(0);
  let open = true;

  try {
    while (true) {
      let result: Awaited<ReturnType<typeof reader.read>>;
      try {
        result = await readWithin(reader, idleTimeoutMs);
      } catch (error) {
        // An errored stream is already closed; only a stall leaves it open.
        if (!(error instanceof BodyStallError)) open = false;
        throw error;
      }

      if (result.done) {
        open = false;
        break;
      }

      pending =
        pending.length > 0 ? Buffer.concat([pending, result.value]) : Buffer.from(result.value);
      while (pending.length >= chunkSize) {
        yield pending.subarray(0, chunkSize);
        pending = pending.subarray(chunkSize);
      }
    }

    if (pending.length > 0) {
      yield pending;
    }
  } finally {
    if (open) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

// ============================================================================
// Single segment
// ============================================================================

/**
 * Makes one attempt at downloading a segment to `filePath`.
 * Only HTTP 200 counts as success; anything else, including a thrown
 * transport error or a body that stalls for `timeoutMs`, is reported as a
 * failed attempt.
 */
export async function downloadSegment(
  client: KyInstance,
  url: string,
  filePath: string,
  timeoutMs = DEFAULT_TIMEOUT_MS
): Promise<SegmentAttemptResult> {
  let response: Response;
  try {
    response = await client.get(url);
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      errorCode: "NETWORK_ERROR",
    };
  }

  if (response.status !== 200) {
    await response.body?.cancel();
    return {
      success: false,
      statusCode: response.status,
      error: `HTTP ${response.status}`,
      errorCode: "HTTP_ERROR",
    };
  }

  let bytes = 0;
  const body = response.body;

  async function* counted(): AsyncGenerator<Buffer> {
    if (!body) return;
    for await (const chunk of chunkBody(body, SEGMENT_CHUNK_SIZE, timeoutMs)) {
      bytes += chunk.length;
      yield chunk;
    }
  }

  try {
    await pipeline(counted(), createWriteStream(filePath));
    return { success: true, statusCode: 200, bytes, outputPath: filePath };
  } catch (error) {
    await removeFile(filePath);
    return {
      success: false,
      statusCode: 200,
      error: `Stream error: ${error instanceof Error ? error.message : String(error)}`,
      errorCode: "DOWNLOAD_FAILED",
    };
  }
}

// ============================================================================
// Fetch loop
// ============================================================================

/**
 * Downloads segments 0, 1, 2, … of a templated URL into `workDir`.
 *
 * Each segment gets `retries` attempts with linear backoff between them.
 * A segment whose attempts are all exhausted counts as one failure; any
 * successful segment resets the count. The run ends once
 * `maxConsecutiveFailures` failures happen in a row.
 *
 * @returns Saved paths in increasing index order.
 */
export async function fetchSegments(options: SegmentFetchOptions): Promise<SegmentFetchResult> {
  const {
    baseUrl,
    workDir,
    retries = DEFAULT_RETRIES,
    backoffMs = DEFAULT_BACKOFF_MS,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    maxConsecutiveFailures = DEFAULT_MAX_CONSECUTIVE_FAILURES,
    sleep = delay,
    onEvent,
    shouldContinue,
  } = options;

  if (!isSegmentTemplate(baseUrl)) {
    throw new SegmentTemplateError(baseUrl);
  }

  const client = options.client ?? createSegmentClient({ timeoutMs });
  const attempts = Math.max(1, retries);
  const emit = (event: FetchEvent): void => onEvent?.(event);

  await ensureDir(workDir);

  const files: string[] = [];
  let index = 0;
  let consecutiveFailures = 0;
  let stopReason: FetchStopReason;

  while (true) {
    if (shouldContinue && !shouldContinue()) {
      stopReason = "aborted";
      break;
    }

    const url = buildSegmentUrl(baseUrl, index);
    const filePath = join(workDir, getSegmentFilename(index));
    let saved: SegmentAttemptResult | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      emit({ type: "attempt", index, url, attempt, retries: attempts });

      const result = await downloadSegment(client, url, filePath, timeoutMs);
      if (result.success) {
        saved = result;
        break;
      }

      const retryInMs = attempt < attempts ? backoffDelay(backoffMs, attempt) : undefined;
      emit({
        type: "attempt-failed",
        index,
        url,
        attempt,
        retries: attempts,
        error: result.error ?? "Unknown error",
        statusCode: result.statusCode,
        retryInMs,
      });

      if (retryInMs !== undefined) {
        await sleep(retryInMs);
      }
    }

    if (saved) {
      files.push(filePath);
      consecutiveFailures = 0;
      emit({ type: "segment-saved", index, url, path: filePath, bytes: saved.bytes ?? 0 });
    } else {
      consecutiveFailures++;
      emit({ type: "segment-failed", index, url, retries: attempts, consecutiveFailures });
    }

    index++;

    if (consecutiveFailures >= maxConsecutiveFailures) {
      stopReason = "max-failures";
      break;
    }
  }

  emit({ type: "stopped", reason: stopReason, downloaded: files.length });

  return { files, attemptedSegments: index, stopReason };
}
