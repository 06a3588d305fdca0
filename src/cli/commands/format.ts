import { basename } from "node:path";
import type { FetchEvent } from "../../downloader/index.js";
import { describeUrl } from "../../shared/url.js";

/**
 * Formats a byte count for display.
 * Example: formatBytes(1536) → "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Turns a fetch event into a console line.
 * Returns null for events that only update the spinner.
 */
export function formatFetchEvent(event: FetchEvent): string | null {
  switch (event.type) {
    case "attempt":
      return null;
    case "attempt-failed": {
      const reason =
        event.statusCode !== undefined ? `status code ${event.statusCode}` : event.error;
      const retry =
        event.retryInMs !== undefined ? `, retrying in ${event.retryInMs / 1000}s` : "";
      return `Attempt ${event.attempt}/${event.retries} failed for segment ${event.index} (${reason})${retry}`;
    }
    case "segment-saved":
      return `Downloaded ${basename(event.path)} (${formatBytes(event.bytes)})`;
    case "segment-failed":
      return `Failed to download ${describeUrl(event.url)} after ${event.retries} attempts (${event.consecutiveFailures} in a row)`;
    case "stopped":
      return event.reason === "aborted"
        ? `Stopped by user after ${event.downloaded} segments`
        : `Reached maximum consecutive failures, stopping (${event.downloaded} segments downloaded)`;
  }
}

/**
 * Spinner text while a segment is being requested.
 */
export function formatAttemptText(event: Extract<FetchEvent, { type: "attempt" }>): string {
  return `Downloading segment ${event.index} (attempt ${event.attempt}/${event.retries})...`;
}
