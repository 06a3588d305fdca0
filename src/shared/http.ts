import ky, { type KyInstance, type Options } from "ky";

/**
 * Default User-Agent for HTTP requests.
 * Mimics a standard Chrome browser on macOS.
 */
export const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/**
 * Default per-request timeout for segment downloads.
 */
export const DEFAULT_TIMEOUT_MS = 10000;

/**
 * Creates the HTTP client used for segment downloads.
 *
 * ky's own retries are disabled: the segment fetcher applies its own linear
 * backoff and counts every attempt. Non-2xx responses are returned instead of
 * thrown so the caller can inspect the status code.
 */
export function createSegmentClient(
  options: { timeoutMs?: number | undefined; fetch?: Options["fetch"] } = {}
): KyInstance {
  return ky.create({
    headers: {
      "User-Agent": USER_AGENT,
      Accept: "*/*",
    },
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    retry: 0,
    throwHttpErrors: false,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
}
