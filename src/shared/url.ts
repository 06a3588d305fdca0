/**
 * Segment URL templating.
 *
 * Segment URLs follow a `<prefix>-000000.ts<suffix>` convention where only the
 * six-digit counter changes between segments.
 */

/**
 * The literal marker every base URL must contain.
 */
export const SEGMENT_MARKER = "-000000.ts";

/**
 * Width of the zero-padded segment counter.
 */
export const SEGMENT_INDEX_WIDTH = 6;

/**
 * Checks whether a URL can be used as a segment template.
 */
export function isSegmentTemplate(url: string): boolean {
  return url.includes(SEGMENT_MARKER);
}

/**
 * Renders a segment index as a zero-padded decimal string.
 *
 * @example
 * formatSegmentIndex(42)
 * // => "000042"
 */
export function formatSegmentIndex(index: number): string {
  return String(index).padStart(SEGMENT_INDEX_WIDTH, "0");
}

/**
 * Builds the URL of a single segment by substituting its index into the marker.
 * Everything outside the marker (host, path, query, fragment) is kept verbatim.
 *
 * @example
 * buildSegmentUrl("https://cdn.example.com/v/clip-000000.ts?token=abc", 7)
 * // => "https://cdn.example.com/v/clip-000007.ts?token=abc"
 */
export function buildSegmentUrl(baseUrl: string, index: number): string {
  // A replacer function keeps "$" sequences in the URL from being interpreted
  return baseUrl.replace(SEGMENT_MARKER, () => `-${formatSegmentIndex(index)}.ts`);
}

/**
 * Extracts the query string from a URL (including the leading ?).
 * Returns empty string if no query params exist.
 *
 * @example
 * extractQueryParams("https://example.com/path?foo=bar&baz=1")
 * // => "?foo=bar&baz=1"
 */
export function extractQueryParams(url: string): string {
  const queryStart = url.indexOf("?");
  return queryStart !== -1 ? url.substring(queryStart) : "";
}

/**
 * Shortens a URL for console output, keeping the path but hiding long signed query strings.
 */
export function describeUrl(url: string, maxLength = 100): string {
  const query = extractQueryParams(url);
  const withoutQuery = query ? url.slice(0, -query.length) : url;
  const shown = query ? `${withoutQuery}?…` : withoutQuery;
  return shown.length > maxLength ? `${shown.substring(0, maxLength)}…` : shown;
}
