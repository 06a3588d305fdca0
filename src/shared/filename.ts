/**
 * Filesystem-safe names for downloaded segments.
 */
import { formatSegmentIndex } from "./url.js";

/**
 * File extension of downloaded segments.
 */
export const SEGMENT_EXTENSION = ".ts";

/**
 * Removes every character outside letters, digits, space, ".", "_" and "-",
 * then trims surrounding whitespace.
 */
export function sanitizeFilename(filename: string): string {
  return filename.replace(/[^A-Za-z0-9 ._-]/g, "").trim();
}

/**
 * Gets the file name a segment is saved under.
 * Example: getSegmentFilename(12) → "000012.ts"
 */
export function getSegmentFilename(index: number): string {
  return sanitizeFilename(`${formatSegmentIndex(index)}${SEGMENT_EXTENSION}`);
}
