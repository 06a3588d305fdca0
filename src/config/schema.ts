import { z } from "zod";
import { isSegmentTemplate, SEGMENT_MARKER } from "../shared/url.js";

/**
 * Shared field definitions for retry and stop policy.
 */
const retries = z.number().int().min(1).max(10);
const backoffMs = z.number().int().min(0).max(60000);
const timeoutMs = z.number().int().min(1000).max(120000);
const maxConsecutiveFailures = z.number().int().min(1).max(100);

/**
 * Persisted defaults, editable via `segstitch config set`.
 */
export const configSchema = z.object({
  workDir: z.string().min(1).default("temp_files"),
  outputDir: z.string().min(1).default("output_video"),
  outputName: z.string().min(1).default("combined_video.mp4"),
  retries: retries.default(3),
  backoffMs: backoffMs.default(2000),
  timeoutMs: timeoutMs.default(10000),
  maxConsecutiveFailures: maxConsecutiveFailures.default(5),
  keepSegments: z.boolean().default(false),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Fully resolved settings for one stitch run.
 */
export const stitchConfigSchema = z.object({
  baseUrl: z.url().refine(isSegmentTemplate, {
    message: `URL must contain the segment marker "${SEGMENT_MARKER}"`,
  }),
  outputPath: z.string().min(1),
  workDir: z.string().min(1),
  retries,
  backoffMs,
  timeoutMs,
  maxConsecutiveFailures,
  keepSegments: z.boolean(),
});

export type StitchConfig = z.infer<typeof stitchConfigSchema>;
