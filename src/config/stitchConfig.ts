import { resolve } from "node:path";
import { expandPath, resolveOutputPath } from "./paths.js";
import { type Config, type StitchConfig, stitchConfigSchema } from "./schema.js";

/**
 * Raw per-run input, e.g. from CLI flags or prompts. Missing values fall back to the persisted config.
 */
export interface StitchInput {
  url: string;
  output?: string | undefined;
  workDir?: string | undefined;
  outputDir?: string | undefined;
  retries?: number | undefined;
  backoffMs?: number | undefined;
  timeoutMs?: number | undefined;
  maxFailures?: number | undefined;
  keepSegments?: boolean | undefined;
}

/**
 * Merges run input over the persisted defaults and validates the result.
 * A blank output name falls back to the configured default.
 *
 * @throws ZodError when a value is out of range or the URL has no segment marker.
 */
export function resolveStitchConfig(input: StitchInput, defaults: Config): StitchConfig {
  const trimmedOutput = input.output?.trim();
  const outputName = trimmedOutput ? trimmedOutput : defaults.outputName;

  return stitchConfigSchema.parse({
    baseUrl: input.url.trim(),
    outputPath: resolveOutputPath(input.outputDir ?? defaults.outputDir, outputName),
    workDir: resolve(expandPath(input.workDir ?? defaults.workDir)),
    retries: input.retries ?? defaults.retries,
    backoffMs: input.backoffMs ?? defaults.backoffMs,
    timeoutMs: input.timeoutMs ?? defaults.timeoutMs,
    maxConsecutiveFailures: input.maxFailures ?? defaults.maxConsecutiveFailures,
    keepSegments: input.keepSegments ?? defaults.keepSegments,
  });
}
