export * from "./shared/index.js";
export {
  backoffDelay,
  chunkBody,
  DEFAULT_BACKOFF_MS,
  DEFAULT_MAX_CONSECUTIVE_FAILURES,
  DEFAULT_RETRIES,
  downloadSegment,
  fetchSegments,
  SEGMENT_CHUNK_SIZE,
  SegmentTemplateError,
} from "./segmentFetcher.js";
export { formatManifestLine, MANIFEST_FILENAME, writeConcatManifest } from "./manifest.js";
export { cleanupSegments } from "./cleanup.js";
export {
  stitchSegments,
  type StitchHooks,
  type StitchPhase,
  type StitchResult,
  type StitchState,
  type StitchSteps,
} from "./stitch.js";
