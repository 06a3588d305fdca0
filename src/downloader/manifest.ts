/**
 * Concat-demuxer manifest ("file list") for ffmpeg.
 */
import { basename, join } from "node:path";
import { ensureDir, writeFile } from "../shared/fs.js";

export const MANIFEST_FILENAME = "file_list.txt";

/**
 * Formats one manifest entry. Only the base name is written, so ffmpeg
 * resolves it against the manifest's own directory.
 */
export function formatManifestLine(filePath: string): string {
  return `file '${basename(filePath)}'`;
}

/**
 * Writes the manifest for `files` into `workDir`, preserving their order.
 * @returns Path of the written manifest.
 */
export async function writeConcatManifest(files: string[], workDir: string): Promise<string> {
  await ensureDir(workDir);
  const manifestPath = join(workDir, MANIFEST_FILENAME);
  const content = files.map((file) => `${formatManifestLine(file)}\n`).join("");
  await writeFile(manifestPath, content, "utf-8");
  return manifestPath;
}
