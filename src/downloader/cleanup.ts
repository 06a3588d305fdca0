import { join } from "node:path";
import { readdir, unlink } from "../shared/fs.js";
import { SEGMENT_EXTENSION } from "../shared/filename.js";

/**
 * Deletes every file or symlink directly inside `dir` whose name ends with
 * `extension`. A symlink is removed, not its target. Subdirectories and other
 * files are left alone.
 *
 * @returns Names of the deleted files.
 */
export async function cleanupSegments(dir: string, extension = SEGMENT_EXTENSION): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const removed: string[] = [];

  for (const entry of entries) {
    if (!(entry.isFile() || entry.isSymbolicLink()) || !entry.name.endsWith(extension)) continue;
    await unlink(join(dir, entry.name));
    removed.push(entry.name);
  }

  return removed;
}
