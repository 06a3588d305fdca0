import { mkdir, unlink } from "node:fs/promises";

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
}

/**
 * Remove a file if it exists.
 */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch {
    return false;
  }
}

// Re-export commonly used fs/promises functions
export { readdir, unlink, writeFile } from "node:fs/promises";
