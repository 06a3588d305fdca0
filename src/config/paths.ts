import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import untildify from "untildify";

/**
 * Application directory paths.
 * Uses ~/.segstitch/ for easy access and visibility.
 */
export const APP_DIR = join(homedir(), ".segstitch");

/**
 * Expand ~ to home directory in paths.
 */
export function expandPath(path: string): string {
  return untildify(path);
}

/**
 * Resolves the output file path.
 * A bare file name lands in `outputDir`; anything with a directory part is used as given.
 */
export function resolveOutputPath(outputDir: string, outputName: string): string {
  const name = expandPath(outputName);
  if (isAbsolute(name) || name.includes("/") || name.includes("\\")) {
    return resolve(name);
  }
  return resolve(expandPath(outputDir), name);
}
