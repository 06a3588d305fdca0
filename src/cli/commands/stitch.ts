import { createInterface } from "node:readline/promises";
import chalk from "chalk";
import ora, { type Ora } from "ora";
import { z } from "zod";
import { loadConfig } from "../../config/configManager.js";
import type { StitchConfig } from "../../config/schema.js";
import { resolveStitchConfig, type StitchInput } from "../../config/stitchConfig.js";
import {
  checkFfmpeg,
  stitchSegments,
  type FetchEvent,
  type StitchPhase,
  type StitchResult,
} from "../../downloader/index.js";
import { createShutdownManager } from "../../shared/shutdown.js";
import { SEGMENT_MARKER } from "../../shared/url.js";
import { formatAttemptText, formatFetchEvent } from "./format.js";

export interface StitchOptions {
  output?: string;
  workDir?: string;
  outputDir?: string;
  retries?: number;
  backoff?: number;
  timeout?: number;
  maxFailures?: number;
  keepSegments?: boolean;
}

const PHASE_TEXT: Record<StitchPhase, string> = {
  fetching: "Starting download...",
  "writing-manifest": "Writing ffmpeg file list...",
  muxing: "Combining segments with ffmpeg...",
  cleanup: "Deleting segment files...",
};

/**
 * Asks for the values the original two prompts collected, when they were not given as arguments.
 */
async function promptForMissing(
  url: string | undefined,
  output: string | undefined
): Promise<{ url: string; output: string | undefined }> {
  if (url && output !== undefined) {
    return { url, output };
  }

  if (!process.stdin.isTTY) {
    if (!url) {
      throw new Error(`No URL given. Pass a segment URL containing "${SEGMENT_MARKER}".`);
    }
    return { url, output };
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answeredUrl =
      url ?? (await rl.question(`Enter the full URL with ${SEGMENT_MARKER} segment: `));
    const answeredOutput =
      output ??
      (await rl.question("Enter output video file name (blank for the default, e.g. video.mp4): "));
    return { url: answeredUrl, output: answeredOutput };
  } finally {
    rl.close();
  }
}

/**
 * Prints a line above the spinner without breaking its animation.
 */
function logAbove(spinner: Ora, line: string): void {
  spinner.clear();
  console.log(line);
  spinner.render();
}

function renderEvent(spinner: Ora, event: FetchEvent): void {
  if (event.type === "attempt") {
    spinner.text = formatAttemptText(event);
    return;
  }

  const line = formatFetchEvent(event);
  if (!line) return;

  switch (event.type) {
    case "segment-saved":
      logAbove(spinner, chalk.gray(`   ${line}`));
      break;
    case "attempt-failed":
      logAbove(spinner, chalk.yellow(`   ${line}`));
      break;
    case "segment-failed":
      logAbove(spinner, chalk.red(`   ${line}`));
      break;
    case "stopped":
      logAbove(spinner, chalk.blue(`\n   ${line}`));
      break;
  }
}

function printResult(result: StitchResult, config: StitchConfig): void {
  switch (result.state) {
    case "empty":
      console.log(chalk.yellow("\n⚠️  No .ts files were downloaded."));
      console.log(chalk.gray("   Check that the URL points at segment 000000 and is still valid.\n"));
      return;
    case "mux-failed": {
      console.log(chalk.red(`\n❌ ${result.mux?.error ?? "ffmpeg failed"}`));
      const stderrTail = result.mux?.stderr.trim().split("\n").slice(-5) ?? [];
      for (const line of stderrTail) {
        if (line) console.log(chalk.gray(`   ${line}`));
      }
      console.log(chalk.gray(`   Segments kept in ${config.workDir}`));
      if (result.manifestPath) {
        console.log(chalk.gray(`   File list: ${result.manifestPath}\n`));
      }
      return;
    }
    case "done":
      console.log(chalk.green(`\n✅ Combined ${result.files.length} segments into ${result.outputPath}`));
      if (config.keepSegments) {
        console.log(chalk.gray(`   Segments kept in ${config.workDir}\n`));
      } else {
        console.log(chalk.gray(`   Deleted ${result.removed.length} .ts files.\n`));
      }
      return;
  }
}

/**
 * Downloads every segment of a templated URL and stitches them into one file.
 */
export async function stitchCommand(url: string | undefined, options: StitchOptions): Promise<void> {
  const answers = await promptForMissing(url, options.output);

  const input: StitchInput = {
    url: answers.url,
    output: answers.output,
    workDir: options.workDir,
    outputDir: options.outputDir,
    retries: options.retries,
    backoffMs: options.backoff,
    timeoutMs: options.timeout,
    maxFailures: options.maxFailures,
    keepSegments: options.keepSegments,
  };

  let config: StitchConfig;
  try {
    config = resolveStitchConfig(input, loadConfig());
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.log(chalk.red("\n❌ Invalid input"));
      console.log(chalk.gray(`   ${z.prettifyError(error).split("\n").join("\n   ")}\n`));
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  console.log(chalk.blue("\n🎬 segstitch\n"));
  console.log(chalk.gray(`   Output:   ${config.outputPath}`));
  console.log(chalk.gray(`   Segments: ${config.workDir}`));
  console.log(
    chalk.gray(
      `   Policy:   ${config.retries} attempts per segment, stop after ${config.maxConsecutiveFailures} failed segments in a row\n`
    )
  );

  if (!(await checkFfmpeg())) {
    console.log(chalk.yellow("⚠️  ffmpeg was not found on PATH; segments will download but cannot be combined.\n"));
  }

  const shutdown = createShutdownManager();
  shutdown.setup();

  const spinner = ora(PHASE_TEXT.fetching).start();
  shutdown.registerCleanup(() => {
    spinner.text = "Finishing current segment...";
  });

  let result: StitchResult;
  try {
    result = await stitchSegments(config, {
      shouldContinue: shutdown.shouldContinue,
      onEvent: (event) => renderEvent(spinner, event),
      onPhase: (phase) => {
        spinner.text = PHASE_TEXT[phase];
      },
    });
  } catch (error) {
    spinner.fail("Run failed");
    throw error;
  }

  if (result.state === "mux-failed") {
    spinner.fail("Could not combine segments");
    process.exitCode = 1;
  } else if (result.state === "empty") {
    spinner.warn("Nothing to combine");
  } else {
    spinner.succeed("Done");
  }

  printResult(result, config);
}
