#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { configGetCommand, configSetCommand, configShowCommand } from "./commands/config.js";
import { stitchCommand, type StitchOptions } from "./commands/stitch.js";

// Global error handler to ensure clean exit
process.on("unhandledRejection", (reason) => {
  console.error(chalk.red("\n❌ Unhandled error"));
  if (reason instanceof Error) {
    console.error(chalk.gray(`   ${reason.message}`));
  }
  process.exit(1);
});

// Helper to wrap async actions and handle errors
function wrapAction<T extends unknown[]>(fn: (...args: T) => Promise<void>): (...args: T) => void {
  return (...args: T) => {
    fn(...args).catch((error: unknown) => {
      console.error(chalk.red("\n❌ Command failed"));
      if (error instanceof Error) {
        console.error(chalk.gray(`   ${error.message}`));
      }
      process.exit(1);
    });
  };
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

const program = new Command();

program
  .name("segstitch")
  .description("Download numbered .ts segments and stitch them into one video")
  .version("0.1.0");

program
  .command("stitch [url]", { isDefault: true })
  .description("Download all segments of a URL containing -000000.ts and combine them")
  .option("-o, --output <file>", "Output file name (placed in the output directory)")
  .option("--work-dir <dir>", "Directory for downloaded segments")
  .option("--output-dir <dir>", "Directory for the combined video")
  .option("--retries <n>", "Attempts per segment", parseInteger)
  .option("--backoff <ms>", "Base backoff between attempts in milliseconds", parseInteger)
  .option("--timeout <ms>", "Per-request timeout in milliseconds", parseInteger)
  .option("--max-failures <n>", "Stop after this many failed segments in a row", parseInteger)
  .option("--keep-segments", "Keep segment files after combining")
  .action(wrapAction(async (url: string | undefined, options: StitchOptions) => {
    await stitchCommand(url, options);
  }));

// Config commands
const configCmd = program.command("config").description("Manage default settings");

configCmd.command("show").description("Show all configuration values").action(configShowCommand);

configCmd.command("get <key>").description("Get a configuration value").action(configGetCommand);

configCmd
  .command("set <key> <value>")
  .description("Set a configuration value")
  .action(configSetCommand);

// Parse and run
program.parse();
