import chalk from "chalk";
import {
  getConfigPath,
  getConfigValue,
  loadConfig,
  setConfigValue,
} from "../../config/configManager.js";
import { type Config, configSchema } from "../../config/schema.js";

function isConfigKey(key: string): key is keyof Config {
  return Object.hasOwn(configSchema.shape, key);
}

function rejectUnknownKey(key: string): void {
  console.log(chalk.red(`\n❌ Unknown config key: ${key}`));
  console.log(chalk.gray(`   Valid keys: ${Object.keys(configSchema.shape).join(", ")}\n`));
  process.exitCode = 1;
}

/**
 * Shows all current configuration values.
 */
export function configShowCommand(): void {
  const config = loadConfig();

  console.log(chalk.blue("\n⚙️  Configuration\n"));
  console.log(chalk.gray(`   File: ${getConfigPath()}\n`));

  for (const [key, value] of Object.entries(config)) {
    console.log(`   ${chalk.cyan(key)}: ${chalk.white(String(value))}`);
  }
  console.log();
}

/**
 * Parses a raw CLI string into the type the current value has.
 * Returns null for an unparsable number.
 */
export function parseConfigValue(
  currentValue: Config[keyof Config],
  value: string
): string | number | boolean | null {
  if (typeof currentValue === "boolean") {
    return value === "true" || value === "1";
  }
  if (typeof currentValue === "number") {
    const parsed = Number(value);
    return Number.isInteger(parsed) ? parsed : null;
  }
  return value;
}

/**
 * Sets a configuration value.
 */
export function configSetCommand(key: string, value: string): void {
  if (!isConfigKey(key)) {
    rejectUnknownKey(key);
    return;
  }

  const parsedValue = parseConfigValue(getConfigValue(key), value);
  if (parsedValue === null) {
    console.log(chalk.red(`\n❌ Invalid number: ${value}\n`));
    process.exitCode = 1;
    return;
  }

  try {
    setConfigValue(key, parsedValue);
    console.log(chalk.green(`\n✅ Set ${key} = ${String(parsedValue)}\n`));
  } catch (error) {
    console.log(chalk.red(`\n❌ Invalid value for ${key}: ${value}`));
    console.log(chalk.gray(`   ${String(error)}\n`));
    process.exitCode = 1;
  }
}

/**
 * Gets a specific configuration value.
 */
export function configGetCommand(key: string): void {
  if (!isConfigKey(key)) {
    rejectUnknownKey(key);
    return;
  }

  console.log(String(getConfigValue(key)));
}
