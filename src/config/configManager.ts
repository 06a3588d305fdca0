import Conf from "conf";
import { APP_DIR } from "./paths.js";
import { type Config, configSchema } from "./schema.js";

/**
 * Application configuration store using conf package.
 * Provides atomic writes, dot-notation access, and safe defaults.
 */
const store = new Conf<Config>({
  projectName: "segstitch",
  cwd: APP_DIR,
  configName: "config",
  defaults: configSchema.parse({}),
});

/**
 * Loads the application configuration.
 * Returns validated config with defaults applied.
 */
export function loadConfig(): Config {
  // Validate with zod to ensure type safety
  return configSchema.parse(store.store);
}

/**
 * Sets one config value, validating the whole config before saving.
 */
export function setConfigValue(key: keyof Config, value: unknown): Config {
  const updated = configSchema.parse({ ...loadConfig(), [key]: value });
  store.store = updated;
  return updated;
}

/**
 * Gets a specific config value.
 */
export function getConfigValue<K extends keyof Config>(key: K): Config[K] {
  return store.get(key);
}

/**
 * Gets the path to the config file.
 */
export function getConfigPath(): string {
  return store.path;
}
