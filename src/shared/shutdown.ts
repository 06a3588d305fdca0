/**
 * Graceful shutdown management for CLI commands.
 * The first signal asks long-running loops to stop; a second one exits immediately.
 */
import chalk from "chalk";

/**
 * Shutdown manager instance returned by createShutdownManager.
 */
export interface ShutdownManager {
  /** Set up SIGINT and SIGTERM handlers. Call once at command start. */
  setup: () => void;
  /** Returns false if shutdown has been requested. Use in loops. */
  shouldContinue: () => boolean;
  /** Register a cleanup callback run when shutdown is requested. */
  registerCleanup: (fn: () => void | Promise<void>) => void;
}

/**
 * Creates a shutdown manager for graceful CLI termination.
 *
 * @example
 * ```typescript
 * const shutdown = createShutdownManager();
 * shutdown.setup();
 *
 * while (shutdown.shouldContinue() && hasMoreWork) {
 *   // Process work...
 * }
 * ```
 */
export function createShutdownManager(): ShutdownManager {
  let shuttingDown = false;
  let onCleanup: (() => Promise<void>) | undefined;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      // Force exit on second signal
      console.log(chalk.red("\n\n⚠️  Force exit"));
      process.exit(1);
    }

    shuttingDown = true;
    console.log(
      chalk.yellow(`\n\n⏹️  ${signal} received, finishing with the segments downloaded so far...`)
    );
    console.log(chalk.gray("   Press Ctrl+C again to exit immediately."));

    try {
      if (onCleanup) {
        await onCleanup();
      }
    } catch (error) {
      console.error(chalk.gray(`   Cleanup failed: ${String(error)}`));
    }
  };

  return {
    setup: () => {
      process.on("SIGINT", () => void shutdown("SIGINT"));
      process.on("SIGTERM", () => void shutdown("SIGTERM"));
    },

    shouldContinue: () => !shuttingDown,

    registerCleanup: (fn: () => void | Promise<void>) => {
      const previousCleanup = onCleanup;
      onCleanup = async () => {
        if (previousCleanup) {
          await previousCleanup();
        }
        await fn();
      };
    },
  };
}
