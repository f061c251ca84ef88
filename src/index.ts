import "dotenv/config";

import { loadConfig, type AppConfig } from "./config";
import { AppLogger, normalizeError } from "./logger";
import { createRuntime, type Runtime, type RuntimeOverrides } from "./runtime";

export type { Runtime, RuntimeOverrides } from "./runtime";
export type { ChatConsumer, ChatSender } from "./event-router";

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    // Config errors should fail fast before runtime starts.
    console.error("config_load_failed", normalizeError(error));
    process.exit(1);
    throw error;
  }
}

/**
 * Boots the service with process signal handling. Collaborators (chat
 * commands, account linking, an outgoing chat client) pass their pieces in
 * and attach through the returned runtime.
 */
export function startEconomy(overrides: RuntimeOverrides = {}): Runtime {
  const config = loadConfigOrExit();
  const logger = new AppLogger({ logPath: config.logPath, console: config.logToConsole });
  const runtime = createRuntime(config, logger, overrides);
  let shuttingDown = false;

  const shutdown = (reason: string, exitCode: number): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn("shutdown_started", { reason, exitCode });

    const forceExit = setTimeout(() => {
      logger.error("shutdown_forced_exit", { reason });
      process.exit(exitCode);
    }, 5000);
    forceExit.unref();

    void runtime
      .stop()
      .catch((error: unknown) => {
        logger.error("shutdown_failed", normalizeError(error));
      })
      .finally(() => {
        clearTimeout(forceExit);
        logger.info("shutdown_completed", { reason, exitCode });
        process.exit(exitCode);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT", 0));
  process.on("SIGTERM", () => shutdown("SIGTERM", 0));
  process.on("uncaughtException", (error) => {
    logger.error("uncaught_exception", normalizeError(error));
    shutdown("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("unhandled_rejection", normalizeError(reason));
    shutdown("unhandledRejection", 1);
  });

  runtime.start();
  return runtime;
}

if (require.main === module) {
  startEconomy();
}
