import { ConsoleLogger, errorMessage, loadConfig, loadEnvFile, type AppConfig } from "@lolqa/core";
import { startServices } from "./services.js";

loadEnvFile();

const bootLogger = new ConsoleLogger("lolqa");

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    bootLogger.error(errorMessage(err));
    process.exit(1);
  }
}

const config = readConfig();

const logger = new ConsoleLogger("lolqa", config.logLevel);
logger.info("starting", { service: config.service });

const running = await startServices(config, logger);

let stopping = false;
async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (stopping) return;
  stopping = true;
  logger.info("shutting down", { signal });
  try {
    await running.stop();
    process.exit(0);
  } catch (err) {
    logger.error("shutdown failed", { error: errorMessage(err) });
    process.exit(1);
  }
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}
