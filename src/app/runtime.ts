import { ConfigError, loadConfig } from "../config/env.js";
import { createLogger, errorMessage, type Logger } from "../lib/logger.js";
import { WeatherArchiver } from "../services/weather-archiver.js";
import { CITIES, runArchive } from "./archive-run.js";

export async function runRuntime(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config.logLevel);

  const archiver = new WeatherArchiver(config, { log });
  await archiver.ensureBucketExists();
  await runArchive(archiver, CITIES, { log });
}

export function reportAbortedRun(error: unknown, log: Logger): void {
  if (error instanceof ConfigError) {
    log.error("Weather archive run aborted: configuration", {
      variables: error.variables,
      error: error.message
    });
    return;
  }

  log.error("Weather archive run aborted", { error: errorMessage(error) });
}
