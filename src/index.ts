import "dotenv/config";

import { reportAbortedRun, runRuntime } from "./app/runtime.js";
import { logger } from "./lib/logger.js";

void runRuntime().catch((error: unknown) => {
  reportAbortedRun(error, logger);
  process.exitCode = 1;
});
