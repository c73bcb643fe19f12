/**
 * Study Loop Backend
 *
 * Entry point for the Hono server exposing the review operations to the
 * external review agent over REST.
 */

import { startServer } from "./server.js";
import { loadStudyConfig } from "./study-config.js";
import { serverLog as log } from "./logger.js";

async function main(): Promise<void> {
  await startServer(await loadStudyConfig());
}

main().catch((error: unknown) => {
  log.error("Failed to start server", error);
  process.exit(1);
});
