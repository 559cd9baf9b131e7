/**
 * Entry point: load and validate config, start the gateway, stop it on SIGINT/SIGTERM.
 * Startup failures (bad config, port in use) exit with code 1 before any session is accepted.
 */

import { loadConfig, validateConfig } from "./config";
import { VoiceGateway } from "./gateway";
import { logger, logError } from "./logging";

async function main(): Promise<void> {
  const config = loadConfig();
  validateConfig(config);
  const gateway = new VoiceGateway(config);
  await gateway.start();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info({ event: "SHUTDOWN", signal }, "Shutting down");
    gateway
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logError(logger, err instanceof Error ? err : new Error(String(err)));
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logError(logger, err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});
