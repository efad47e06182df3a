import { createBot } from "./bot/index.js";
import { runPolling } from "./bot/polling.js";
import { envInfo, loadConfig } from "./shared/config.js";
import { createLogger } from "./shared/logger.js";

const run = async () => {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, json: envInfo.isProdEnv });
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  process.once("SIGTERM", () => controller.abort());

  logger.info("Starting bot in polling mode...");
  await runPolling(createBot(config, logger), controller.signal);
  logger.info("Polling stopped.");
};

run().catch((error) => {
  console.error("Polling failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
