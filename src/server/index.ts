import { createBot } from "../bot/index.js";
import { envInfo, loadConfig } from "../shared/config.js";
import { createLogger } from "../shared/logger.js";
import { createApp, WEBHOOK_PATH } from "./app.js";

const start = async () => {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, json: envInfo.isProdEnv });
  const bot = createBot(config, logger);

  const app = createApp({ bot, webhookSecret: config.webhookSecret });
  app.listen(config.port, () => {
    logger.info(`Webhook listening on http://localhost:${config.port}${WEBHOOK_PATH}`);
  });

  if (config.webhookUrl) {
    await bot.client.setWebhook(config.webhookUrl, config.webhookSecret);
    logger.info({ url: config.webhookUrl }, "Webhook registered");
  }
};

start().catch((error) => {
  console.error("Server failed to start:", error instanceof Error ? error.message : error);
  process.exit(1);
});
