import { createBot } from "./bot/index.js";
import { createApp } from "./server/app.js";
import { envInfo, loadConfig } from "./shared/config.js";
import { createLogger } from "./shared/logger.js";

// Serverless entrypoint: the platform routes webhook calls to this app.
const config = loadConfig();
const logger = createLogger({ level: config.logLevel, json: envInfo.isProdEnv });
const app = createApp({ bot: createBot(config, logger), webhookSecret: config.webhookSecret });

export default app;
