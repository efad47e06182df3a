import { PropertyService } from "../collector/service.js";
import type { AppConfig } from "../shared/config.js";
import type { Logger } from "../shared/logger.js";
import { BotCommands } from "./commands.js";
import type { DispatchDeps } from "./dispatch.js";
import { TelegramClient } from "./telegram.js";

export type Bot = DispatchDeps & { client: TelegramClient };

export const createBot = (config: AppConfig, logger: Logger): Bot => {
  const properties = new PropertyService(config, logger);
  const client = new TelegramClient(config.telegramToken, { timeoutMs: config.requestTimeoutMs });
  return {
    client,
    commands: new BotCommands({ properties }),
    logger,
    maxLength: config.messageMaxLength
  };
};
