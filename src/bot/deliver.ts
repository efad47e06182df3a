import { splitText } from "../report/chunk.js";
import type { Logger } from "../shared/logger.js";
import type { Reply } from "./commands.js";
import type { TelegramClient } from "./telegram.js";

export type DeliveryClient = Pick<TelegramClient, "sendMessage" | "sendPhoto" | "sendChatAction">;

export type DeliveryOptions = {
  maxLength: number;
  logger: Logger;
};

export type DeliveryReport = {
  sent: number;
  failed: number;
};

/**
 * Sends replies in order, long texts as consecutive chunks. A failed send is
 * logged and skipped; later chunks and replies still go out.
 */
export const deliverReplies = async (
  client: DeliveryClient,
  chatId: number,
  replies: Reply[],
  options: DeliveryOptions
): Promise<DeliveryReport> => {
  const report: DeliveryReport = { sent: 0, failed: 0 };

  const attempt = async (label: string, send: () => Promise<unknown>) => {
    try {
      await send();
      report.sent += 1;
    } catch (error) {
      report.failed += 1;
      options.logger.error(
        { chatId, error: error instanceof Error ? error.message : String(error) },
        `Failed to deliver ${label}`
      );
    }
  };

  for (const reply of replies) {
    switch (reply.kind) {
      case "text": {
        const chunks = splitText(reply.text, options.maxLength);
        for (const [index, chunk] of chunks.entries()) {
          await attempt(`message chunk ${index + 1}/${chunks.length}`, () => client.sendMessage(chatId, chunk));
        }
        break;
      }
      case "menu":
        await attempt("menu", () => client.sendMessage(chatId, reply.text, reply.keyboard));
        break;
      case "photo":
        await attempt("chat action", () => client.sendChatAction(chatId, "upload_photo"));
        await attempt("photo", () => client.sendPhoto(chatId, reply.image, reply.caption));
        break;
    }
  }

  return report;
};
