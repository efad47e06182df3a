import type { Logger } from "../shared/logger.js";
import type { BotCommands, ResolvedCommand } from "./commands.js";
import { deliverReplies, type DeliveryClient, type DeliveryReport } from "./deliver.js";
import type { TelegramClient } from "./telegram.js";
import { parseCommand, type Update } from "./updates.js";

export type BotClient = DeliveryClient & Pick<TelegramClient, "answerCallbackQuery">;

export type DispatchDeps = {
  client: BotClient;
  commands: BotCommands;
  logger: Logger;
  maxLength: number;
};

export type DispatchOutcome =
  | { status: "handled"; chatId: number; delivery: DeliveryReport }
  | { status: "ignored" }
  | { status: "failed"; error: string };

type Target = { chatId: number; command: ResolvedCommand; label: string };

const resolveTarget = async (update: Update, deps: DispatchDeps): Promise<Target | null> => {
  const query = update.callback_query;
  if (query) {
    await deps.client.answerCallbackQuery(query.id);
    const chatId = query.message?.chat.id;
    const command = query.data ? deps.commands.resolveAction(query.data) : null;
    if (chatId === undefined || !command) return null;
    return { chatId, command, label: query.data ?? "" };
  }

  const message = update.message;
  if (!message?.text) return null;
  const parsed = parseCommand(message.text);
  if (!parsed) return null;
  const command = deps.commands.resolveCommand(parsed.name, parsed.args);
  if (!command) return null;
  return { chatId: message.chat.id, command, label: `/${parsed.name}` };
};

/** Runs one update end to end. Errors are logged here and reported in the outcome. */
export const handleUpdate = async (update: Update, deps: DispatchDeps): Promise<DispatchOutcome> => {
  try {
    const target = await resolveTarget(update, deps);
    if (!target) {
      deps.logger.debug({ updateId: update.update_id }, "Ignoring update");
      return { status: "ignored" };
    }

    deps.logger.info({ updateId: update.update_id, chatId: target.chatId }, `Handling ${target.label}`);
    if (target.command.fetches) {
      await deps.client.sendChatAction(target.chatId, "typing");
    }
    const replies = await target.command.run();
    const delivery = await deliverReplies(deps.client, target.chatId, replies, {
      maxLength: deps.maxLength,
      logger: deps.logger
    });
    return { status: "handled", chatId: target.chatId, delivery };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    deps.logger.error({ updateId: update.update_id }, `Update caused error: ${message}`);
    return { status: "failed", error: message };
  }
};
