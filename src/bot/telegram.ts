import { z } from "zod";

const ApiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional()
});

export type InlineButton = { text: string; callback_data: string };
export type InlineKeyboard = InlineButton[][];
export type ChatAction = "typing" | "upload_photo";

export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    message: string,
    readonly errorCode?: number
  ) {
    super(`Telegram ${method} failed: ${message}`);
    this.name = "TelegramApiError";
  }
}

export type TelegramClientOptions = {
  timeoutMs: number;
  apiBaseUrl?: string;
};

/** Thin Bot API wrapper; every call throws TelegramApiError on failure. */
export class TelegramClient {
  private readonly baseUrl: string;

  constructor(
    token: string,
    private readonly options: TelegramClientOptions
  ) {
    this.baseUrl = `${options.apiBaseUrl ?? "https://api.telegram.org"}/bot${token}`;
  }

  sendMessage(chatId: number, text: string, keyboard?: InlineKeyboard) {
    return this.call("sendMessage", {
      chat_id: chatId,
      text,
      ...(keyboard ? { reply_markup: { inline_keyboard: keyboard } } : {})
    });
  }

  sendPhoto(chatId: number, photo: Buffer, caption: string) {
    const form = new FormData();
    form.set("chat_id", String(chatId));
    form.set("caption", caption);
    form.set("photo", new Blob([new Uint8Array(photo)], { type: "image/png" }), "chart.png");
    return this.call("sendPhoto", form);
  }

  sendChatAction(chatId: number, action: ChatAction) {
    return this.call("sendChatAction", { chat_id: chatId, action });
  }

  answerCallbackQuery(callbackQueryId: string) {
    return this.call("answerCallbackQuery", { callback_query_id: callbackQueryId });
  }

  async getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<unknown[]> {
    const result = await this.call(
      "getUpdates",
      { offset, timeout: timeoutSeconds, allowed_updates: ["message", "callback_query"] },
      { timeoutMs: (timeoutSeconds + 5) * 1000, signal }
    );
    return Array.isArray(result) ? result : [];
  }

  setWebhook(url: string, secretToken?: string | null) {
    return this.call("setWebhook", {
      url,
      allowed_updates: ["message", "callback_query"],
      ...(secretToken ? { secret_token: secretToken } : {})
    });
  }

  private async call(
    method: string,
    body: Record<string, unknown> | FormData,
    overrides: { timeoutMs?: number; signal?: AbortSignal } = {}
  ): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), overrides.timeoutMs ?? this.options.timeoutMs);
    const abort = () => controller.abort();
    overrides.signal?.addEventListener("abort", abort, { once: true });
    const signal = controller.signal;
    const init: RequestInit =
      body instanceof FormData
        ? { method: "POST", body, signal }
        : { method: "POST", body: JSON.stringify(body), headers: { "Content-Type": "application/json" }, signal };

    try {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}/${method}`, init);
      } catch (error) {
        throw new TelegramApiError(method, error instanceof Error ? error.message : String(error));
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch {
        throw new TelegramApiError(method, `non-JSON response (${response.status})`, response.status);
      }

      const parsed = ApiResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new TelegramApiError(method, `unexpected response (${response.status})`, response.status);
      }
      if (!parsed.data.ok) {
        throw new TelegramApiError(
          method,
          parsed.data.description ?? `error ${response.status}`,
          parsed.data.error_code ?? response.status
        );
      }
      return parsed.data.result;
    } finally {
      clearTimeout(timer);
      overrides.signal?.removeEventListener("abort", abort);
    }
  }
}
