import { afterEach, describe, expect, it, vi } from "vitest";
import { jsonResponse, stubFetch } from "../test/http.js";
import { TelegramApiError, TelegramClient } from "./telegram.js";

const API = "https://api.telegram.org/bottest-token";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("TelegramClient", () => {
  it("posts JSON and returns the result", async () => {
    const { calls } = stubFetch({ [`${API}/sendMessage`]: () => jsonResponse({ ok: true, result: { message_id: 1 } }) });
    const client = new TelegramClient("test-token", { timeoutMs: 1000 });

    await expect(client.sendMessage(5, "hi")).resolves.toEqual({ message_id: 1 });
    expect(calls[0].init?.method).toBe("POST");
    expect(JSON.parse(String(calls[0].init?.body))).toEqual({ chat_id: 5, text: "hi" });
  });

  it("attaches the inline keyboard", async () => {
    const { calls } = stubFetch({ [`${API}/sendMessage`]: () => jsonResponse({ ok: true, result: true }) });
    const keyboard = [[{ text: "Top 5", callback_data: "action_top5" }]];
    await new TelegramClient("test-token", { timeoutMs: 1000 }).sendMessage(5, "menu", keyboard);
    expect(JSON.parse(String(calls[0].init?.body)).reply_markup).toEqual({ inline_keyboard: keyboard });
  });

  it("uploads photos as multipart form data", async () => {
    const { calls } = stubFetch({ [`${API}/sendPhoto`]: () => jsonResponse({ ok: true, result: {} }) });
    await new TelegramClient("test-token", { timeoutMs: 1000 }).sendPhoto(5, Buffer.from("png"), "Chart");
    const body = calls[0].init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get("caption")).toBe("Chart");
      expect(body.get("chat_id")).toBe("5");
    }
  });

  it("throws TelegramApiError when the API refuses", async () => {
    stubFetch({
      [`${API}/sendMessage`]: () =>
        jsonResponse({ ok: false, error_code: 400, description: "Bad Request: chat not found" }, 400)
    });
    const client = new TelegramClient("test-token", { timeoutMs: 1000 });
    await expect(client.sendMessage(5, "hi")).rejects.toThrow("Telegram sendMessage failed: Bad Request: chat not found");
    await expect(client.sendMessage(5, "hi")).rejects.toBeInstanceOf(TelegramApiError);
  });

  it("returns an empty batch when getUpdates has no list", async () => {
    stubFetch({ [`${API}/getUpdates`]: () => jsonResponse({ ok: true, result: null }) });
    await expect(new TelegramClient("test-token", { timeoutMs: 1000 }).getUpdates(0, 0)).resolves.toEqual([]);
  });
});
