import express from "express";
import { handleUpdate, type DispatchDeps } from "../bot/dispatch.js";
import { parseUpdate } from "../bot/updates.js";

export const WEBHOOK_PATH = "/telegram/webhook";

export type AppDeps = {
  bot: DispatchDeps;
  webhookSecret: string | null;
};

const secretMiddleware = (expected: string | null): express.RequestHandler => {
  return (req, res, next) => {
    if (!expected) {
      return next();
    }
    const provided = req.header("x-telegram-bot-api-secret-token");
    if (!provided || provided !== expected) {
      return res.status(401).json({ error: "Unauthorized" });
    }
    return next();
  };
};

export const createApp = (deps: AppDeps) => {
  const app = express();
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.status(200).send("OK");
  });

  app.post(WEBHOOK_PATH, secretMiddleware(deps.webhookSecret), async (req, res) => {
    const update = parseUpdate(req.body);
    if (!update) {
      return res.status(400).json({ error: "Malformed update" });
    }

    try {
      const outcome = await handleUpdate(update, deps.bot);
      return res.json({ ok: true, status: outcome.status });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Webhook error";
      return res.status(500).json({ error: message });
    }
  });

  return app;
};
