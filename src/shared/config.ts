import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

const isProdEnv = process.env.PROPWATCH_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists,
  isProdEnv
};

export const REQUEST_TIMEOUT_MS = 10_000;
export const MESSAGE_MAX_LENGTH = 4000;

// Blank values in .env files mean "unset".
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const optionalUrl = optionalString.pipe(z.string().url().optional());

const EnvSchema = z.object({
  TELEGRAM_TOKEN: z.string({ required_error: "TELEGRAM_TOKEN is required" }).trim().min(1, "TELEGRAM_TOKEN is required"),
  DATA_URL: z.string({ required_error: "DATA_URL is required" }).trim().url(),
  PROPERTIES_URL: optionalUrl,
  COMPLAINTS_URL: optionalUrl,
  DATA_API_KEY: optionalString,
  DATA_API_KEY_HEADER: optionalString,
  // Kept verbatim: an empty prefix sends the raw key.
  DATA_API_KEY_PREFIX: z.string().optional(),
  TELEGRAM_WEBHOOK_URL: optionalUrl,
  TELEGRAM_WEBHOOK_SECRET: optionalString,
  PORT: optionalString.pipe(z.coerce.number().int().positive().optional()),
  LOG_LEVEL: optionalString
});

export type AppConfig = {
  telegramToken: string;
  dataUrl: string;
  propertiesUrl: string;
  complaintsUrl: string | null;
  apiKey: string | null;
  apiKeyHeader: string;
  apiKeyPrefix: string;
  webhookUrl: string | null;
  webhookSecret: string | null;
  port: number;
  logLevel: string;
  requestTimeoutMs: number;
  messageMaxLength: number;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Builds the application config from an environment map. Throws ConfigError
 * when a required variable is missing or a URL does not parse.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const key = issue.path.join(".");
      return issue.message.includes(key) ? issue.message : `${key}: ${issue.message}`;
    });
    throw new ConfigError(issues);
  }
  const vars = parsed.data;

  return {
    telegramToken: vars.TELEGRAM_TOKEN,
    dataUrl: vars.DATA_URL,
    propertiesUrl: vars.PROPERTIES_URL ?? vars.DATA_URL,
    complaintsUrl: vars.COMPLAINTS_URL ?? null,
    apiKey: vars.DATA_API_KEY ?? null,
    apiKeyHeader: vars.DATA_API_KEY_HEADER ?? "Authorization",
    apiKeyPrefix: vars.DATA_API_KEY_PREFIX ?? "Bearer",
    webhookUrl: vars.TELEGRAM_WEBHOOK_URL ?? null,
    webhookSecret: vars.TELEGRAM_WEBHOOK_SECRET ?? null,
    port: vars.PORT ?? 3000,
    logLevel: vars.LOG_LEVEL ?? "info",
    requestTimeoutMs: REQUEST_TIMEOUT_MS,
    messageMaxLength: MESSAGE_MAX_LENGTH
  };
};
