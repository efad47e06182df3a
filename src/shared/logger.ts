/**
 * Winston-based logging: JSON lines in production, colorized one-liners
 * for local development.
 *
 * Supports both:
 * - logger.info('message')
 * - logger.info({ key: value }, 'message')
 */

import winston from "winston";

type LogFn = (metaOrMessage: string | Record<string, unknown>, message?: string) => void;

export type Logger = {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
};

export type LoggerOptions = {
  level?: string;
  json?: boolean;
};

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const devFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: "HH:mm:ss" }),
  winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const metaStr =
      Object.keys(meta).length && Object.keys(meta).some((k) => k !== "service") ? " " + JSON.stringify(meta) : "";
    return `${timestamp} ${level}: ${message}${metaStr}`;
  })
);

const wrap = (target: winston.Logger, level: string): LogFn => {
  return (metaOrMessage, message) => {
    if (typeof metaOrMessage === "string") {
      target.log(level, metaOrMessage);
    } else if (message) {
      target.log(level, message, metaOrMessage);
    } else {
      target.log(level, JSON.stringify(metaOrMessage));
    }
  };
};

export const createLogger = (options: LoggerOptions = {}): Logger => {
  const base = winston.createLogger({
    level: options.level ?? "info",
    format: options.json ? jsonFormat : devFormat,
    defaultMeta: { service: "propwatch" },
    transports: [new winston.transports.Console()]
  });

  return {
    info: wrap(base, "info"),
    warn: wrap(base, "warn"),
    error: wrap(base, "error"),
    debug: wrap(base, "debug")
  };
};
