import * as winston from "winston";

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.printf(
    ({ timestamp, level, message, namespace, ...meta }) => {
      const prefix = typeof namespace === "string" ? `[${namespace}] ` : "";
      const metaStr = Object.keys(meta).length
        ? ` ${JSON.stringify(meta)}`
        : "";
      return `[${timestamp}] ${level}: ${prefix}${message}${metaStr}`;
    },
  ),
);

export const LOG_LEVELS = [
  "error",
  "warn",
  "info",
  "http",
  "verbose",
  "debug",
  "silly",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const rootLogger = winston.createLogger({
  level: "info",
  format: consoleFormat,
  transports: [new winston.transports.Console()],
  silent: process.env.NODE_ENV === "test",
});

export type Logger = winston.Logger;

export function createLogger(namespace: string): Logger {
  return rootLogger.child({ namespace });
}

// Child loggers read the level from the root logger.
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}
