import pino, { type Logger, type LevelWithSilent } from "pino";

/** Keys (and nested paths) redacted from log output. */
const REDACT_PATHS = [
  "password",
  "secretAccessKey",
  "accessKeyId",
  "credentials",
  "*.password",
  "*.secretAccessKey",
  "req.headers.authorization",
  "req.headers.cookie",
];

export interface LoggerOptions {
  level?: LevelWithSilent;
  env?: string;
  service?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? "info",
    base: {
      service: options.service ?? "video-api",
      env: options.env ?? "development",
    },
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

let defaultLogger: Logger | undefined;

export function getLogger(): Logger {
  if (!defaultLogger) defaultLogger = createLogger();
  return defaultLogger;
}

export type { Logger };
