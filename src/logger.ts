import pino from "pino";
import type { Logger } from "pino";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

function todayStamp(d = new Date()): string {
  return `${d.getFullYear()}${pad2(d.getMonth() + 1)}${pad2(d.getDate())}`;
}

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

/** Unknown or empty values fall back to "info". */
export function logLevelOf(raw: string | undefined): LogLevel {
  const value = (raw ?? "").trim();
  return isLogLevel(value) ? value : "info";
}

function createLogger(): Logger {
  const raw = process.env.LOG_LEVEL;
  const level = logLevelOf(raw);
  const options = {
    level,
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label })
    }
  };

  const logFile = (process.env.LOG_FILE ?? "").trim();
  const dest = logFile.replace(/\{date\}/g, todayStamp());
  const log = logFile
    ? pino(
        options,
        pino.multistream([
          { stream: process.stdout },
          { stream: pino.destination({ dest, mkdir: true, sync: true }) }
        ])
      )
    : pino(options);

  if (raw?.trim() && raw.trim() !== level) log.warn({ LOG_LEVEL: raw }, "Unknown LOG_LEVEL, using info");
  return log;
}

export const logger = createLogger();

export const documentsLogger = logger.child({ module: "documents" });
export const mailLogger = logger.child({ module: "mail" });
export const schedulerLogger = logger.child({ module: "scheduler" });
export const reportLogger = logger.child({ module: "report" });

export type { Logger };
