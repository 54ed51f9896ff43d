import pino from "pino";
import { build as pinoPretty } from "pino-pretty";
import type { LogLevel } from "../config/config.js";

export type Logger = pino.Logger;

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function getModuleName(module: string | ImportMeta): string {
  const moduleUrl = typeof module === "string" ? module : module.url;
  const lastSlashIndex = moduleUrl.lastIndexOf("/");
  const fileNameWithExtension = lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
  const parts = fileNameWithExtension.split(".");
  return parts.length > 1 ? parts.slice(0, -1).join(".") : fileNameWithExtension;
}

// stdout belongs to the CLI's output, so logs go to stderr (fd 2)
function stderrDestination(): pino.DestinationStream {
  return pinoPretty({
    destination: 2,
    sync: true,
    colorize: false,
    translateTime: "yyyy-mm-dd HH:MM:ss",
    ignore: "pid,hostname",
    messageFormat: "{module} - {msg}",
    singleLine: true,
  });
}

// ── Logger creation ─────────────────────────────

let rootLogger: pino.Logger | undefined;
const moduleLoggers: Logger[] = [];

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  return LEVELS.find((level) => level === raw) ?? "info";
}

function getRootLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = pino({ level: levelFromEnv() }, stderrDestination());
  }
  return rootLogger;
}

/**
 * Get a logger for the calling module; the module name is derived from the
 * file name. Call `getLog(import.meta)` near the top of the file.
 */
export function getLog(module: string | ImportMeta): Logger {
  const logger = getRootLogger().child({ module: getModuleName(module) });
  moduleLoggers.push(logger);
  return logger;
}

/**
 * Change the level of the root logger and every module logger created from it.
 * Module loggers are created at import time, before `.env` files are read.
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
  for (const logger of moduleLoggers) {
    logger.level = level;
  }
}

export function logError(logger: Logger, err: unknown, message: string): void {
  if (err instanceof Error) {
    logger.error({ err: err.message, errorName: err.name }, message);
  } else {
    logger.error({ err: String(err) }, message);
  }
}
