/**
 * pino logging for the CLI. Log lines go to stderr so command output on
 * stdout stays clean.
 */

import pino from "pino";
import { isObject } from "@cadsync/core";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type Logger = pino.Logger;

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

const LEVEL_COLORS: Record<number, string> = {
  10: "\x1b[90m", // trace - gray
  20: "\x1b[36m", // debug - cyan
  30: "\x1b[32m", // info - green
  40: "\x1b[33m", // warn - yellow
  50: "\x1b[31m", // error - red
  60: "\x1b[35m", // fatal - magenta
};

const LEVEL_NAMES: Record<number, string> = {
  10: "TRACE",
  20: "DEBUG",
  30: "INFO",
  40: "WARN",
  50: "ERROR",
  60: "FATAL",
};

const RESET = "\x1b[0m";

function formatTime(timestamp: number): string {
  const date = new Date(timestamp);
  const pad = (n: number) => n.toString().padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Render one pino JSON record as a single coloured line.
 */
export function formatLogLine(chunk: string): string {
  let record: unknown;
  try {
    record = JSON.parse(chunk);
  } catch {
    return chunk;
  }
  if (!isObject(record)) {
    return chunk;
  }
  const level = typeof record.level === "number" ? record.level : 30;
  const time = typeof record.time === "number" ? formatTime(record.time) : "";
  const moduleName = typeof record.module === "string" ? record.module : "cadsync";
  const msg = typeof record.msg === "string" ? record.msg : "";
  const color = LEVEL_COLORS[level] ?? "";
  return `${color}[${time}] ${LEVEL_NAMES[level] ?? "LOG"}${RESET} ${moduleName} - ${msg}\n`;
}

function prettyDestination(): pino.DestinationStream {
  return {
    write(chunk: string): void {
      process.stderr.write(formatLogLine(chunk));
    },
  };
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const lowered = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === lowered) ?? "info";
}

let rootLogger: pino.Logger | undefined;
let levelOverride: LogLevel | undefined;

function getRootLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = pino({ level: levelOverride ?? parseLogLevel(process.env.LOG_LEVEL) }, prettyDestination());
  }
  return rootLogger;
}

/**
 * Child logger tagged with a module name.
 */
export function getLog(module: string): Logger {
  return getRootLogger().child({ module });
}

/**
 * Override LOG_LEVEL, e.g. for `--verbose`. Children keep the level they
 * were created with, so call this before the first `getLog`.
 */
export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
  rootLogger = undefined;
}

export function logError(logger: Logger, err: unknown, message: string): void {
  if (typeof err === "object" && err !== null && "message" in err) {
    logger.error({ err }, message);
  } else {
    logger.error({ err: String(err) }, message);
  }
}

/**
 * Drop the root logger so the next `getLog` picks up a new LOG_LEVEL.
 */
export function resetLogger(): void {
  rootLogger = undefined;
  levelOverride = undefined;
}
