import fs from "fs";
import path from "path";

import { config } from "@config/index";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event(type: string, payload: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const minRank = LEVEL_RANK[config.observability.logLevel];
const logFile = config.observability.logFile;

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= minRank;
}

function ensureLogDir(file: string): void {
  const dir = path.dirname(file);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
  const line = JSON.stringify(entry);

  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }

  if (!logFile) {
    return;
  }

  try {
    ensureLogDir(logFile);
    fs.appendFileSync(logFile, line + "\n", { encoding: "utf-8" });
  } catch (err) {
    console.error("Failed to write log file:", err);
  }
}

/**
 * Structured JSON logger.
 *
 * - ISO timestamps.
 * - Entries below LOG_LEVEL are dropped; `silent` drops everything.
 * - Every entry goes to the console and, when LOG_FILE is non-empty, is
 *   appended to that file.
 */
export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!isLevelEnabled(level)) {
      return;
    }

    writeEntry(level, {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(meta || {}),
    });
  },

  event(type: string, payload: Record<string, unknown>): void {
    if (!isLevelEnabled("info")) {
      return;
    }

    writeEntry("info", {
      timestamp: new Date().toISOString(),
      type,
      ...payload,
    });
  },
};

/**
 * Event-style entry: `{ timestamp, type, ...payload }`, logged at info.
 */
export function logEvent(type: string, payload: Record<string, unknown>): void {
  logger.event(type, payload);
}
