import fs from "fs";
import path from "path";

import { config } from "@config/index";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event(type: string, payload: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

const minLevel: LogLevel = isLogLevel(config.observability.logLevel)
  ? config.observability.logLevel
  : "info";

const logDir = path.join(process.cwd(), "logs");
const logFile = path.join(logDir, "app.log");

function ensureLogDir(): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

function writeEntry(entry: Record<string, unknown>): void {
  const line = JSON.stringify(entry) + "\n";

  console.log(line.trimEnd());

  if (!config.observability.logToFile) {
    return;
  }

  try {
    ensureLogDir();
    fs.appendFileSync(logFile, line, { encoding: "utf-8" });
  } catch (err) {
    console.error("❌ Failed to write log file:", err);
  }
}

/**
 * Infrastructure logger implementing the LoggerPort.
 *
 * - log() records a level and is filtered by LOG_LEVEL.
 * - event() records a named event with the shape { timestamp, type, ...payload }
 *   and is always written (events are the audit trail of a request).
 */
export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }

    writeEntry({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(meta || {}),
    });
  },

  event(type: string, payload: Record<string, unknown>): void {
    writeEntry({
      timestamp: new Date().toISOString(),
      type,
      ...payload,
    });
  },
};

export function logEvent(type: string, payload: Record<string, unknown>): void {
  logger.event(type, payload);
}
