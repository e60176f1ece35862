/**
 * Structured logger with optional file output and rotation
 *
 * Features:
 * - Writes to stdout/stderr, filtered by a minimum level (LOG_LEVEL)
 * - Optional daily log files in LOG_DIR (keeps last 7 days)
 * - Timestamps all entries
 * - JSON-encoded data payloads
 */

import * as fs from "fs";
import * as path from "path";

const MAX_LOG_DAYS = 7;

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for daily log files; file output is off when unset */
  dir?: string;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();

let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";
let logsDir: string | undefined;

function getLogFileName(dir: string): string {
  const date = new Date().toISOString().split("T")[0]; // YYYY-MM-DD
  return path.join(dir, `app-${date}.log`);
}

function cleanOldLogs(dir: string): void {
  try {
    const files = fs.readdirSync(dir);
    const now = Date.now();
    const maxAge = MAX_LOG_DAYS * 24 * 60 * 60 * 1000;

    for (const file of files) {
      if (!file.startsWith("app-") || !file.endsWith(".log")) continue;

      const filePath = path.join(dir, file);
      const stats = fs.statSync(filePath);

      if (now - stats.mtimeMs > maxAge) {
        fs.unlinkSync(filePath);
      }
    }
  } catch (error) {
    console.error(`[Logger] Old log cleanup failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Apply runtime settings. Called once at startup after configuration loads.
 */
export function configureLogger(options: LoggerOptions): void {
  if (options.level) {
    minLevel = options.level;
  }

  if (options.dir) {
    const dir = path.resolve(options.dir);
    fs.mkdirSync(dir, { recursive: true });
    cleanOldLogs(dir);
    logsDir = dir;
  } else {
    logsDir = undefined;
  }
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message });
  }
  return JSON.stringify(data);
}

function formatMessage(entry: LogEntry): string {
  const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
  if (entry.data !== undefined) {
    return `${prefix} ${entry.message} ${formatData(entry.data)}`;
  }
  return `${prefix} ${entry.message}`;
}

function writeLog(level: LogLevel, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    data,
  };

  const formatted = formatMessage(entry);

  if (level === "error") {
    console.error(formatted);
  } else if (level === "warn") {
    console.warn(formatted);
  } else {
    console.log(formatted);
  }

  if (logsDir) {
    try {
      fs.appendFileSync(getLogFileName(logsDir), formatted + "\n");
    } catch (error) {
      console.error(`[Logger] File write failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

export const logger = {
  debug: (message: string, data?: unknown) => writeLog("debug", message, data),
  info: (message: string, data?: unknown) => writeLog("info", message, data),
  warn: (message: string, data?: unknown) => writeLog("warn", message, data),
  error: (message: string, data?: unknown) => writeLog("error", message, data),

  // Convenience: log with emoji prefix
  success: (tag: string, message: string, data?: unknown) =>
    writeLog("info", `✅ [${tag}] ${message}`, data),
  fail: (tag: string, message: string, data?: unknown) =>
    writeLog("error", `❌ [${tag}] ${message}`, data),
  pending: (tag: string, message: string, data?: unknown) =>
    writeLog("info", `🔄 [${tag}] ${message}`, data),
  action: (tag: string, message: string, data?: unknown) =>
    writeLog("info", `🎯 [${tag}] ${message}`, data),
};

/**
 * Shorten user text for log lines
 */
export function truncateForLog(text: string, max = 80): string {
  return text.length > max ? `${text.substring(0, max)}...` : text;
}

export default logger;
