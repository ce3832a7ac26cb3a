import { createWriteStream, mkdirSync } from "node:fs";
import type { WriteStream } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";

const levelWeights = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
} as const;

export type LogLevel = keyof typeof levelWeights;

export interface Logger {
  error(message: unknown, ...args: unknown[]): void;
  warn(message: unknown, ...args: unknown[]): void;
  info(message: unknown, ...args: unknown[]): void;
  debug(message: unknown, ...args: unknown[]): void;
}

export interface LoggerOptions {
  level?: LogLevel;
}

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (raw === "error" || raw === "warn" || raw === "info" || raw === "debug") {
    return raw;
  }
  return undefined;
}

const defaultLevel: LogLevel =
  parseLogLevel(process.env.OCPP_LOG_LEVEL) ?? parseLogLevel(process.env.LOG_LEVEL) ?? "info";

function resolveLogFilePath(rawPath: string | undefined): string | undefined {
  const trimmed = rawPath?.trim();
  if (!trimmed) {
    return undefined;
  }

  const expanded =
    trimmed === "~"
      ? homedir()
      : trimmed.startsWith("~/")
        ? join(homedir(), trimmed.slice(2))
        : trimmed;
  return resolve(expanded);
}

const logFilePath = resolveLogFilePath(process.env.OCPP_LOG_FILE);
let logStream: WriteStream | undefined;

if (logFilePath) {
  try {
    mkdirSync(dirname(logFilePath), { recursive: true });
    logStream = createWriteStream(logFilePath, { flags: "a" });
    logStream.on("error", (error) => {
      console.warn(`[logger] Failed to write logs to ${logFilePath}:`, error);
      logStream?.close();
      logStream = undefined;
    });
  } catch (error) {
    console.warn(`[logger] Failed to initialize log file ${logFilePath}:`, error);
    logStream = undefined;
  }
}

function render(item: unknown): string {
  if (typeof item === "string") return item;
  if (item instanceof Error) return item.stack ?? `${item.name}: ${item.message}`;
  try {
    return JSON.stringify(item) ?? String(item);
  } catch {
    return String(item);
  }
}

export function formatLine(
  prefix: string,
  level: LogLevel,
  message: unknown,
  args: unknown[],
  now: Date = new Date(),
): string {
  const payload = [message, ...args].map(render).join(" ");
  return `[${now.toISOString()}] [${level.toUpperCase()}] [${prefix}] ${payload}`;
}

// stdout is reserved for the MCP stdio transport, so every level goes to stderr.
function emit(threshold: LogLevel, level: LogLevel, prefix: string, message: unknown, args: unknown[]) {
  if (levelWeights[level] > levelWeights[threshold]) {
    return;
  }
  const line = formatLine(prefix, level, message, args);
  console.error(line);
  if (logStream) {
    logStream.write(`${line}\n`);
  }
}

export function createLogger(prefix: string, options: LoggerOptions = {}): Logger {
  const threshold = options.level ?? defaultLevel;
  return {
    error(message: unknown, ...args: unknown[]) {
      emit(threshold, "error", prefix, message, args);
    },
    warn(message: unknown, ...args: unknown[]) {
      emit(threshold, "warn", prefix, message, args);
    },
    info(message: unknown, ...args: unknown[]) {
      emit(threshold, "info", prefix, message, args);
    },
    debug(message: unknown, ...args: unknown[]) {
      emit(threshold, "debug", prefix, message, args);
    },
  };
}
