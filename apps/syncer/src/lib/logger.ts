import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  error: 3,
};

let threshold: LogLevel = "info";
let logFilePath: string | null = null;

export function configureLogger(options: { level?: LogLevel; filePath?: string | null }): void {
  if (options.level) {
    threshold = options.level;
  }
  if (options.filePath !== undefined) {
    logFilePath = options.filePath ? path.resolve(process.cwd(), options.filePath) : null;
  }
}

function formatLine(level: LogLevel, message: string): string {
  return `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}\n`;
}

function write(level: LogLevel, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }

  const line = formatLine(level, message);
  if (level === "error") {
    console.error(line.trimEnd());
  } else {
    console.log(line.trimEnd());
  }

  if (!logFilePath) return;
  try {
    mkdirSync(path.dirname(logFilePath), { recursive: true });
    appendFileSync(logFilePath, line);
  } catch {
    // The console line has already been written.
  }
}

export function logTrace(message: string): void {
  write("trace", message);
}

export function logDebug(message: string): void {
  write("debug", message);
}

export function logInfo(message: string): void {
  write("info", message);
}

export function logError(message: string): void {
  write("error", message);
}

export function getLogFilePath(): string | null {
  return logFilePath;
}
