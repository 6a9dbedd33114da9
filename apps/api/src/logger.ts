export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

const emit = (level: Exclude<LogLevel, "silent">, message: string, context?: LogContext): void => {
  if (RANK[level] < RANK[threshold]) return;

  const line = `${new Date().toISOString()} ${level.toUpperCase()} ${message}`;
  const write = level === "error" ? console.error : level === "warn" ? console.warn : console.log;

  if (context && Object.keys(context).length > 0) {
    write(line, context);
    return;
  }
  write(line);
};

export const logDebug: LoggerFn = (message, context) => emit("debug", message, context);
export const logInfo: LoggerFn = (message, context) => emit("info", message, context);
export const logWarning: LoggerFn = (message, context) => emit("warn", message, context);
export const logError: LoggerFn = (message, context) => emit("error", message, context);
