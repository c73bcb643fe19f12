/**
 * Logger for the Study Loop backend
 *
 * One-line console logging tagged with a UTC time, the level and the
 * module. Debug lines are only printed when DEBUG is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (message: string, detail?: unknown) => void;
  info: (message: string, detail?: unknown) => void;
  warn: (message: string, detail?: unknown) => void;
  error: (message: string, detail?: unknown) => void;
}

/**
 * Format a log line.
 *
 * @example formatLog("warn", "History", "Skipping record", date)
 * // "[09:30:00.000] [WARN ] [History] Skipping record"
 */
export function formatLog(level: LogLevel, module: string, message: string, at: Date = new Date()): string {
  const time = at.toISOString().slice(11, 23);
  return `[${time}] [${level.toUpperCase().padEnd(5)}] [${module}] ${message}`;
}

function write(level: LogLevel, line: string, detail: unknown): void {
  const args = detail === undefined ? [line] : [line, detail];
  switch (level) {
    case "debug":
    case "info":
      console.log(...args);
      break;
    case "warn":
      console.warn(...args);
      break;
    case "error":
      console.error(...args);
      break;
  }
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string): Logger {
  const at =
    (level: LogLevel) =>
    (message: string, detail?: unknown): void => {
      if (level === "debug" && !process.env.DEBUG) {
        return;
      }
      write(level, formatLog(level, module, message), detail);
    };

  return { debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") };
}

export const storeLog = createLogger("NoteStore");
export const historyLog = createLogger("History");
export const reviewLog = createLogger("Review");
export const serverLog = createLogger("Server");
