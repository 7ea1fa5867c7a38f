/**
 * Structured logging for repository and blob store operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  table?: string;
  blob?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export class Logger {
  #enabled = true;
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = "info") {
    this.#minLevel = minLevel;
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled || !this.#shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    console[consoleMethod(level)](formatEntry(entry));
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }

  #shouldLog(level: LogLevel): boolean {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.#minLevel)) {
      return false;
    }
    // Debug output stays quiet unless explicitly requested
    return level !== "debug" || Boolean(process.env.BLOBREPO_DEBUG);
  }
}

/**
 * Render an entry as a single console line:
 * `[ts] [LEVEL] [event] table/blob message {details}`
 */
export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.table || entry.blob) {
    parts.push(`${entry.table ?? ""}/${entry.blob ?? ""}`);
  }

  if (entry.message) {
    parts.push(entry.message);
  }

  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

function consoleMethod(level: LogLevel): "debug" | "log" | "warn" | "error" {
  switch (level) {
    case "debug":
      return "debug";
    case "info":
      return "log";
    case "warn":
      return "warn";
    case "error":
      return "error";
  }
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.BLOBREPO_LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "info";
}

/**
 * Global logger instance
 */
export const logger = new Logger(initialLevel());
