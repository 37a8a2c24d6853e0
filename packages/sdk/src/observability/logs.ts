/**
 * Structured logging for collection and constraint operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  collection?: string;
  field?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some((level) => level === value);
}

/**
 * Resolve the minimum level from the environment
 * PATCHDB_DEBUG=1 forces debug; otherwise PATCHDB_LOG_LEVEL, falling back to "warn"
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.PATCHDB_DEBUG === "1") {
    return "debug";
  }
  const configured = env.PATCHDB_LOG_LEVEL?.toLowerCase();
  return isLogLevel(configured) ? configured : "warn";
}

export class Logger {
  #enabled = true;
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = resolveLogLevel()) {
    this.#minLevel = minLevel;
  }

  /**
   * Format an entry for console output
   */
  static format(entry: LogEntry): string {
    const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

    if (entry.collection || entry.field) {
      parts.push(`${entry.collection ?? ""}/${entry.field ?? ""}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    return parts.join(" ");
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled || LEVELS.indexOf(level) < LEVELS.indexOf(this.#minLevel)) return;

    const line = Logger.format({
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    });

    // Route to appropriate console method
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
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

  get level(): LogLevel {
    return this.#minLevel;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  /**
   * Copy of this logger with another minimum level; this logger is left as is
   */
  withLevel(level: LogLevel): Logger {
    const copy = new Logger(level);
    copy.setEnabled(this.#enabled);
    return copy;
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
