/**
 * Structured logging for parse tracing
 *
 * The engine only emits debug events, printed when ARGSPEC_DEBUG is set.
 */

export type LogLevel = "debug" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  command?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export class Logger {
  #enabled = true;

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.ARGSPEC_DEBUG) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    console.error(this.format(entry));
  }

  /**
   * Single-line console form of an entry
   */
  format(entry: LogEntry): string {
    const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

    if (entry.command) {
      parts.push(entry.command);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    return parts.join(" ");
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
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
}

/**
 * Global logger instance
 */
export const logger = new Logger();
