/**
 * Structured logging for store, analytics and audit events
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  actor?: string;
  aggregation?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogSink = (level: LogLevel, line: string, entry: LogEntry) => void;

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
      if (process.env.SHELTER_DEBUG) {
        console.debug(line);
      }
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

class Logger {
  #enabled = true;
  #sink: LogSink = consoleSink;

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.actor || entry.aggregation) {
      parts.push(`${entry.actor ?? "-"}/${entry.aggregation ?? "-"}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    this.#sink(level, parts.join(" "), entry);
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

  /**
   * Route formatted lines somewhere other than the console.
   * Pass nothing to restore console output.
   */
  setSink(sink?: LogSink): void {
    this.#sink = sink ?? consoleSink;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
