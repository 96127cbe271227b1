/**
 * Structured logging for graveyard operations
 * All lines go to stderr; stdout belongs to command output
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  path?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Emit debug lines (default: GRAVEYARD_DEBUG is set) */
  verbose?: boolean;
  /** Line sink (default: console.error) */
  write?: (line: string) => void;
}

export class Logger {
  #enabled = true;
  #verbose: boolean;
  #write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.#verbose = options.verbose ?? Boolean(process.env.GRAVEYARD_DEBUG);
    this.#write = options.write ?? ((line) => console.error(line));
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (level === "debug" && !this.#verbose) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.path) {
      parts.push(entry.path);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    this.#write(parts.join(" "));
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

  get verbose(): boolean {
    return this.#verbose;
  }
}
