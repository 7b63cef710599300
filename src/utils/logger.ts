/**
 * Structured logging utility
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

export type LogMeta = Record<string, unknown>;

export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: "info" }) {
    this.level = config.level;
    this.prefix = config.prefix || "regsynth";
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  // All levels go to stderr; stdout carries generated strings
  private write(label: string, message: string, meta?: LogMeta): void {
    process.stderr.write(
      `[${this.prefix}] ${label}: ${message} ${meta ? JSON.stringify(meta) : ""}\n`,
    );
  }

  error(message: string, meta?: LogMeta): void {
    if (this.shouldLog("error")) {
      this.write("ERROR", message, meta);
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.shouldLog("warn")) {
      this.write("WARN", message, meta);
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.shouldLog("info")) {
      this.write("INFO", message, meta);
    }
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.shouldLog("debug")) {
      this.write("DEBUG", message, meta);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

// Default logger instance
export const logger = new Logger({
  level:
    process.env.LOG_LEVEL && isLogLevel(process.env.LOG_LEVEL)
      ? process.env.LOG_LEVEL
      : "info",
});
