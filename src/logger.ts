import chalk from "chalk";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 99
}

export interface LoggerConfig {
  level: LogLevel;
  enableColor: boolean;
  enableTimestamp: boolean;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "SILENT":
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Leveled console logger with a context tag, e.g.
 * `[2024-05-01T10:00:00.000Z] [WellnessRouter] [INFO] Processing query`.
 */
export class Logger {
  private readonly config: LoggerConfig;

  constructor(
    private readonly context: string,
    config?: Partial<LoggerConfig>
  ) {
    this.config = {
      level: parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO,
      enableColor: process.stdout.isTTY ?? false,
      enableTimestamp: true,
      ...config
    };
  }

  format(levelName: string, message: string, data?: unknown): string {
    const parts: string[] = [];
    if (this.config.enableTimestamp) {
      const timestamp = `[${new Date().toISOString()}]`;
      parts.push(this.config.enableColor ? chalk.gray(timestamp) : timestamp);
    }
    parts.push(`[${this.context}]`, `[${levelName}]`, message);
    if (data !== undefined) {
      parts.push(typeof data === "object" ? JSON.stringify(data) : String(data));
    }
    return parts.join(" ");
  }

  debug(message: string, data?: unknown): void {
    if (this.config.level <= LogLevel.DEBUG) {
      const line = this.format("DEBUG", message, data);
      console.log(this.config.enableColor ? chalk.blue(line) : line);
    }
  }

  info(message: string, data?: unknown): void {
    if (this.config.level <= LogLevel.INFO) {
      const line = this.format("INFO", message, data);
      console.log(this.config.enableColor ? chalk.green(line) : line);
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.config.level <= LogLevel.WARN) {
      const line = this.format("WARN", message, data);
      console.warn(this.config.enableColor ? chalk.yellow(line) : line);
    }
  }

  error(message: string, data?: unknown): void {
    if (this.config.level <= LogLevel.ERROR) {
      const line = this.format("ERROR", message, data);
      console.error(this.config.enableColor ? chalk.red(line) : line);
    }
  }

  child(context: string): Logger {
    return new Logger(context, this.config);
  }

  get level(): LogLevel {
    return this.config.level;
  }
}

/** Truncates user text for log lines. */
export function preview(text: string, length = 50): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}
