/**
 * Leveled, tagged logging for the agent.
 *
 * Components take a child logger (`didwire:agent`, `didwire:router`, ...) so
 * drops and failures can be traced to where they happened.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

/** Level for a config string such as "warn", or null if unknown. */
export function parseLogLevel(name: string): LogLevel | null {
  return LEVEL_NAMES[name.trim().toLowerCase()] ?? null;
}

type ConsoleMethod = "debug" | "info" | "warn" | "error";

export class Logger {
  private level: LogLevel = LogLevel.INFO;
  private readonly tag: string;
  private useJson: boolean = false;

  constructor(tag: string = "didwire", level: LogLevel = LogLevel.INFO) {
    this.tag = tag;
    this.level = level;
  }

  public setLogLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLogLevel(): LogLevel {
    return this.level;
  }

  public setJson(enabled: boolean): void {
    this.useJson = enabled;
  }

  private log(method: ConsoleMethod, levelName: string, message: string, args: unknown[]): void {
    if (this.useJson) {
      const entry = {
        timestamp: new Date().toISOString(),
        tag: this.tag,
        level: levelName,
        message,
        data: args.length > 0 ? args.map(toLoggable) : undefined,
      };
      console[method](JSON.stringify(entry));
    } else {
      console[method](`[${this.tag}] ${levelName} ${message}`, ...args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      this.log("debug", "DEBUG", message, args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      this.log("info", "INFO", message, args);
    }
  }

  public warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      this.log("warn", "WARN", message, args);
    }
  }

  public error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      this.log("error", "ERROR", message, args);
    }
  }

  /**
   * Creates a child logger with an extended tag.
   */
  public child(subTag: string): Logger {
    const child = new Logger(`${this.tag}:${subTag}`, this.level);
    child.setJson(this.useJson);
    return child;
  }
}

function toLoggable(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

// Global default logger
export const logger = new Logger("didwire");
