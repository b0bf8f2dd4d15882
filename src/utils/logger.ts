// src/utils/logger.ts

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

type ConsoleMethod = 'debug' | 'log' | 'warn' | 'error';

/**
 * Process-wide console logger. Debug output goes to `console.debug`,
 * info and success to stdout, warnings and errors to stderr.
 */
export class Logger {
  private static level: LogLevel = LogLevel.INFO;

  static setLevel(level: LogLevel): void {
    this.level = level;
  }

  static getLevel(): LogLevel {
    return this.level;
  }

  static debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.DEBUG, 'debug', '🔍', message, args);
  }

  static info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, 'log', 'ℹ️ ', message, args);
  }

  static warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.WARN, 'warn', '⚠️ ', message, args);
  }

  static error(message: string, ...args: unknown[]): void {
    this.write(LogLevel.ERROR, 'error', '❌', message, args);
  }

  static success(message: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, 'log', '✅', message, args);
  }

  private static write(
    level: LogLevel,
    method: ConsoleMethod,
    prefix: string,
    message: string,
    args: unknown[]
  ): void {
    if (level < this.level) {
      return;
    }
    console[method](`${prefix} ${message}`, ...args);
  }
}
