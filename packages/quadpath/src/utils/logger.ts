import chalk from 'chalk'

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export class Logger {
  // WARN unless the DEBUG env var is set
  private static level: LogLevel = process.env.DEBUG ? LogLevel.DEBUG : LogLevel.WARN

  static setLevel(level: LogLevel): void {
    this.level = level
  }

  static getLevel(): LogLevel {
    return this.level
  }

  static debug(message: string, data?: unknown): void {
    if (this.level <= LogLevel.DEBUG) {
      console.log(chalk.gray(`[DEBUG] ${message}`), data ?? '')
    }
  }

  static info(message: string, data?: unknown): void {
    if (this.level <= LogLevel.INFO) {
      console.log(chalk.blue(`[INFO] ${message}`), data ?? '')
    }
  }

  static warn(message: string, data?: unknown): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(chalk.yellow(`[WARN] ${message}`), data ?? '')
    }
  }

  static error(message: string, error?: unknown): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(chalk.red(`[ERROR] ${message}`), error ?? '')
    }
  }
}
