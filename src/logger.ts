import { normalizeLogLevel, type LogLevel } from './utils.js';

const LEVEL_ORDER: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class Logger {
  private readonly prefix: string;
  private level: LogLevel | null = null;

  constructor(prefix: string) {
    this.prefix = prefix;
  }

  // Resolved on first use: module-level loggers exist before .env.local is loaded
  private resolveLevel(): LogLevel {
    if (!this.level) {
      this.level = normalizeLogLevel(process.env.UMBRELLA_LOG_LEVEL);
    }
    return this.level;
  }

  private formatMessage(...args: unknown[]): unknown[] {
    if (process.env.UMBRELLA_LOG_TIMESTAMPS !== 'false') {
      const timestamp = new Date().toISOString().substring(11, 23); // HH:MM:SS.mmm
      return [`[${timestamp}] [${this.prefix}]`, ...args];
    }
    return [`[${this.prefix}]`, ...args];
  }

  private shouldLog(messageLevel: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(messageLevel) >= LEVEL_ORDER.indexOf(this.resolveLevel());
  }

  debug(...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.log(...this.formatMessage(...args));
    }
  }

  info(...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(...this.formatMessage(...args));
    }
  }

  warn(...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(...this.formatMessage(...args));
    }
  }

  error(...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(...this.formatMessage(...args));
    }
  }
}
