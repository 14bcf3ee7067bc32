// src/logger.ts

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  // When false, entries are only kept in memory (used by tests).
  console?: boolean;
  maxEntries?: number;
}

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';

/**
 * Leveled logger. One instance is built by the entry point (or a test) and handed to
 * every component that reports progress or failures.
 */
export class Logger {
  private entries: LogEntry[] = [];
  private minLevel: LogLevel;
  private readonly writeToConsole: boolean;
  private readonly maxEntries: number;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.writeToConsole = options.console ?? true;
    this.maxEntries = options.maxEntries ?? 1000;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  formatEntry(entry: LogEntry): string {
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? ` [${entry.context}]` : '';
    let line = `${entry.timestamp.toISOString()} ${level}${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      line += ' ' + JSON.stringify(entry.data);
    }
    if (entry.error?.stack && this.minLevel === 'debug') {
      line += `\n  ${entry.error.stack}`;
    }
    return line;
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }
    if (!this.writeToConsole) return;

    const formatted = `${COLORS[entry.level]}${this.formatEntry(entry)}${RESET}`;
    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context });
  }

  error(message: string, error?: Error, context?: string): void {
    this.log({ timestamp: new Date(), level: 'error', message, error, context });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.entries.filter((entry) => entry.level === level) : [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
