/**
 * Console log level filter (singleton).
 */

export type UiLogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<UiLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class LogManager {
  private static instance: LogManager | null = null;

  private level: UiLogLevel = 'info';

  private constructor() {}

  static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  static resetInstance(): void {
    LogManager.instance = null;
  }

  setLogLevel(level: UiLogLevel): void {
    this.level = level;
  }

  getLogLevel(): UiLogLevel {
    return this.level;
  }

  shouldLog(level: UiLogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}
