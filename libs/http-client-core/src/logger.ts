import type { Logger, LoggerMeta } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Console logger for scripts and local runs.
 * Entries below `minLevel` are dropped.
 */
class ConsoleLogger implements Logger {
  constructor(private readonly minLevel: LogLevel) {}

  debug(message: string, meta?: LoggerMeta): void {
    if (this.enabled('debug')) console.debug(message, meta ?? '');
  }

  info(message: string, meta?: LoggerMeta): void {
    if (this.enabled('info')) console.info(message, meta ?? '');
  }

  warn(message: string, meta?: LoggerMeta): void {
    if (this.enabled('warn')) console.warn(message, meta ?? '');
  }

  error(message: string, meta?: LoggerMeta): void {
    if (this.enabled('error')) console.error(message, meta ?? '');
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }
}

export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  return new ConsoleLogger(minLevel);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return normalized;
    default:
      return undefined;
  }
}
