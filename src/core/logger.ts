export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Console logger with a level threshold.
 */
export class Logger {
  constructor(private level: LogLevel = 'info') {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, ...meta: unknown[]): void {
    if (this.enabled('debug')) console.debug(this.format('debug', message), ...meta);
  }

  info(message: string, ...meta: unknown[]): void {
    if (this.enabled('info')) console.info(this.format('info', message), ...meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    if (this.enabled('warn')) console.warn(this.format('warn', message), ...meta);
  }

  error(message: string, error?: unknown): void {
    if (!this.enabled('error')) return;
    if (error instanceof Error) {
      console.error(this.format('error', `${message}: ${error.message}`));
      if (error.stack && this.level === 'debug') console.error(error.stack);
      return;
    }
    if (error !== undefined) {
      console.error(this.format('error', message), error);
      return;
    }
    console.error(this.format('error', message));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(level: LogLevel, message: string): string {
    return `[${new Date().toISOString()}] ${level.toUpperCase().padEnd(5)} ${message}`;
  }
}
