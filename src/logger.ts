// Leveled diagnostic logging for regline

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export class Logger {
  private level: LogLevel = LogLevel.WARN;

  constructor(private readonly prefix: string) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level <= this.level;
  }

  error(...args: unknown[]): void {
    this.write(LogLevel.ERROR, 'error', args);
  }

  warn(...args: unknown[]): void {
    this.write(LogLevel.WARN, 'warn', args);
  }

  info(...args: unknown[]): void {
    this.write(LogLevel.INFO, 'info', args);
  }

  debug(...args: unknown[]): void {
    this.write(LogLevel.DEBUG, 'debug', args);
  }

  private write(level: LogLevel, label: string, args: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }
    // eslint-disable-next-line no-console
    console.error(`[${this.prefix}] ${label}:`, ...args);
  }
}

export const logger = new Logger('regline');

/**
 * Per-module trace switch, controlled by REGLINE_DEBUG.
 */
export function lowerDebugEnabled(): boolean {
  const flag = process.env.REGLINE_DEBUG;
  return flag === '1' || flag === 'true' || flag === 'lower';
}

export function createTracer(scope: string): (...args: unknown[]) => void {
  return (...args: unknown[]) => {
    if (lowerDebugEnabled()) {
      // eslint-disable-next-line no-console
      console.error(`[LOWER][${scope}]`, ...args);
    }
  };
}
