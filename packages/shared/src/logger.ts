// Console logging for the library packages

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LoggerOptions {
  prefix?: string;
  /** Off under NODE_ENV=test unless set */
  enabled?: boolean;
  /** Lowest level printed; LOG_LEVEL or `info` when omitted */
  level?: LogLevel;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_RANK;
}

/**
 * Writes `<ISO time> <prefix> [LEVEL] message` lines to the console
 */
export class PrefixedLogger {
  readonly prefix: string;
  private readonly enabled: boolean;
  private readonly threshold: number;

  constructor(options: LoggerOptions = {}) {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    this.prefix = options.prefix || '[Streamcast]';
    this.enabled = options.enabled ?? process.env.NODE_ENV !== 'test';
    this.threshold = LEVEL_RANK[options.level ?? (isLogLevel(envLevel) ? envLevel : 'info')];
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  /**
   * The stack of `error` is printed after the message when it is an Error
   */
  error(message: string, error?: unknown): void {
    this.write('error', message, error instanceof Error ? error.stack : undefined);
  }

  private write(level: LogLevel, message: string, detail?: string): void {
    if (!this.enabled || LEVEL_RANK[level] < this.threshold) {
      return;
    }
    const line = `${new Date().toISOString()} ${this.prefix} [${level.toUpperCase()}] ${message}`;
    const args = detail ? [line, detail] : [line];
    switch (level) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.info(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  }
}

/**
 * Message of an unknown thrown value, without trailing punctuation
 */
export function formatError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.replace(/[.!?]+$/, '');
}

export function createLogger(prefix: string): PrefixedLogger {
  return new PrefixedLogger({ prefix });
}
