/**
 * Shared logger
 *
 * noti sits in the middle of pipelines and may echo its input to stdout, so
 * every logger writes to stderr unless it is created on the `stdout` channel.
 * Lines look like `[YYYY-MM-DD HH:mm:ss] [Component] message`, in the `TZ`
 * zone (system zone when unset).
 */

export type LogChannel = 'stdout' | 'stderr';

export interface LoggerOptions {
  /** Defaults to stderr */
  channel?: LogChannel;
}

type Level = 'info' | 'warn' | 'error' | 'debug';

function formatTimestamp(date: Date = new Date()): string {
  return date.toLocaleString('sv-SE', {
    timeZone: process.env.TZ || undefined,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
}

export class Logger {
  readonly channel: LogChannel;
  private readonly prefix: string;

  constructor(prefix: string, options?: LoggerOptions) {
    this.prefix = prefix;
    this.channel = options?.channel ?? 'stderr';
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  /**
   * Only printed when DEBUG is set
   */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.DEBUG) {
      this.log('debug', message, args);
    }
  }

  /**
   * User-facing output: no timestamp, no prefix
   */
  raw(message: string): void {
    this.print('info', message, []);
  }

  private log(level: Level, message: string, args: unknown[]): void {
    this.print(level, `[${formatTimestamp()}] [${this.prefix}] ${level === 'debug' ? '[DEBUG] ' : ''}${message}`, args);
  }

  // errors always go to stderr, even on the stdout channel
  private print(level: Level, line: string, args: unknown[]): void {
    if (this.channel === 'stderr' || level === 'error') {
      console.error(line, ...args);
    } else if (level === 'warn') {
      console.warn(line, ...args);
    } else {
      console.log(line, ...args);
    }
  }
}

export function createLogger(prefix: string, options?: LoggerOptions): Logger {
  return new Logger(prefix, options);
}
