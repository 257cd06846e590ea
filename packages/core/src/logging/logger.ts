/**
 * Logger - level-filtered logging shared by every engine component
 *
 * Components receive a Logger instead of writing to the console so the CLI
 * can colour output and tests can stay quiet.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export type LogSink = (level: LogLevel, line: string) => void;

// stdout is reserved for command output
const defaultSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Render extra log arguments the same way for every sink
 */
export function formatLogArgs(args: unknown[]): string {
  return args
    .map(arg => {
      if (arg instanceof Error) {
        return arg.stack ? `${arg.message}\n${arg.stack}` : arg.message;
      }
      if (typeof arg === 'object' && arg !== null) {
        try {
          return JSON.stringify(arg);
        } catch {
          return String(arg);
        }
      }
      return String(arg);
    })
    .join(' ');
}

/**
 * Console logger writing timestamped lines to stderr
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;
  private readonly timestamps: boolean;

  constructor(minLevel: LogLevel = 'info', options: { sink?: LogSink; timestamps?: boolean } = {}) {
    this.minLevel = minLevel;
    this.sink = options.sink ?? defaultSink;
    this.timestamps = options.timestamps ?? true;
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVEL_PRIORITY[level] > LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const prefix = this.timestamps
      ? `[${new Date().toISOString()}] [${level.toUpperCase()}]`
      : `[${level.toUpperCase()}]`;
    const rest = args.length > 0 ? ` ${formatLogArgs(args)}` : '';
    this.sink(level, `${prefix} ${message}${rest}`);
  }
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};

