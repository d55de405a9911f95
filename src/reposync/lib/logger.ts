export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const isLogLevel = (value: string | undefined): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix: string,
    private readonly level?: LogLevel,
  ) {}

  // Without a fixed level the environment is read on every call, so
  // `--log-level` takes effect for loggers created at import time.
  private shouldLog(level: LogLevel): boolean {
    const threshold = this.level ?? resolveLogLevel();
    if (threshold === 'silent') {
      return false;
    }
    return LOG_LEVELS.indexOf(threshold) <= LOG_LEVELS.indexOf(level);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }
}

export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): LogLevel => {
  const requested = env['LOG_LEVEL']?.trim().toLowerCase();
  if (isLogLevel(requested)) {
    return requested;
  }
  return env['NODE_ENV'] === 'test' ? 'silent' : 'warn';
};

export const createLogger = (prefix = '', level?: LogLevel): Logger =>
  new ConsoleLogger(prefix, level);

export const silentLogger: Logger = createLogger('', 'silent');
