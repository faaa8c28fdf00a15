export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Messages below this level are dropped (default: `info`) */
  level?: LogLevel;
  /** Clock used for timestamps (default: `() => new Date()`) */
  now?: () => Date;
}

/**
 * Format a log line as `[YYYY-MM-DD HH:MM:SS]     INFO: message`.
 *
 * The level name is upper-cased and right-aligned to 8 columns.
 */
export function formatLogLine(level: LogLevel, message: string, date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp =
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `[${stamp}] ${level.toUpperCase().padStart(8)}: ${message}`;
}

/**
 * Create a console logger. `debug` and `info` go to stdout, `warn` and
 * `error` to stderr.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const now = options.now ?? (() => new Date());

  function log(level: LogLevel, message: string): void {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    const line = formatLogLine(level, message, now());
    if (level === 'warn' || level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  return {
    debug: (message) => log('debug', message),
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
  };
}
