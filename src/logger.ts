export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

let threshold: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

type ConsoleMethod = 'debug' | 'log' | 'warn' | 'error';

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, method: ConsoleMethod) =>
    (...args: unknown[]) => {
      if (LEVELS[level] < LEVELS[threshold]) return;
      console[method](`[${scope}]`, ...args);
    };

  return {
    debug: emit('debug', 'debug'),
    info: emit('info', 'log'),
    warn: emit('warn', 'warn'),
    error: emit('error', 'error'),
  };
}
