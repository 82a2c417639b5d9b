import { serverEnv, type ServerEnv } from '@/lib/env/server';

export type LogLevel = ServerEnv['LOG_LEVEL'];

type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

// Looked up on every call so console spies installed later still see output
const SINKS: Record<Exclude<LogLevel, 'silent'>, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * Console logger scoped to one part of the pipeline
 */
export function createLogger(scope: string, level: LogLevel = serverEnv.LOG_LEVEL): Logger {
  const threshold = LOG_LEVEL_PRIORITY[level];

  const emit =
    (messageLevel: Exclude<LogLevel, 'silent'>) =>
    (message: string, context?: LogContext): void => {
      if (LOG_LEVEL_PRIORITY[messageLevel] < threshold) return;

      const line = `[${scope}] ${message}`;
      if (context) {
        SINKS[messageLevel](line, context);
      } else {
        SINKS[messageLevel](line);
      }
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
