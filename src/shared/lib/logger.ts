/**
 * @module Shared/Logger
 * @layer Shared
 * @description Консольный логгер движка.
 * Вне режима разработки (NODE_ENV=development) печатаются только ошибки.
 * Каждый слой получает свой логгер с префиксом `[scope]`.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogArgs = readonly unknown[];

export type Logger = Record<LogLevel, (...args: LogArgs) => void>;

// Looked up at call time so that spies installed later still see the output
const SINKS: Logger = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args)
};

const isEnabled = (level: LogLevel): boolean =>
  level === 'error' || process.env.NODE_ENV === 'development';

export const createLogger = (scope?: string): Logger => {
  const emit = (level: LogLevel) => (...args: LogArgs): void => {
    if (!isEnabled(level)) return;
    SINKS[level](...(scope ? [`[${scope}]`, ...args] : args));
  };
  return { debug: emit('debug'), info: emit('info'), warn: emit('warn'), error: emit('error') };
};

export const logger = createLogger();
