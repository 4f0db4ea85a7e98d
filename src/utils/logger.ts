/**
 * Sign-in logging
 * Every line passes through the sanitizer so codes, state, verifiers and tokens never reach the sink
 */

import { type LogMetadata, sanitizeForLogging } from './sanitizer.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Anything console-shaped: the orchestrator, listener and token client accept one */
export type Logger = Pick<Console, 'info' | 'error' | 'warn' | 'debug'>;

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(levels, value);
}

// Redirect and exchange progress is debug/info; failed sign-ins and revocations show at the default
let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'warn';

function shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
  return levels[level] >= levels[currentLevel];
}

/**
 * Change the level for every logger created by this module, including the default one
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function isMetadata(value: unknown): value is LogMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * @param sink - Receives redacted lines; a trailing non-object argument is wrapped as `{ detail }`
 */
export function createSanitizedLogger(sink: Logger = console): Logger {
  const createLogMethod = (consoleMethod: 'info' | 'warn' | 'error' | 'debug') => {
    return (message: unknown, ...args: unknown[]) => {
      if (!shouldLog(consoleMethod)) {
        return;
      }

      const first = args[0];
      const metadata: LogMetadata = isMetadata(first) ? first : first === undefined ? {} : { detail: first };
      const { message: clean, meta: cleanMeta } = sanitizeForLogging(String(message), metadata);
      if (Object.keys(cleanMeta).length > 0) {
        sink[consoleMethod](clean, cleanMeta);
      } else {
        sink[consoleMethod](clean);
      }
    };
  };

  return {
    info: createLogMethod('info'),
    warn: createLogMethod('warn'),
    error: createLogMethod('error'),
    debug: createLogMethod('debug'),
  };
}

// Used by components constructed without a logger
export const logger = createSanitizedLogger();
