/**
 * Scoped console logger.
 *
 * Lines read `[Scope] message` followed by the (sanitized) metadata, the same
 * shape the services use when they log directly. The threshold comes from
 * RUNNER_LOG_LEVEL, or from setLogLevel() once run settings are known.
 */

import type { LogLevel } from '@shared/types';
import { sanitizeForLog } from './sanitize';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env.RUNNER_LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

/** The environment variable wins over settings so tests and operators can silence runs. */
export function setLogLevel(level: LogLevel): void {
  if (isLogLevel(process.env.RUNNER_LOG_LEVEL)) return;
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    const line = `[${scope}] ${message}`;
    const args: unknown[] = meta ? [line, sanitizeForLog(meta)] : [line];
    switch (level) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.log(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}
