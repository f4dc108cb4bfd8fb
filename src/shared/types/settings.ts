/**
 * Run settings types
 */

import type { CommandMode } from './execution';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface RunSettings {
  /** Parallel sessions, 1–50. */
  maxWorkers: number;
  /** Devices per batch, 1–100. A batch finishes before the next one starts. */
  batchSize: number;

  connectTimeoutSeconds: number;
  /** Per-operation timeout: one command, one privilege or config-mode step. */
  commandTimeoutSeconds: number;

  /** Extra full-session attempts after a connect or timeout failure. */
  retryCount: number;
  /** Base delay between attempts; attempt n waits n × this value. */
  retryDelaySeconds: number;

  mode: CommandMode;

  /** Maximum characters kept from one command's output. */
  maxOutputChars: number;

  logLevel: LogLevel;
}

export const DEFAULT_RUN_SETTINGS: RunSettings = {
  maxWorkers: 10,
  batchSize: 5,

  connectTimeoutSeconds: 30,
  commandTimeoutSeconds: 120,

  retryCount: 2,
  retryDelaySeconds: 1,

  mode: 'normal',

  maxOutputChars: 1024 * 1024,

  logLevel: 'info',
};
