/**
 * Structured execution types for per-device results and run reports.
 */

import type { Device } from './device';

/**
 * 'normal': each command is sent and recorded on its own.
 * 'config': the command set is one block; the first failure skips the rest.
 */
export type CommandMode = 'normal' | 'config';

export type ResultStatus = 'success' | 'failure' | 'skipped' | 'cancelled';

/** Per-device failure taxonomy. Cancellation is a status, not a kind. */
export type FailureKind = 'connect' | 'auth' | 'timeout' | 'command';

export type SessionState =
  | 'idle'
  | 'connecting'
  | 'authenticating'
  | 'privilege-escalation'
  | 'ready'
  | 'executing'
  | 'disconnecting'
  | 'terminal';

export type TerminalState = 'success' | 'failure' | 'cancelled';

/** Outcome of one command on one device. */
export interface SessionResult {
  command: string;
  /** Captured output on success, error detail or reason otherwise. */
  output: string;
  status: ResultStatus;
  failureKind?: FailureKind;
  timestamp: string; // ISO string
}

/** Final, recorded outcome of one device. */
export interface DeviceOutcome {
  terminal: TerminalState;
  results: SessionResult[];
  /** Number of session attempts made (0 when the device was never started). */
  attempts: number;
  failureKind?: FailureKind;
  error?: string;
}

export interface RunCounters {
  succeeded: number;
  failed: number;
  skipped: number;
  cancelled: number;
}

export interface ReportEntry {
  index: number;
  device: Device;
  state: TerminalState | 'pending';
  results: SessionResult[];
  attempts: number;
  error?: string;
}

export interface ExecutionReport {
  runId: string;
  startedAt: string;
  completedAt?: string;
  cancelled: boolean;
  counters: RunCounters;
  entries: ReportEntry[];
}

export interface ProgressSnapshot {
  devicesCompleted: number;
  totalDevices: number;
  /** devicesCompleted / totalDevices as a percentage, two decimals. */
  percent: number;
  batchesCompleted: number;
  totalBatches: number;
  counters: RunCounters;
}
