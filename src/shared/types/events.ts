/**
 * Events emitted while a run executes.
 * A presentation layer subscribes to these instead of being called directly;
 * renderers handle the types they know and ignore the rest.
 */

import type {
  ExecutionReport,
  FailureKind,
  ProgressSnapshot,
  SessionResult,
  SessionState,
  TerminalState,
} from './execution';
import type { RunSettings } from './settings';

export type RunEvent =
  | { type: 'run-started'; runId: string; totalDevices: number; totalBatches: number; settings: RunSettings }
  | { type: 'batch-started'; batchIndex: number; size: number }
  | { type: 'unit-dispatched'; index: number; address: string }
  | { type: 'session-state'; index: number; address: string; state: SessionState; attempt: number }
  /** Inline result stream. Failures carry status 'failure' and a failureKind. */
  | { type: 'command-result'; index: number; address: string; result: SessionResult }
  | {
      type: 'attempt-failed';
      index: number;
      address: string;
      attempt: number;
      maxAttempts: number;
      kind: FailureKind;
      error: string;
      willRetry: boolean;
    }
  | { type: 'device-completed'; index: number; address: string; terminal: TerminalState; progress: ProgressSnapshot }
  | { type: 'batch-completed'; batchIndex: number; progress: ProgressSnapshot }
  | { type: 'run-paused' }
  | { type: 'run-resumed' }
  | { type: 'run-cancelled'; reason: string }
  | {
      type: 'run-completed';
      report: ExecutionReport;
      /** Devices whose final outcome failed, by failure kind. */
      failuresByKind: Record<FailureKind, number>;
    }
  /** The run stopped on an internal fault; execute() rejects with the same message. */
  | { type: 'run-failed'; runId: string; error: string };

export type RunEventType = RunEvent['type'];

export type RunEventOf<T extends RunEventType> = Extract<RunEvent, { type: T }>;
