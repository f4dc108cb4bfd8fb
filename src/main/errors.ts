/**
 * Error taxonomy for a run.
 *
 *   ValidationError: bad input, raised before any device is dispatched
 *   TransportError: one device's connect/auth/timeout/command failure;
 *                   converted into SessionResults at the session boundary
 *   CancelledError: cooperative abort after the user stopped the run
 *   RunFaultError: internal fault; rejects the whole run
 */

import type { FailureKind } from '@shared/types';

export type ValidationErrorCode =
  | 'EmptyDeviceList'
  | 'MissingColumn'
  | 'InvalidAddress'
  | 'EmptyCommandSet'
  | 'UnsupportedDeviceType'
  | 'MissingCredentials'
  | 'InvalidSettings';

/**
 * Base class carrying the component that raised the error.
 */
export class RunnerError extends Error {
  public readonly component: string;
  public readonly timestamp: number;

  constructor(message: string, component: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RunnerError';
    this.component = component;
    this.timestamp = Date.now();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      component: this.component,
      timestamp: this.timestamp,
    };
  }
}

export class ValidationError extends RunnerError {
  public readonly code: ValidationErrorCode;
  /** Row number (1-based, header excluded) when the problem is tied to a row. */
  public readonly row?: number;

  constructor(code: ValidationErrorCode, message: string, row?: number) {
    super(row === undefined ? message : `Row ${row}: ${message}`, 'Validation');
    this.name = 'ValidationError';
    this.code = code;
    this.row = row;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), code: this.code, row: this.row };
  }
}

export type TransportErrorKind = FailureKind;

export class TransportError extends RunnerError {
  public readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, 'Transport', options);
    this.name = 'TransportError';
    this.kind = kind;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), kind: this.kind };
  }
}

export class CancelledError extends RunnerError {
  constructor(message = 'Cancelled by user') {
    super(message, 'Run');
    this.name = 'CancelledError';
  }
}

export class RunFaultError extends RunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'WorkerPool', options);
    this.name = 'RunFaultError';
  }
}

/** Human-readable message for anything thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
