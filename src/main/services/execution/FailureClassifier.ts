/**
 * FailureClassifier: maps what went wrong in a session to a failure kind and
 * decides whether another attempt is made.
 *
 *   kind     retried   scope
 *   connect  yes       whole session
 *   timeout  yes       whole session
 *   auth     no        whole session
 *   command  no        one command (normal) or rest of the block (config)
 *
 * Retries are fresh sessions separated by retryDelaySeconds × attempt.
 */

import type { FailureKind, RunSettings } from '@shared/types';
import { TransportError, errorMessage } from '../../errors';

/** Where in the session the error surfaced. */
export type SessionPhase = 'connect' | 'escalate' | 'execute';

export interface FailureClassification {
  kind: FailureKind;
  retryable: boolean;
  detail: string;
}

const RETRYABLE_KINDS: ReadonlySet<FailureKind> = new Set<FailureKind>(['connect', 'timeout']);

export class FailureClassifier {
  constructor(private readonly policy: Pick<RunSettings, 'retryCount' | 'retryDelaySeconds'>) {}

  /** Total attempts a retryable failure may use. */
  get maxAttempts(): number {
    return this.policy.retryCount + 1;
  }

  classify(error: unknown, phase: SessionPhase): FailureClassification {
    const kind = FailureClassifier.kindOf(error, phase);
    return { kind, retryable: RETRYABLE_KINDS.has(kind), detail: errorMessage(error) };
  }

  /** `attempt` is 1-based and counts the attempt that just failed. */
  shouldRetry(kind: FailureKind, attempt: number): boolean {
    return RETRYABLE_KINDS.has(kind) && attempt < this.maxAttempts;
  }

  /** Wait before attempt `attempt + 1`. */
  backoffMs(attempt: number): number {
    return Math.round(this.policy.retryDelaySeconds * 1000 * attempt);
  }

  static isRetryable(kind: FailureKind): boolean {
    return RETRYABLE_KINDS.has(kind);
  }

  private static kindOf(error: unknown, phase: SessionPhase): FailureKind {
    switch (phase) {
      case 'connect':
        if (error instanceof TransportError && error.kind !== 'command') return error.kind;
        return 'connect';
      case 'escalate':
        // A device that never reaches privileged mode is an authentication problem.
        return 'auth';
      case 'execute':
        if (error instanceof TransportError) {
          return error.kind === 'auth' ? 'command' : error.kind;
        }
        return 'command';
    }
  }
}
