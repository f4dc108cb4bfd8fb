/**
 * RunContext: the settings and control signals of one run.
 *
 * Created per run and handed to every component by reference. Pause and cancel
 * are plain flags: workers read them at their suspension points, and waiters
 * are woken through stored resolvers, the same way a paused plan waits.
 */

import type { RunSettings } from '@shared/types';
import type { RunEmitter } from './RunEmitter';

export class RunContext {
  private readonly controller = new AbortController();
  private isPausedFlag = false;
  private resumeWaiters: Array<() => void> = [];
  private reason: string | null = null;

  constructor(
    public readonly runId: string,
    public readonly settings: Readonly<RunSettings>,
    public readonly emitter: RunEmitter,
  ) {}

  /** Aborts when the run is cancelled. Passed to every transport wait. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isPaused(): boolean {
    return this.isPausedFlag;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get cancelReason(): string | null {
    return this.reason;
  }

  /** Stop dispatching new units. In-flight sessions keep going. */
  pause(): void {
    if (this.isPausedFlag || this.isCancelled) return;
    this.isPausedFlag = true;
    this.emitter.publish({ type: 'run-paused' });
  }

  resume(): void {
    if (!this.isPausedFlag) return;
    this.isPausedFlag = false;
    this.wakeWaiters();
    this.emitter.publish({ type: 'run-resumed' });
  }

  cancel(reason = 'Cancelled by user'): void {
    if (this.isCancelled) return;
    this.reason = reason;
    this.isPausedFlag = false;
    this.controller.abort();
    this.wakeWaiters();
    this.emitter.publish({ type: 'run-cancelled', reason });
  }

  /** Resolves immediately unless paused; a cancel also releases the wait. */
  waitWhilePaused(): Promise<void> {
    if (!this.isPausedFlag || this.isCancelled) return Promise.resolve();
    return new Promise((resolve) => {
      this.resumeWaiters.push(resolve);
    });
  }

  private wakeWaiters(): void {
    const waiters = this.resumeWaiters;
    this.resumeWaiters = [];
    for (const wake of waiters) wake();
  }
}
