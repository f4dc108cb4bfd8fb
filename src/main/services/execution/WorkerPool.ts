/**
 * WorkerPool: batch scheduler over a counting semaphore.
 *
 * Units are cut into batches of `batchSize`. Within a batch at most
 * min(maxWorkers, batchSize) sessions are in flight; the next batch starts only
 * once every unit of the current one has been recorded. Pause gates dispatch
 * at batch boundaries and before each unit. Cancel stops dispatch, and every
 * unit never started is recorded as cancelled.
 */

import type { DeviceOutcome, ExecutionUnit, SessionResult } from '@shared/types';
import { RunFaultError, errorMessage } from '../../errors';
import { createLogger } from '../../utils/logger';
import type { ProgressReporter } from './ProgressReporter';
import type { ResultAggregator } from './ResultAggregator';
import type { RunContext } from './RunContext';
import { Semaphore } from './Semaphore';

const log = createLogger('WorkerPool');

export type UnitExecutor = (unit: ExecutionUnit) => Promise<DeviceOutcome>;

export interface WorkerPoolOptions {
  context: RunContext;
  aggregator: ResultAggregator;
  progress: ProgressReporter;
  execute: UnitExecutor;
  now: () => Date;
}

export function partition<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export class WorkerPool {
  private active = 0;
  private peak = 0;
  private readonly limit: number;

  constructor(private readonly options: WorkerPoolOptions) {
    const { maxWorkers, batchSize } = options.context.settings;
    this.limit = Math.min(maxWorkers, batchSize);
  }

  /** Highest number of sessions that were in flight at once. */
  get peakActive(): number {
    return this.peak;
  }

  get activeCount(): number {
    return this.active;
  }

  async run(units: readonly ExecutionUnit[]): Promise<void> {
    const { context, progress } = this.options;
    const batches = partition(units, context.settings.batchSize);
    const semaphore = new Semaphore(this.limit);

    for (let batchIndex = 0; batchIndex < batches.length; batchIndex++) {
      await context.waitWhilePaused();
      if (context.isCancelled) break;

      const batch = batches[batchIndex];
      context.emitter.publish({ type: 'batch-started', batchIndex, size: batch.length });
      log.debug(`Batch ${batchIndex + 1}/${batches.length} started (${batch.length} devices)`);

      const inFlight: Promise<void>[] = [];
      for (const unit of batch) {
        await semaphore.acquire();
        await context.waitWhilePaused();
        if (context.isCancelled) {
          semaphore.release();
          break;
        }
        inFlight.push(this.dispatch(unit, semaphore));
      }

      const settled = await Promise.allSettled(inFlight);
      const fault = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
      if (fault) {
        throw fault.reason instanceof RunFaultError
          ? fault.reason
          : new RunFaultError(`Worker failed unexpectedly: ${errorMessage(fault.reason)}`, { cause: fault.reason });
      }

      if (context.isCancelled) break;
      progress.batchCompleted(batchIndex);
    }

    if (context.isCancelled) this.cancelUndispatched(units);
  }

  private async dispatch(unit: ExecutionUnit, semaphore: Semaphore): Promise<void> {
    const { context, aggregator, progress, execute } = this.options;

    this.active++;
    try {
      if (this.active > this.limit) {
        throw new RunFaultError(`Worker quota exceeded: ${this.active} active, limit ${this.limit}`);
      }
      this.peak = Math.max(this.peak, this.active);
      context.emitter.publish({ type: 'unit-dispatched', index: unit.index, address: unit.device.address });

      const outcome = await execute(unit);
      aggregator.record(unit.index, outcome);
      progress.deviceCompleted(unit, outcome.terminal);
    } finally {
      this.active--;
      semaphore.release();
    }
  }

  private cancelUndispatched(units: readonly ExecutionUnit[]): void {
    const { aggregator, progress, now } = this.options;
    const reason = this.options.context.cancelReason ?? 'Cancelled by user';

    for (const unit of units) {
      if (aggregator.isRecorded(unit.index)) continue;
      const timestamp = now().toISOString();
      aggregator.record(unit.index, {
        terminal: 'cancelled',
        attempts: 0,
        results: unit.commandSet.commands.map((command): SessionResult => ({
          command,
          output: reason,
          status: 'cancelled',
          timestamp,
        })),
      });
      progress.deviceCompleted(unit, 'cancelled');
    }
  }
}
