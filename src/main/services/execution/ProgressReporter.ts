/**
 * ProgressReporter: turns aggregator state into progress events.
 */

import type { ExecutionUnit, ProgressSnapshot, TerminalState } from '@shared/types';
import type { ResultAggregator } from './ResultAggregator';
import type { RunEmitter } from './RunEmitter';

export function percentOf(done: number, total: number): number {
  if (total === 0) return 100;
  return Math.round((done / total) * 10000) / 100;
}

export class ProgressReporter {
  private batchesCompleted = 0;

  constructor(
    private readonly emitter: RunEmitter,
    private readonly aggregator: ResultAggregator,
    private readonly totalBatches: number,
  ) {}

  snapshot(): ProgressSnapshot {
    const devicesCompleted = this.aggregator.completedCount;
    const totalDevices = this.aggregator.totalCount;
    return {
      devicesCompleted,
      totalDevices,
      percent: percentOf(devicesCompleted, totalDevices),
      batchesCompleted: this.batchesCompleted,
      totalBatches: this.totalBatches,
      counters: this.aggregator.getCounters(),
    };
  }

  deviceCompleted(unit: ExecutionUnit, terminal: TerminalState): void {
    this.emitter.publish({
      type: 'device-completed',
      index: unit.index,
      address: unit.device.address,
      terminal,
      progress: this.snapshot(),
    });
  }

  batchCompleted(batchIndex: number): void {
    this.batchesCompleted++;
    this.emitter.publish({ type: 'batch-completed', batchIndex, progress: this.snapshot() });
  }
}
