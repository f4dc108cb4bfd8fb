import { describe, it, expect } from 'vitest';
import type { RunEvent } from '@shared/types';
import { RunFaultError } from '../../../errors';
import { ProgressReporter } from '../ProgressReporter';
import { ResultAggregator } from '../ResultAggregator';
import { WorkerPool, partition, type UnitExecutor } from '../WorkerPool';
import { TIMESTAMP, makeContext, makeUnit, successOutcome } from './fixtures';

function createPool(execute: UnitExecutor, unitCount: number, maxWorkers: number, batchSize: number) {
  const context = makeContext({ maxWorkers, batchSize });
  const aggregator = new ResultAggregator();
  const progress = new ProgressReporter(context.emitter, aggregator, Math.ceil(unitCount / batchSize));
  const units = Array.from({ length: unitCount }, (_, i) => makeUnit(i));
  aggregator.reserve(units);
  const pool = new WorkerPool({ context, aggregator, progress, execute, now: () => new Date(TIMESTAMP) });
  return { pool, context, aggregator, units };
}

describe('partition', () => {
  it('should cut items into batches of the given size', () => {
    expect(partition([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(partition([], 3)).toEqual([]);
  });
});

describe('WorkerPool', () => {
  it('should wait for a whole batch before starting the next', async () => {
    const log: string[] = [];
    const execute: UnitExecutor = async (unit) => {
      log.push(`start ${unit.index}`);
      await new Promise((resolve) => setTimeout(resolve, unit.index === 0 ? 20 : 1));
      log.push(`end ${unit.index}`);
      return successOutcome(unit);
    };
    const { pool, units } = createPool(execute, 3, 5, 2);

    await pool.run(units);

    expect(log.indexOf('start 2')).toBeGreaterThan(log.indexOf('end 0'));
    expect(log.indexOf('start 2')).toBeGreaterThan(log.indexOf('end 1'));
    expect(pool.peakActive).toBe(2);
    expect(pool.activeCount).toBe(0);
  });

  it('should emit batch-completed with progress after each batch', async () => {
    const { pool, context, units } = createPool(async (unit) => successOutcome(unit), 3, 2, 2);
    const batches: RunEvent[] = [];
    context.emitter.on('batch-completed', (event) => batches.push(event));

    await pool.run(units);

    expect(batches).toHaveLength(2);
    expect(batches[0]).toMatchObject({ batchIndex: 0, progress: { devicesCompleted: 2, totalDevices: 3, percent: 66.67 } });
    expect(batches[1]).toMatchObject({
      batchIndex: 1,
      progress: { devicesCompleted: 3, percent: 100, batchesCompleted: 2, totalBatches: 2 },
    });
  });

  it('should turn an exception escaping a worker into a RunFaultError', async () => {
    const { pool, units } = createPool(async () => {
      throw new Error('boom');
    }, 2, 2, 2);

    const error = await pool.run(units).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RunFaultError);
    expect(error).toHaveProperty('message', 'Worker failed unexpectedly: boom');
  });

  it('should fault when a worker reports the wrong number of results', async () => {
    const { pool, units } = createPool(async () => ({ terminal: 'success', attempts: 1, results: [] }), 1, 1, 1);

    await expect(pool.run(units)).rejects.toThrow('Outcome for 10.0.0.1 has 0 results, expected 1');
  });

  it('should record undispatched units as cancelled after cancel', async () => {
    let cancel: () => void = () => undefined;
    const { pool, context, aggregator, units } = createPool(async (unit) => {
      cancel();
      return successOutcome(unit);
    }, 4, 1, 4);
    cancel = () => context.cancel('Operator stop');

    await pool.run(units);
    const report = aggregator.snapshot({ runId: 'run-test', startedAt: TIMESTAMP, cancelled: true });

    expect(report.entries.map((e) => e.state)).toEqual(['success', 'cancelled', 'cancelled', 'cancelled']);
    expect(report.entries[1].attempts).toBe(0);
    expect(report.entries[1].results).toEqual([
      { command: 'show version', output: 'Operator stop', status: 'cancelled', timestamp: TIMESTAMP },
    ]);
  });
});
