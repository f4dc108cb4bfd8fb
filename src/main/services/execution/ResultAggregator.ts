/**
 * ResultAggregator: the single store of per-device outcomes for a run.
 *
 * Slots are reserved by list position before anything is dispatched, so the
 * report order never depends on completion order. Each slot is written exactly
 * once, by the worker that ran the device; a second write is an internal fault.
 */

import type {
  DeviceOutcome,
  ExecutionReport,
  ExecutionUnit,
  FailureKind,
  ReportEntry,
  RunCounters,
} from '@shared/types';
import { RunFaultError } from '../../errors';

interface Slot {
  unit: ExecutionUnit;
  outcome: DeviceOutcome | null;
}

export interface ReportMeta {
  runId: string;
  startedAt: string;
  completedAt?: string;
  cancelled: boolean;
}

export function emptyCounters(): RunCounters {
  return { succeeded: 0, failed: 0, skipped: 0, cancelled: 0 };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}

export class ResultAggregator {
  private slots: Slot[] = [];
  private reserved = false;
  private completed = 0;
  private counters: RunCounters = emptyCounters();

  /** Allocate one slot per unit. `units[i].index` must equal i. */
  reserve(units: readonly ExecutionUnit[]): void {
    if (this.reserved) {
      throw new RunFaultError('Result slots were already reserved for this run');
    }
    units.forEach((unit, i) => {
      if (unit.index !== i) {
        throw new RunFaultError(`Unit ${unit.device.address} has index ${unit.index}, expected ${i}`);
      }
    });
    this.slots = units.map((unit) => ({ unit, outcome: null }));
    this.reserved = true;
  }

  record(index: number, outcome: DeviceOutcome): void {
    const slot = this.slots[index];
    if (!slot) {
      throw new RunFaultError(`No result slot reserved at index ${index}`);
    }
    if (slot.outcome) {
      throw new RunFaultError(`Result for ${slot.unit.device.address} (index ${index}) was already recorded`);
    }
    const expected = slot.unit.commandSet.commands.length;
    if (outcome.results.length !== expected) {
      throw new RunFaultError(
        `Outcome for ${slot.unit.device.address} has ${outcome.results.length} results, expected ${expected}`,
      );
    }

    slot.outcome = {
      ...outcome,
      results: outcome.results.map((result) => ({ ...result })),
    };
    this.completed++;

    for (const result of outcome.results) {
      switch (result.status) {
        case 'success':
          this.counters.succeeded++;
          break;
        case 'failure':
          this.counters.failed++;
          break;
        case 'skipped':
          this.counters.skipped++;
          break;
        case 'cancelled':
          this.counters.cancelled++;
          break;
      }
    }
  }

  isRecorded(index: number): boolean {
    return this.slots[index]?.outcome != null;
  }

  get totalCount(): number {
    return this.slots.length;
  }

  get completedCount(): number {
    return this.completed;
  }

  getCounters(): RunCounters {
    return { ...this.counters };
  }

  /** Devices whose recorded outcome failed, by failure kind. */
  failuresByKind(): Record<FailureKind, number> {
    const summary: Record<FailureKind, number> = { connect: 0, auth: 0, timeout: 0, command: 0 };
    for (const { outcome } of this.slots) {
      if (outcome?.terminal === 'failure' && outcome.failureKind) {
        summary[outcome.failureKind]++;
      }
    }
    return summary;
  }

  /** Deep-frozen copy of the current state; unrecorded slots read 'pending'. */
  snapshot(meta: ReportMeta): ExecutionReport {
    const entries: ReportEntry[] = this.slots.map(({ unit, outcome }) => {
      const entry: ReportEntry = {
        index: unit.index,
        device: { ...unit.device },
        state: outcome ? outcome.terminal : 'pending',
        results: outcome ? outcome.results.map((result) => ({ ...result })) : [],
        attempts: outcome ? outcome.attempts : 0,
      };
      if (outcome?.error) entry.error = outcome.error;
      return entry;
    });

    const report: ExecutionReport = {
      runId: meta.runId,
      startedAt: meta.startedAt,
      cancelled: meta.cancelled,
      counters: this.getCounters(),
      entries,
    };
    if (meta.completedAt) report.completedAt = meta.completedAt;
    return deepFreeze(report);
  }
}
