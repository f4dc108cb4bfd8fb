/**
 * CommandRunner: entry point of the execution engine.
 *
 * prepare() validates everything a run needs (settings, device table,
 * credentials) and returns a RunHandle; nothing is dispatched until
 * execute() is called on it. Any ValidationError surfaces from prepare(),
 * so a bad job never yields a partial report.
 *
 * Supports pause, resume, and cancel through the handle.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  DeviceType,
  ExecutionReport,
  ExecutionUnit,
  ProgressSnapshot,
  RunEvent,
  RunSettings,
} from '@shared/types';
import { resolveRunSettings } from '../../config/settings';
import { RunFaultError, errorMessage } from '../../errors';
import { createLogger, setLogLevel } from '../../utils/logger';
import { buildDeviceList, buildExecutionUnits } from '../devices/DeviceTable';
import { CredentialResolver, type CredentialProvider } from '../security/CredentialResolver';
import type { Transport } from '../transport/Transport';
import { ProgressReporter } from './ProgressReporter';
import { ResultAggregator } from './ResultAggregator';
import { RunContext } from './RunContext';
import { RunEmitter } from './RunEmitter';
import { SessionRunner } from './SessionRunner';
import { WorkerPool } from './WorkerPool';

const log = createLogger('CommandRunner');

export interface RunJob {
  /** Device rows as handed over by a table reader. */
  rows: readonly unknown[];
  /** Device type for rows that do not name one. */
  deviceType: DeviceType;
  /** Credential profile for devices without an override. */
  credentialProfile: string;
  settings?: Partial<RunSettings>;
}

export interface CommandRunnerOptions {
  transport: Transport;
  credentials: CredentialProvider;
  /** Clock for result timestamps and report times. */
  now?: () => Date;
  createRunId?: () => string;
}

export class RunHandle {
  readonly events: RunEmitter;
  private readonly context: RunContext;
  private readonly aggregator = new ResultAggregator();
  private readonly progress: ProgressReporter;
  private startedAt: string | null = null;
  private completedAt: string | null = null;
  private execution: Promise<ExecutionReport> | null = null;

  constructor(
    readonly runId: string,
    readonly settings: Readonly<RunSettings>,
    readonly units: readonly ExecutionUnit[],
    private readonly transport: Transport,
    private readonly now: () => Date,
  ) {
    this.events = new RunEmitter();
    this.context = new RunContext(runId, settings, this.events);
    this.progress = new ProgressReporter(this.events, this.aggregator, Math.ceil(units.length / settings.batchSize));
  }

  get totalBatches(): number {
    return Math.ceil(this.units.length / this.settings.batchSize);
  }

  get isPaused(): boolean {
    return this.context.isPaused;
  }

  get isCancelled(): boolean {
    return this.context.isCancelled;
  }

  pause(): void {
    this.context.pause();
  }

  resume(): void {
    this.context.resume();
  }

  cancel(reason?: string): void {
    this.context.cancel(reason);
  }

  /** Consistent copy of the report so far; callable while the run executes. */
  snapshot(): ExecutionReport {
    return this.aggregator.snapshot({
      runId: this.runId,
      startedAt: this.startedAt ?? this.now().toISOString(),
      ...(this.completedAt ? { completedAt: this.completedAt } : {}),
      cancelled: this.context.isCancelled,
    });
  }

  getProgress(): ProgressSnapshot {
    return this.progress.snapshot();
  }

  /** Async view of the run's events, ending with 'run-completed' or 'run-failed'. */
  stream(): AsyncGenerator<RunEvent, void, undefined> {
    return this.events.stream();
  }

  /** Run every unit. Calling it again returns the same promise. */
  execute(): Promise<ExecutionReport> {
    if (!this.execution) this.execution = this.executeOnce();
    return this.execution;
  }

  private async executeOnce(): Promise<ExecutionReport> {
    setLogLevel(this.settings.logLevel);
    this.startedAt = this.now().toISOString();
    this.aggregator.reserve(this.units);

    log.info(`Run ${this.runId} started`, {
      devices: this.units.length,
      batches: this.totalBatches,
      maxWorkers: this.settings.maxWorkers,
      batchSize: this.settings.batchSize,
      mode: this.settings.mode,
    });
    this.events.publish({
      type: 'run-started',
      runId: this.runId,
      totalDevices: this.units.length,
      totalBatches: this.totalBatches,
      settings: { ...this.settings },
    });

    const sessions = new SessionRunner({ transport: this.transport, context: this.context, now: this.now });
    const pool = new WorkerPool({
      context: this.context,
      aggregator: this.aggregator,
      progress: this.progress,
      execute: (unit) => sessions.run(unit),
      now: this.now,
    });

    try {
      await pool.run(this.units);
    } catch (error) {
      const fault =
        error instanceof RunFaultError
          ? error
          : new RunFaultError(`Run ${this.runId} failed: ${errorMessage(error)}`, { cause: error });
      log.error(`Run ${this.runId} aborted by an internal fault`, { error: fault.message });
      this.events.publish({ type: 'run-failed', runId: this.runId, error: fault.message });
      throw fault;
    }

    this.completedAt = this.now().toISOString();
    const report = this.snapshot();
    const failuresByKind = this.aggregator.failuresByKind();

    log.info(`Run ${this.runId} ${report.cancelled ? 'cancelled' : 'completed'}`, {
      ...report.counters,
      peakWorkers: pool.peakActive,
    });
    this.events.publish({ type: 'run-completed', report, failuresByKind });
    return report;
  }
}

export class CommandRunner {
  private readonly now: () => Date;
  private readonly createRunId: () => string;
  private readonly credentials: CredentialResolver;

  constructor(private readonly options: CommandRunnerOptions) {
    this.now = options.now ?? (() => new Date());
    this.createRunId = options.createRunId ?? (() => uuidv4());
    this.credentials = new CredentialResolver(options.credentials);
  }

  /**
   * Validate the job and build its execution units. Throws ValidationError
   * before anything is dispatched.
   */
  async prepare(job: RunJob): Promise<RunHandle> {
    const settings = Object.freeze(resolveRunSettings(job.settings));
    const planned = buildDeviceList(job.rows, { defaultDeviceType: job.deviceType });
    const profiles = await this.credentials.resolveAll(
      planned.map(({ device }) => device),
      job.credentialProfile,
    );
    const units = buildExecutionUnits(planned, profiles, {
      mode: settings.mode,
      defaultProfile: job.credentialProfile,
    });

    return new RunHandle(this.createRunId(), settings, units, this.options.transport, this.now);
  }

  /**
   * Prepare and execute in one step. `onEvent` receives every event of the run.
   */
  async run(job: RunJob, onEvent?: (event: RunEvent) => void): Promise<ExecutionReport> {
    const handle = await this.prepare(job);
    if (onEvent) handle.events.on('event', onEvent);
    return handle.execute();
  }
}
