/**
 * SessionRunner: drives one device through its session lifecycle.
 *
 *   idle → connecting → authenticating → [privilege-escalation] → ready
 *        → executing → disconnecting → terminal
 *
 * Each attempt is an independent session. Connect and timeout failures start a
 * new attempt after a linear backoff; only the last attempt's results are
 * returned. The results of a device always hold one entry per command.
 */

import type {
  DeviceOutcome,
  ExecutionUnit,
  FailureKind,
  ResultStatus,
  SessionResult,
  SessionState,
  TerminalState,
} from '@shared/types';
import { CancelledError } from '../../errors';
import { delay } from '../../utils/delay';
import { createLogger } from '../../utils/logger';
import { redactSecrets } from '../../utils/sanitize';
import type { OperationOptions, Transport, TransportSession } from '../transport/Transport';
import { FailureClassifier, type FailureClassification } from './FailureClassifier';
import type { RunContext } from './RunContext';

const log = createLogger('SessionRunner');

interface AttemptResult {
  results: SessionResult[];
  /** Set when the whole session failed (connect, auth, timeout, connection loss). */
  failure?: FailureClassification;
  cancelled: boolean;
}

export interface SessionRunnerOptions {
  transport: Transport;
  context: RunContext;
  now: () => Date;
}

export class SessionRunner {
  private readonly classifier: FailureClassifier;

  constructor(private readonly options: SessionRunnerOptions) {
    this.classifier = new FailureClassifier(options.context.settings);
  }

  private get context(): RunContext {
    return this.options.context;
  }

  async run(unit: ExecutionUnit): Promise<DeviceOutcome> {
    const { signal } = this.context;
    const maxAttempts = this.classifier.maxAttempts;
    let attempt = 0;
    let last: AttemptResult | null = null;

    this.transition(unit, 'idle', 1);

    while (!signal.aborted) {
      attempt++;
      last = await this.runAttempt(unit, attempt);
      if (!last.failure || last.cancelled) break;

      const { kind, detail } = last.failure;
      const willRetry = this.classifier.shouldRetry(kind, attempt) && !signal.aborted;
      this.context.emitter.publish({
        type: 'attempt-failed',
        index: unit.index,
        address: unit.device.address,
        attempt,
        maxAttempts,
        kind,
        error: detail,
        willRetry,
      });
      if (!willRetry) break;

      const waitMs = this.classifier.backoffMs(attempt);
      log.warn(`${unit.device.address} attempt ${attempt}/${maxAttempts} failed (${kind}), retrying in ${waitMs}ms`, {
        error: detail,
      });
      try {
        await delay(waitMs, signal);
      } catch (error) {
        if (error instanceof CancelledError) break;
        throw error;
      }
    }

    const finalAttempt: AttemptResult = last ?? {
      results: this.fill(unit.commandSet.commands, 'cancelled', 'Cancelled before the device was started'),
      cancelled: true,
    };
    const outcome = this.toOutcome(finalAttempt, last ? attempt : 0);

    this.transition(unit, 'terminal', Math.max(attempt, 1));
    for (const result of outcome.results) {
      this.context.emitter.publish({
        type: 'command-result',
        index: unit.index,
        address: unit.device.address,
        result,
      });
    }
    return outcome;
  }

  private async runAttempt(unit: ExecutionUnit, attempt: number): Promise<AttemptResult> {
    const { device, credentials, commandSet } = unit;
    const { settings, signal } = this.context;
    const commands = commandSet.commands;
    const operation: OperationOptions = { timeoutMs: settings.commandTimeoutSeconds * 1000, signal };

    this.transition(unit, 'connecting', attempt);
    let authenticating = false;
    let session: TransportSession;
    try {
      session = await this.options.transport.connect(
        {
          address: device.address,
          dns: device.dns,
          port: device.port,
          deviceType: device.deviceType,
          credentials,
        },
        {
          timeoutMs: settings.connectTimeoutSeconds * 1000,
          signal,
          onAuthenticating: () => {
            authenticating = true;
            this.transition(unit, 'authenticating', attempt);
          },
        },
      );
    } catch (error) {
      if (this.isCancellation(error)) {
        return { results: this.fill(commands, 'cancelled', 'Cancelled while connecting'), cancelled: true };
      }
      const failure = this.classifyFailure(error, 'connect', unit);
      return { results: this.fill(commands, 'failure', failure.detail, failure.kind), failure, cancelled: false };
    }

    if (!authenticating) this.transition(unit, 'authenticating', attempt);

    try {
      if (credentials.enableSecret) {
        this.transition(unit, 'privilege-escalation', attempt);
        try {
          await session.enterPrivilegedMode(credentials.enableSecret, operation);
        } catch (error) {
          if (this.isCancellation(error)) {
            return { results: this.fill(commands, 'cancelled', 'Cancelled during privilege escalation'), cancelled: true };
          }
          const failure = this.classifyFailure(error, 'escalate', unit);
          return { results: this.fill(commands, 'failure', failure.detail, failure.kind), failure, cancelled: false };
        }
      }

      this.transition(unit, 'ready', attempt);
      if (signal.aborted) {
        return { results: this.fill(commands, 'cancelled', 'Cancelled before execution'), cancelled: true };
      }

      this.transition(unit, 'executing', attempt);
      return commandSet.mode === 'config'
        ? await this.executeConfig(unit, session, operation)
        : await this.executeNormal(unit, session, operation);
    } finally {
      this.transition(unit, 'disconnecting', attempt);
      session.close();
    }
  }

  /** Every command on its own; a rejected command does not stop the rest. */
  private async executeNormal(
    unit: ExecutionUnit,
    session: TransportSession,
    operation: OperationOptions,
  ): Promise<AttemptResult> {
    const commands = unit.commandSet.commands;
    const results: SessionResult[] = [];

    for (let i = 0; i < commands.length; i++) {
      const command = commands[i];
      if (this.context.signal.aborted) {
        results.push(...this.fill(commands.slice(i), 'cancelled', 'Cancelled by user'));
        return { results, cancelled: true };
      }

      try {
        const output = await session.send(command, operation);
        results.push(this.result(command, this.clean(unit, output), 'success'));
      } catch (error) {
        if (this.isCancellation(error)) {
          results.push(...this.fill(commands.slice(i), 'cancelled', 'Cancelled by user'));
          return { results, cancelled: true };
        }

        const failure = this.classifyFailure(error, 'execute', unit);
        results.push(this.result(command, failure.detail, 'failure', failure.kind));
        if (failure.kind === 'command') continue;

        results.push(...this.fill(commands.slice(i + 1), 'skipped', `Session failed (${failure.kind})`));
        return { results, failure, cancelled: false };
      }
    }

    return { results, cancelled: false };
  }

  /**
   * The command set as one block inside configuration mode. Cancellation is
   * honoured up to entering configuration mode; once the block starts it runs
   * to its end without the run signal. The first failing command ends the block
   * and the rest are skipped. Configuration mode is left before disconnecting
   * whenever the channel is still usable.
   */
  private async executeConfig(
    unit: ExecutionUnit,
    session: TransportSession,
    operation: OperationOptions,
  ): Promise<AttemptResult> {
    const commands = unit.commandSet.commands;

    if (this.context.signal.aborted) {
      return { results: this.fill(commands, 'cancelled', 'Cancelled by user'), cancelled: true };
    }

    try {
      await session.enterConfigMode(operation);
    } catch (error) {
      if (this.isCancellation(error)) {
        return { results: this.fill(commands, 'cancelled', 'Cancelled by user'), cancelled: true };
      }
      const failure = this.classifyFailure(error, 'execute', unit);
      const results = [
        this.result(commands[0], `Could not enter configuration mode: ${failure.detail}`, 'failure', failure.kind),
        ...this.fill(commands.slice(1), 'skipped', 'Configuration mode unavailable'),
      ];
      return failure.kind === 'command' ? { results, cancelled: false } : { results, failure, cancelled: false };
    }

    const block: OperationOptions = { timeoutMs: operation.timeoutMs };
    const results: SessionResult[] = [];
    let sessionFailure: FailureClassification | undefined;

    for (let i = 0; i < commands.length; i++) {
      const command = commands[i];
      try {
        const output = await session.send(command, block);
        results.push(this.result(command, this.clean(unit, output), 'success'));
      } catch (error) {
        const failure = this.classifyFailure(error, 'execute', unit);
        results.push(this.result(command, failure.detail, 'failure', failure.kind));
        results.push(...this.fill(commands.slice(i + 1), 'skipped', `Previous command "${command}" failed`));
        if (failure.kind !== 'command') sessionFailure = failure;
        break;
      }
    }

    if (!sessionFailure) {
      try {
        await session.exitConfigMode(block);
      } catch (error) {
        log.warn(`${unit.device.address} did not leave configuration mode cleanly`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return sessionFailure ? { results, failure: sessionFailure, cancelled: false } : { results, cancelled: false };
  }

  private toOutcome(attempt: AttemptResult, attempts: number): DeviceOutcome {
    const { results } = attempt;
    let terminal: TerminalState = 'success';
    if (results.some((r) => r.status === 'cancelled')) terminal = 'cancelled';
    else if (results.some((r) => r.status === 'failure')) terminal = 'failure';

    const outcome: DeviceOutcome = { terminal, results, attempts };
    const failureKind = attempt.failure?.kind ?? results.find((r) => r.failureKind)?.failureKind;
    if (terminal === 'failure' && failureKind) outcome.failureKind = failureKind;
    if (attempt.failure) outcome.error = attempt.failure.detail;
    return outcome;
  }

  private classifyFailure(
    error: unknown,
    phase: 'connect' | 'escalate' | 'execute',
    unit: ExecutionUnit,
  ): FailureClassification {
    const classification = this.classifier.classify(error, phase);
    return { ...classification, detail: this.clean(unit, classification.detail) };
  }

  /** Treat any rejection after the run was cancelled as the cancellation itself. */
  private isCancellation(error: unknown): boolean {
    return error instanceof CancelledError || this.context.signal.aborted;
  }

  /** Redact credentials and cap to the configured size. */
  private clean(unit: ExecutionUnit, text: string): string {
    const { password, enableSecret } = unit.credentials;
    const redacted = redactSecrets(text, [password, enableSecret]);
    const max = this.context.settings.maxOutputChars;
    return redacted.length > max ? redacted.substring(0, max) : redacted;
  }

  private result(command: string, output: string, status: ResultStatus, failureKind?: FailureKind): SessionResult {
    const result: SessionResult = { command, output, status, timestamp: this.options.now().toISOString() };
    if (status === 'failure' && failureKind) result.failureKind = failureKind;
    return result;
  }

  private fill(
    commands: readonly string[],
    status: ResultStatus,
    detail: string,
    failureKind?: FailureKind,
  ): SessionResult[] {
    return commands.map((command) => this.result(command, detail, status, failureKind));
  }

  private transition(unit: ExecutionUnit, state: SessionState, attempt: number): void {
    log.debug(`${unit.device.address} → ${state} (attempt ${attempt})`);
    this.context.emitter.publish({
      type: 'session-state',
      index: unit.index,
      address: unit.device.address,
      state,
      attempt,
    });
  }
}
