/**
 * In-process Transport scripted per device address. Records every action and
 * tracks how many sessions are open at once.
 */

import { CancelledError } from '../../../errors';
import { delay } from '../../../utils/delay';
import type {
  ConnectOptions,
  ConnectTarget,
  OperationOptions,
  Transport,
  TransportSession,
} from '../../transport/Transport';

export interface ScriptedResponse {
  output?: string;
  error?: Error;
  delayMs?: number;
  /** Wait until the run is cancelled. */
  hold?: boolean;
}

export interface DeviceScript {
  /** Outcome per connect attempt; the last entry repeats. */
  connect?: Array<Error | 'ok'>;
  escalate?: Error;
  enterConfig?: Error;
  /** Per command; an array is consumed call by call, its last entry repeating. */
  responses?: Record<string, ScriptedResponse | ScriptedResponse[]>;
  delayMs?: number;
  hold?: boolean;
}

export interface MockTransportOptions {
  /** Delay for every send without its own. */
  delayMs?: number;
}

function pick<T>(list: readonly T[], n: number): T {
  return list[Math.min(n, list.length - 1)];
}

export class MockTransport implements Transport {
  readonly connectLog: string[] = [];
  readonly actions = new Map<string, string[]>();
  active = 0;
  peakActive = 0;
  /** Sends currently held until cancel. */
  holding = 0;

  private readonly connectCalls = new Map<string, number>();
  private readonly sendCalls = new Map<string, number>();

  constructor(
    private readonly scripts: Record<string, DeviceScript> = {},
    private readonly options: MockTransportOptions = {},
  ) {}

  async connect(target: ConnectTarget, options: ConnectOptions): Promise<TransportSession> {
    const { address } = target;
    this.active++;
    this.peakActive = Math.max(this.peakActive, this.active);
    this.connectLog.push(address);

    const script = this.scripts[address] ?? {};
    const attempt = this.connectCalls.get(address) ?? 0;
    this.connectCalls.set(address, attempt + 1);

    try {
      if (options.signal.aborted) throw new CancelledError();
      await delay(0, options.signal);
      options.onAuthenticating?.();
      const step = script.connect ? pick(script.connect, attempt) : 'ok';
      if (step !== 'ok') throw step;
    } catch (error) {
      this.active--;
      throw error;
    }

    this.record(address, 'connect');
    return new MockSession(this, address, script);
  }

  actionsFor(address: string): string[] {
    return this.actions.get(address) ?? [];
  }

  record(address: string, action: string): void {
    const list = this.actions.get(address) ?? [];
    list.push(action);
    this.actions.set(address, list);
  }

  nextResponse(address: string, command: string, script: DeviceScript): ScriptedResponse {
    const key = `${address}|${command}`;
    const call = this.sendCalls.get(key) ?? 0;
    this.sendCalls.set(key, call + 1);

    const scripted = script.responses?.[command];
    if (!scripted) return {};
    return Array.isArray(scripted) ? pick(scripted, call) : scripted;
  }

  get defaultDelayMs(): number {
    return this.options.delayMs ?? 0;
  }

  holdUntilCancelled(signal: AbortSignal | undefined): Promise<never> {
    return new Promise((_resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      this.holding++;
      signal?.addEventListener(
        'abort',
        () => {
          this.holding--;
          reject(new CancelledError());
        },
        { once: true },
      );
    });
  }

  sessionClosed(): void {
    this.active--;
  }
}

class MockSession implements TransportSession {
  private closed = false;

  constructor(
    private readonly transport: MockTransport,
    private readonly address: string,
    private readonly script: DeviceScript,
  ) {}

  async send(command: string, options: OperationOptions): Promise<string> {
    this.transport.record(this.address, `send:${command}`);
    const response = this.transport.nextResponse(this.address, command, this.script);

    if (response.hold ?? this.script.hold) {
      await this.transport.holdUntilCancelled(options.signal);
    }
    const delayMs = response.delayMs ?? this.script.delayMs ?? this.transport.defaultDelayMs;
    await delay(delayMs, options.signal);

    if (response.error) throw response.error;
    return response.output ?? `${command} output from ${this.address}`;
  }

  async enterPrivilegedMode(_secret: string, _options: OperationOptions): Promise<void> {
    this.transport.record(this.address, 'enable');
    if (this.script.escalate) throw this.script.escalate;
  }

  async enterConfigMode(_options: OperationOptions): Promise<void> {
    this.transport.record(this.address, 'config-enter');
    if (this.script.enterConfig) throw this.script.enterConfig;
  }

  async exitConfigMode(_options: OperationOptions): Promise<void> {
    this.transport.record(this.address, 'config-exit');
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.transport.record(this.address, 'close');
    this.transport.sessionClosed();
  }
}
