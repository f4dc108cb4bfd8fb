/**
 * SSHTransport: the default Transport, driving an interactive ssh2 shell.
 *
 * Every exchange writes a line and reads until the driver's prompt comes back.
 * Reads are bounded by a timeout, abort on the run's signal and fail as soon as
 * the channel closes, so a dead device can never hold a worker forever.
 */

import type { PTYOptions, SSHConnectionConfig } from '@shared/types';
import { CancelledError, TransportError } from '../../errors';
import { createLogger } from '../../utils/logger';
import { redactSecrets } from '../../utils/sanitize';
import { isErrorOutput, resolveDeviceDriver, type DeviceDriver } from '../devices/deviceDrivers';
import type {
  ConnectOptions,
  ConnectTarget,
  OperationOptions,
  Transport,
  TransportSession,
} from '../transport/Transport';
import { PromptReader } from './PromptReader';
import { SSHConnection } from './SSHConnection';

const log = createLogger('SSHTransport');

/** Wide terminal so devices do not wrap long lines. */
const DEFAULT_PTY: PTYOptions = { cols: 511, rows: 24, term: 'vt100' };

export interface SSHTransportOptions {
  /** Characters kept per command output. */
  maxOutputChars?: number;
  pty?: PTYOptions;
  keepaliveInterval?: number;
  /** Replaces the ssh2-backed connection, e.g. for tests. */
  connectionFactory?: (config: SSHConnectionConfig) => SSHConnection;
}

interface ReadResult {
  output: string;
  prompt: string;
}

/** Combine two prompt patterns into one that matches either. */
function eitherPrompt(a: RegExp, b: RegExp): RegExp {
  return new RegExp(`(?:${a.source})|(?:${b.source})`);
}

function lastLine(text: string): string {
  const lines = text.split('\n').filter((line) => line.trim());
  return lines.length > 0 ? lines[lines.length - 1].trim() : '';
}

export class SSHShellSession implements TransportSession {
  private closed = false;
  private channelClosed = false;
  private prompt = '';

  constructor(
    private readonly connection: SSHConnection,
    private readonly driver: DeviceDriver,
    private readonly target: ConnectTarget,
    private readonly maxOutputChars: number,
  ) {
    this.connection.on('close', () => {
      this.channelClosed = true;
    });
  }

  /** Wait for the login banner to end in a prompt. */
  async initialize(options: OperationOptions): Promise<void> {
    const { prompt } = await this.readUntil(this.driver.promptPattern, false, options, 'the login prompt');
    this.prompt = prompt;
  }

  /** Session setup commands: output ignored, but the prompt must come back. */
  async runSetup(options: OperationOptions): Promise<void> {
    for (const command of this.driver.sessionSetup) {
      await this.exchange(command, this.driver.promptPattern, options);
    }
  }

  async send(command: string, options: OperationOptions): Promise<string> {
    const { output } = await this.exchange(command, this.driver.promptPattern, options);
    if (isErrorOutput(output, this.driver)) {
      throw new TransportError('command', output || `Command rejected: ${command}`);
    }
    return output;
  }

  async enterPrivilegedMode(secret: string, options: OperationOptions): Promise<void> {
    const privilege = this.driver.privilege;
    if (!privilege) return;
    if (privilege.privilegedPrompt.test(this.prompt)) {
      log.debug(`${this.target.address} already privileged`);
      return;
    }

    const secretOrPrompt = eitherPrompt(privilege.secretPrompt, this.driver.promptPattern);
    const first = await this.exchange(privilege.command, secretOrPrompt, options);

    let result = first;
    if (privilege.secretPrompt.test(first.prompt)) {
      // The secret is not echoed, so there is no echo line to skip.
      const settled = this.readUntil(secretOrPrompt, false, options, 'the privileged prompt');
      this.connection.write(`${secret}\n`);
      result = await settled;
    }

    if (privilege.secretPrompt.test(result.prompt) || !privilege.privilegedPrompt.test(result.prompt)) {
      const detail = redactSecrets(lastLine(result.output), [secret]);
      throw new TransportError(
        'auth',
        `Privilege escalation with "${privilege.command}" was rejected${detail ? `: ${detail}` : ''}`,
      );
    }
    this.prompt = result.prompt;
  }

  async enterConfigMode(options: OperationOptions): Promise<void> {
    const configMode = this.driver.configMode;
    if (!configMode) {
      throw new TransportError('command', `${this.driver.label} has no configuration mode`);
    }

    const { output, prompt } = await this.exchange(configMode.enter, this.driver.promptPattern, options);
    if (isErrorOutput(output, this.driver) || !configMode.prompt.test(prompt)) {
      throw new TransportError('command', output || `Could not enter configuration mode with "${configMode.enter}"`);
    }
    this.prompt = prompt;
  }

  async exitConfigMode(options: OperationOptions): Promise<void> {
    const configMode = this.driver.configMode;
    if (!configMode) return;
    const { prompt } = await this.exchange(configMode.exit, this.driver.promptPattern, options);
    this.prompt = prompt;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.connection.disconnect();
  }

  private exchange(command: string, pattern: RegExp, options: OperationOptions): Promise<ReadResult> {
    const pending = this.readUntil(pattern, true, options, `the prompt after "${command}"`);
    this.connection.write(`${command}\n`);
    return pending;
  }

  private readUntil(
    pattern: RegExp,
    expectEcho: boolean,
    options: OperationOptions,
    waitingFor: string,
  ): Promise<ReadResult> {
    const { timeoutMs, signal } = options;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      if (this.closed || this.channelClosed) {
        reject(new TransportError('connect', `Connection to ${this.target.address} is closed`));
        return;
      }

      const reader = new PromptReader({
        promptPattern: pattern,
        expectEcho,
        maxOutputChars: this.maxOutputChars,
      });

      const cleanup = () => {
        clearTimeout(timer);
        this.connection.removeListener('data', onData);
        this.connection.removeListener('close', onClose);
        signal?.removeEventListener('abort', onAbort);
      };

      const onData = (chunk: string) => {
        const { complete, prompt } = reader.feed(chunk);
        if (!complete) return;
        cleanup();
        resolve({ output: reader.getOutput(), prompt: prompt ?? '' });
      };

      const onClose = () => {
        cleanup();
        reject(new TransportError('connect', `Connection to ${this.target.address} closed while waiting for ${waitingFor}`));
      };

      const onAbort = () => {
        cleanup();
        reject(new CancelledError());
      };

      const timer = setTimeout(() => {
        cleanup();
        const partial = lastLine(reader.getAccumulatedOutput());
        reject(
          new TransportError(
            'timeout',
            `Timed out after ${Math.round(timeoutMs / 1000)}s waiting for ${waitingFor}` +
              (partial ? ` (last output: ${partial})` : ''),
          ),
        );
      }, timeoutMs);

      this.connection.on('data', onData);
      this.connection.on('close', onClose);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

export class SSHTransport implements Transport {
  private readonly maxOutputChars: number;
  private readonly pty: PTYOptions;

  constructor(private readonly options: SSHTransportOptions = {}) {
    this.maxOutputChars = options.maxOutputChars ?? 1024 * 1024;
    this.pty = options.pty ?? DEFAULT_PTY;
  }

  async connect(target: ConnectTarget, options: ConnectOptions): Promise<TransportSession> {
    const driver = resolveDeviceDriver(target.deviceType);
    const config: SSHConnectionConfig = {
      host: target.address,
      port: target.port,
      username: target.credentials.username,
      password: target.credentials.password,
      readyTimeout: options.timeoutMs,
      keepaliveInterval: this.options.keepaliveInterval,
    };

    const connection = this.options.connectionFactory
      ? this.options.connectionFactory(config)
      : new SSHConnection(config);

    await connection.connect({ signal: options.signal, onHandshake: options.onAuthenticating });

    const session = new SSHShellSession(connection, driver, target, this.maxOutputChars);
    const operation: OperationOptions = { timeoutMs: options.timeoutMs, signal: options.signal };
    try {
      await connection.openShell(this.pty);
      await session.initialize(operation);
      await session.runSetup(operation);
    } catch (error) {
      session.close();
      throw error;
    }

    log.debug(`Shell ready on ${target.address}:${target.port} (${driver.label})`);
    return session;
  }
}
