/**
 * SSHConnection Service
 * Wraps ssh2 Client with a promise-based connect, an interactive shell channel
 * and error classification for the execution engine.
 */

import { Client, type ClientChannel } from 'ssh2';
import { EventEmitter } from 'events';
import type { SSHConnectionConfig, PTYOptions } from '@shared/types';
import { CancelledError, TransportError, type TransportErrorKind } from '../../errors';
import { createLogger } from '../../utils/logger';

const log = createLogger('SSHConnection');

export interface SSHConnectOptions {
  signal?: AbortSignal;
  /** Called when the key exchange is done and authentication starts. */
  onHandshake?: () => void;
}

/** ssh2 tags client errors with the stage they happened in. */
function classifyClientError(err: Error & { level?: string }): TransportErrorKind {
  switch (err.level) {
    case 'client-authentication':
      return 'auth';
    case 'client-timeout':
      return 'timeout';
    default:
      return 'connect';
  }
}

export class SSHConnection extends EventEmitter {
  private client: Client;
  private stream: ClientChannel | null = null;
  private config: SSHConnectionConfig;
  private isConnected = false;

  constructor(config: SSHConnectionConfig) {
    super();
    this.client = new Client();
    this.config = config;
    this.setupClientEvents();
  }

  private get target(): string {
    return `${this.config.host}:${this.config.port}`;
  }

  private setupClientEvents(): void {
    this.client.on('ready', () => {
      this.isConnected = true;
      this.emit('ready');
    });

    this.client.on('error', (err: Error) => {
      log.debug(`Client error on ${this.target}: ${err.message}`);
    });

    this.client.on('close', () => {
      const wasConnected = this.isConnected;
      this.isConnected = false;
      this.stream = null;
      if (wasConnected) this.emit('close');
    });

    this.client.on('end', () => {
      this.isConnected = false;
    });

    // Devices that only offer keyboard-interactive get the password for every prompt.
    this.client.on('keyboard-interactive', (_name, _instructions, _lang, prompts, finish) => {
      finish(prompts.map(() => this.config.password));
    });
  }

  /**
   * Connect and authenticate. Rejects with TransportError('connect' | 'auth' |
   * 'timeout'), or CancelledError when `signal` aborts first.
   */
  async connect(options: SSHConnectOptions = {}): Promise<void> {
    const { signal, onHandshake } = options;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }

      let settled = false;
      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
        this.client.removeListener('ready', onReady);
        this.client.removeListener('error', onError);
        this.client.removeListener('handshake', onHandshakeDone);
        if (error) {
          this.client.end();
          reject(error);
        } else {
          resolve();
        }
      };

      const timeout = setTimeout(() => {
        settle(
          new TransportError(
            'timeout',
            `Connection to ${this.target} timed out after ${Math.round(this.config.readyTimeout / 1000)} seconds`,
          ),
        );
      }, this.config.readyTimeout);

      const onReady = () => settle();
      const onError = (err: Error & { level?: string }) => {
        const kind = classifyClientError(err);
        const message =
          kind === 'auth'
            ? `Authentication failed for ${this.config.username}@${this.target}`
            : `Connection to ${this.target} failed: ${err.message}`;
        settle(new TransportError(kind, message, { cause: err }));
      };
      const onHandshakeDone = () => onHandshake?.();
      const onAbort = () => settle(new CancelledError());

      this.client.once('ready', onReady);
      this.client.once('error', onError);
      this.client.once('handshake', onHandshakeDone);
      signal?.addEventListener('abort', onAbort, { once: true });

      try {
        this.client.connect({
          host: this.config.host,
          port: this.config.port,
          username: this.config.username,
          password: this.config.password,
          tryKeyboard: true,
          readyTimeout: this.config.readyTimeout,
          keepaliveInterval: this.config.keepaliveInterval ?? 10000,
        });
      } catch (err) {
        // ssh2 throws synchronously on malformed connect options
        settle(new TransportError('connect', `Connection to ${this.target} failed: ${String(err)}`, { cause: err }));
      }
    });
  }

  async openShell(options: PTYOptions): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.isConnected) {
        reject(new TransportError('connect', `Not connected to ${this.target}`));
        return;
      }

      this.client.shell(
        {
          cols: options.cols,
          rows: options.rows,
          term: options.term ?? 'vt100',
        },
        (err: Error | undefined, stream: ClientChannel) => {
          if (err) {
            reject(new TransportError('connect', `Could not open a shell on ${this.target}: ${err.message}`, { cause: err }));
            return;
          }

          this.stream = stream;

          stream.on('data', (data: Buffer) => {
            this.emit('data', data.toString());
          });

          stream.stderr.on('data', (data: Buffer) => {
            this.emit('data', data.toString());
          });

          stream.on('close', () => {
            this.stream = null;
            this.emit('close');
          });

          resolve();
        },
      );
    });
  }

  write(data: string): void {
    if (this.stream) {
      this.stream.write(data);
    }
  }

  disconnect(): void {
    if (this.stream) {
      this.stream.end();
      this.stream = null;
    }
    this.client.end();
    this.isConnected = false;
  }

  getIsConnected(): boolean {
    return this.isConnected;
  }
}
