/**
 * Transport capability: the seam between the execution engine and whatever
 * actually talks to a device.
 *
 * Implementations raise TransportError with the matching kind for every
 * device-level problem and CancelledError when `signal` aborts; the session
 * runner turns both into results. Anything else they throw is treated as a
 * failure of the phase it happened in.
 */

import type { Credentials, DeviceType } from '@shared/types';

export interface ConnectTarget {
  address: string;
  dns: string;
  port: number;
  deviceType: DeviceType;
  credentials: Readonly<Credentials>;
}

export interface ConnectOptions {
  /** Covers TCP connect, handshake and authentication together. */
  timeoutMs: number;
  signal: AbortSignal;
  /** Called once the handshake is done and authentication begins. */
  onAuthenticating?: () => void;
}

export interface OperationOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface TransportSession {
  /**
   * Send one command and return its output with the echo and trailing prompt
   * removed. Rejects with TransportError('command') when the device reports an
   * error, carrying the device output as the message.
   */
  send(command: string, options: OperationOptions): Promise<string>;

  /** Rejects with TransportError('auth') when elevation is refused. */
  enterPrivilegedMode(secret: string, options: OperationOptions): Promise<void>;

  /** Rejects with TransportError('command') when the platform has no config mode. */
  enterConfigMode(options: OperationOptions): Promise<void>;
  exitConfigMode(options: OperationOptions): Promise<void>;

  /** Idempotent. */
  close(): void;
}

export interface Transport {
  connect(target: ConnectTarget, options: ConnectOptions): Promise<TransportSession>;
}
