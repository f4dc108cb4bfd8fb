/**
 * Device-related types
 */

import type { CommandMode } from './execution';

/** Device platforms the runner knows how to drive. */
export type DeviceType =
  | 'cisco_ios'
  | 'cisco_nxos'
  | 'cisco_asa'
  | 'cisco_ftd'
  | 'f5_tmsh'
  | 'f5_linux'
  | 'linux'
  | 'paloalto_panos';

/**
 * One row of the device table as handed over by a file-parsing collaborator.
 * `command` may hold several newline-separated commands.
 */
export interface DeviceRow {
  ip: string;
  dns: string;
  command: string;
  deviceType?: string;
  port?: number;
  /** Credential profile overriding the run-wide profile for this device. */
  credentialProfile?: string;
}

export interface Device {
  readonly address: string;
  /** DNS alias; empty string when the table leaves it blank. */
  readonly dns: string;
  readonly deviceType: DeviceType;
  readonly port: number;
  readonly credentialProfile?: string;
}

export interface Credentials {
  username: string;
  password: string;
  /** Elevation secret. Its presence enables the privilege-escalation step. */
  enableSecret?: string;
}

export interface CommandSet {
  readonly commands: readonly string[];
  readonly mode: CommandMode;
}

/** A device plus its commands, before credentials are attached. */
export interface PlannedDevice {
  readonly device: Device;
  readonly commands: readonly string[];
}

/**
 * A device paired with its command set and resolved credentials for one run.
 * `index` is the device's position in the input list and fixes its report slot.
 */
export interface ExecutionUnit {
  readonly index: number;
  readonly device: Device;
  readonly commandSet: CommandSet;
  readonly credentials: Readonly<Credentials>;
}
