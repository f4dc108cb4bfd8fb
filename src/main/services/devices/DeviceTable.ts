/**
 * DeviceTable: turns parsed device rows into the ordered device list of a run.
 *
 *   - `ip`, `dns` and `command` columns are required on every row
 *   - a `command` cell may hold several newline-separated commands
 *   - rows repeating an `ip|dns` pair append their commands to the first
 *     occurrence, which keeps its list position
 *   - blank command lines are dropped; a device left with no command is invalid
 *
 * Everything is checked before dispatch, so a malformed table never produces a
 * partial report.
 */

import { isIPv4 } from 'net';
import type {
  CommandMode,
  Credentials,
  Device,
  DeviceRow,
  DeviceType,
  ExecutionUnit,
  PlannedDevice,
} from '@shared/types';
import { DEFAULT_SSH_PORT, REQUIRED_COLUMNS } from '@shared/constants';
import { ValidationError } from '../../errors';
import { DeviceRowSchema, validateInput } from '../../config/schemas';
import { CredentialResolver } from '../security/CredentialResolver';
import { resolveDeviceDriver } from './deviceDrivers';

export interface DeviceTableOptions {
  /** Used for rows without their own deviceType. */
  defaultDeviceType: DeviceType;
}

/** Split a command cell into individual commands. */
export function splitCommands(cell: string): string[] {
  return cell
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function deviceKey(ip: string, dns: string): string {
  return `${ip}|${dns}`;
}

/**
 * Validate raw rows (as read from a file or JSON) and fold them into planned
 * devices in first-seen order.
 */
export function buildDeviceList(rows: readonly unknown[], options: DeviceTableOptions): PlannedDevice[] {
  if (rows.length === 0) {
    throw new ValidationError('EmptyDeviceList', 'The device table has no rows');
  }

  const byKey = new Map<string, { device: Device; commands: string[] }>();

  rows.forEach((raw, i) => {
    const rowNumber = i + 1;
    const row = parseRow(raw, rowNumber);

    if (!isIPv4(row.ip)) {
      throw new ValidationError('InvalidAddress', `"${row.ip}" is not a valid IPv4 address`, rowNumber);
    }

    const key = deviceKey(row.ip, row.dns);
    const commands = splitCommands(row.command);
    const existing = byKey.get(key);

    if (existing) {
      existing.commands.push(...commands);
      return;
    }

    let deviceType: DeviceType;
    try {
      deviceType = resolveDeviceDriver(row.deviceType ?? options.defaultDeviceType).type;
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ValidationError(error.code, error.message, rowNumber);
      }
      throw error;
    }

    const device: Device = Object.freeze({
      address: row.ip,
      dns: row.dns,
      deviceType,
      port: row.port ?? DEFAULT_SSH_PORT,
      ...(row.credentialProfile ? { credentialProfile: row.credentialProfile } : {}),
    });

    byKey.set(key, { device, commands });
  });

  const planned: PlannedDevice[] = [];
  for (const { device, commands } of byKey.values()) {
    if (commands.length === 0) {
      throw new ValidationError(
        'EmptyCommandSet',
        `Device ${device.address}${device.dns ? ` (${device.dns})` : ''} has no commands`,
      );
    }
    planned.push({ device, commands: Object.freeze([...commands]) });
  }
  return planned;
}

export interface ExecutionUnitOptions {
  mode: CommandMode;
  defaultProfile: string;
}

/**
 * Attach command mode and resolved credentials to each planned device.
 * `credentials` must hold every profile the devices use.
 */
export function buildExecutionUnits(
  planned: readonly PlannedDevice[],
  credentials: ReadonlyMap<string, Readonly<Credentials>>,
  options: ExecutionUnitOptions,
): ExecutionUnit[] {
  return planned.map(({ device, commands }, index) => {
    const profile = CredentialResolver.profileFor(device, options.defaultProfile);
    const resolved = credentials.get(profile);
    if (!resolved) {
      throw new ValidationError('MissingCredentials', `No credentials found for profile "${profile}"`);
    }
    return Object.freeze({
      index,
      device,
      commandSet: Object.freeze({ commands, mode: options.mode }),
      credentials: resolved,
    });
  });
}

function parseRow(raw: unknown, rowNumber: number): DeviceRow {
  if (typeof raw !== 'object' || raw === null) {
    throw new ValidationError('MissingColumn', 'Row is not an object', rowNumber);
  }

  for (const column of REQUIRED_COLUMNS) {
    if (!(column in raw)) {
      throw new ValidationError('MissingColumn', `Missing required column "${column}"`, rowNumber);
    }
  }

  return validateInput(DeviceRowSchema, normalizeEmpty(raw), 'MissingColumn', rowNumber);
}

/** Spreadsheet readers hand over null for empty cells; treat it as ''. */
function normalizeEmpty(raw: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null) {
      out[key] = REQUIRED_COLUMNS.some((column) => column === key) ? '' : undefined;
    } else {
      out[key] = value;
    }
  }
  return out;
}
