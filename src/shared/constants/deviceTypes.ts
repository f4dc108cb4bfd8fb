import type { DeviceType } from '../types/device';

/** Supported device types, in the order a picker would list them. */
export const DEVICE_TYPES = [
  'cisco_asa',
  'cisco_ftd',
  'cisco_nxos',
  'cisco_ios',
  'f5_linux',
  'f5_tmsh',
  'linux',
  'paloalto_panos',
] as const satisfies readonly DeviceType[];

export function isDeviceType(value: string): value is DeviceType {
  return DEVICE_TYPES.some((type) => type === value);
}

/** Columns every device table must carry. */
export const REQUIRED_COLUMNS = ['ip', 'dns', 'command'] as const;

export const DEFAULT_SSH_PORT = 22;
