/**
 * Device drivers: one closed entry per supported device type.
 *
 * A driver is resolved once per device before the run starts and tells the
 * transport how that platform behaves: what its prompt looks like, how to turn
 * paging off, how to reach privileged and configuration mode, and which output
 * lines mean the device rejected a command.
 *
 * Prompt patterns are tested against ANSI-stripped output and must match at the
 * very end of the buffer, starting at a line boundary.
 */

import type { DeviceType } from '@shared/types';
import { isDeviceType } from '@shared/constants';
import { ValidationError } from '../../errors';

export interface PrivilegeCapability {
  command: string;
  /** Matches the secret prompt printed after `command`. */
  secretPrompt: RegExp;
  /** Matches the prompt once elevation succeeded. */
  privilegedPrompt: RegExp;
}

export interface ConfigModeCapability {
  enter: string;
  exit: string;
  prompt: RegExp;
}

export interface DeviceDriver {
  readonly type: DeviceType;
  readonly label: string;
  readonly promptPattern: RegExp;
  /** Sent once after login, output ignored (paging off, width). */
  readonly sessionSetup: readonly string[];
  /** Absent when the platform has no separate privileged mode. */
  readonly privilege?: PrivilegeCapability;
  /** Absent when the platform has no configuration mode. */
  readonly configMode?: ConfigModeCapability;
  /** Tested against each output line with its leading whitespace removed. */
  readonly errorPatterns: readonly RegExp[];
}

// ── Shared pieces ─────────────────────────────────────────────────────────

/** "% Invalid input detected at '^' marker.", "% Incomplete command.", "% Bad mask" */
const CISCO_ERROR_PATTERNS = [/^% /, /^\^\s*$/];

const LINUX_ERROR_PATTERNS = [
  /^-?[\w.]*sh: .*command not found$/,
  /^[\w.\-/]+: .*: No such file or directory$/,
  /^[\w.\-/]+: .*: Permission denied$/,
];

/** hostname#  hostname>  hostname(config-if)# */
const CISCO_PROMPT = /(?:^|[\r\n])[\w\-.:/]+(?:\([\w\-.:/]+\))?[#>]\s*$/;
const CISCO_CONFIG_PROMPT = /(?:^|[\r\n])[\w\-.:/]+\(config[\w\-.:/]*\)#\s*$/;

/** user@host:path$  or  [user@host path]#  */
const LINUX_PROMPT = /(?:^|[\r\n])(?:\([^)]+\)\s*)?(?:\S+@\S+:[^\r\n]*|\[[^\]\r\n]+\])[$#]\s*$/;

const CISCO_ENABLE: PrivilegeCapability = {
  command: 'enable',
  secretPrompt: /[Pp]assword:\s*$/,
  privilegedPrompt: /#\s*$/,
};

const CISCO_CONFIG: ConfigModeCapability = {
  enter: 'configure terminal',
  exit: 'end',
  prompt: CISCO_CONFIG_PROMPT,
};

// ── Registry ──────────────────────────────────────────────────────────────

export const DEVICE_DRIVERS: Readonly<Record<DeviceType, DeviceDriver>> = {
  cisco_ios: {
    type: 'cisco_ios',
    label: 'Cisco IOS / IOS-XE',
    promptPattern: CISCO_PROMPT,
    sessionSetup: ['terminal length 0', 'terminal width 511'],
    privilege: CISCO_ENABLE,
    configMode: CISCO_CONFIG,
    errorPatterns: CISCO_ERROR_PATTERNS,
  },
  cisco_nxos: {
    type: 'cisco_nxos',
    label: 'Cisco NX-OS',
    promptPattern: CISCO_PROMPT,
    sessionSetup: ['terminal length 0', 'terminal width 511'],
    configMode: CISCO_CONFIG,
    errorPatterns: CISCO_ERROR_PATTERNS,
  },
  cisco_asa: {
    type: 'cisco_asa',
    label: 'Cisco ASA',
    promptPattern: CISCO_PROMPT,
    sessionSetup: ['terminal pager 0'],
    privilege: CISCO_ENABLE,
    configMode: CISCO_CONFIG,
    errorPatterns: [...CISCO_ERROR_PATTERNS, /^ERROR: /],
  },
  cisco_ftd: {
    type: 'cisco_ftd',
    label: 'Cisco Firepower Threat Defense',
    promptPattern: /(?:^|[\r\n])>\s*$/,
    sessionSetup: [],
    errorPatterns: [...CISCO_ERROR_PATTERNS, /^Syntax error:/i, /^ERROR: /],
  },
  f5_tmsh: {
    type: 'f5_tmsh',
    label: 'F5 BIG-IP tmsh',
    // admin@(bigip1)(cfg-sync Standalone)(Active)(/Common)(tmos)#
    promptPattern: /(?:^|[\r\n])\S+@\(.+\)\(tmos[^)]*\)#\s*$/,
    sessionSetup: ['modify cli preference pager disabled display-threshold 0'],
    errorPatterns: [/^Syntax Error:/i, /^Data Input Error:/i],
  },
  f5_linux: {
    type: 'f5_linux',
    label: 'F5 BIG-IP bash',
    promptPattern: LINUX_PROMPT,
    sessionSetup: [],
    errorPatterns: LINUX_ERROR_PATTERNS,
  },
  linux: {
    type: 'linux',
    label: 'Linux',
    promptPattern: LINUX_PROMPT,
    sessionSetup: [],
    privilege: {
      command: 'sudo -s',
      secretPrompt: /(?:\[sudo\] password for \S+|[Pp]assword):\s*$/,
      privilegedPrompt: /#\s*$/,
    },
    errorPatterns: LINUX_ERROR_PATTERNS,
  },
  paloalto_panos: {
    type: 'paloalto_panos',
    label: 'Palo Alto PAN-OS',
    // admin@fw01>  or  admin@fw01#  (configure)
    promptPattern: /(?:^|[\r\n])\S+@[\w\-.()]+[>#]\s*$/,
    sessionSetup: ['set cli pager off', 'set cli scripting-mode on'],
    configMode: {
      enter: 'configure',
      exit: 'exit',
      prompt: /(?:^|[\r\n])\S+@[\w\-.()]+#\s*$/,
    },
    errorPatterns: [/^Invalid syntax\.?$/i, /^Unknown command:/i, /^Server error\s*:/i],
  },
};

/**
 * Resolve a device-type tag to its driver.
 * An unknown tag is a validation error, never a silent default.
 */
export function resolveDeviceDriver(tag: string): DeviceDriver {
  if (!isDeviceType(tag)) {
    throw new ValidationError('UnsupportedDeviceType', `Unsupported device type "${tag}"`);
  }
  return DEVICE_DRIVERS[tag];
}

/**
 * Whether `output` shows the device rejected a command: some line starts with
 * one of the driver's error markers.
 */
export function isErrorOutput(output: string, driver: DeviceDriver): boolean {
  return output
    .split(/\r?\n/)
    .some((line) => {
      const text = line.trimStart();
      return driver.errorPatterns.some((pattern) => pattern.test(text));
    });
}
