import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../../errors';
import { buildDeviceList, buildExecutionUnits, splitCommands } from '../DeviceTable';

function captureError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('Expected a ValidationError');
}

describe('splitCommands', () => {
  it('should split on newlines and drop blank lines', () => {
    expect(splitCommands('show version\r\n\n  show clock  \n')).toEqual(['show version', 'show clock']);
  });
});

describe('buildDeviceList', () => {
  it('should fold repeated ip|dns rows onto the first occurrence', () => {
    const planned = buildDeviceList(
      [
        { ip: '10.0.0.1', dns: 'core1', command: 'show version' },
        { ip: '10.0.0.2', dns: 'core2', command: 'show clock\n\nshow users' },
        { ip: '10.0.0.1', dns: 'core1', command: 'show ip interface brief' },
      ],
      { defaultDeviceType: 'cisco_ios' },
    );

    expect(planned.map((p) => [p.device.address, p.commands])).toEqual([
      ['10.0.0.1', ['show version', 'show ip interface brief']],
      ['10.0.0.2', ['show clock', 'show users']],
    ]);
  });

  it('should keep rows with the same ip but another dns apart', () => {
    const planned = buildDeviceList(
      [
        { ip: '10.0.0.1', dns: 'a', command: 'x' },
        { ip: '10.0.0.1', dns: 'b', command: 'y' },
      ],
      { defaultDeviceType: 'linux' },
    );
    expect(planned).toHaveLength(2);
  });

  it('should apply defaults and per-row overrides', () => {
    const [first, second] = buildDeviceList(
      [
        { ip: '10.0.0.1', dns: null, command: 'uptime' },
        { ip: ' 10.0.0.2 ', dns: 'fw1', command: 'show system info', deviceType: 'paloalto_panos', port: 2222, credentialProfile: 'firewalls' },
      ],
      { defaultDeviceType: 'linux' },
    );

    expect(first.device).toEqual({ address: '10.0.0.1', dns: '', deviceType: 'linux', port: 22 });
    expect(second.device).toEqual({
      address: '10.0.0.2',
      dns: 'fw1',
      deviceType: 'paloalto_panos',
      port: 2222,
      credentialProfile: 'firewalls',
    });
    expect(Object.isFrozen(first.device)).toBe(true);
  });

  it('should reject a missing column with the row number', () => {
    const error = captureError(() =>
      buildDeviceList([{ ip: '10.0.0.1', command: 'show version' }], { defaultDeviceType: 'cisco_ios' }),
    );
    expect(error.code).toBe('MissingColumn');
    expect(error.row).toBe(1);
    expect(error.message).toBe('Row 1: Missing required column "dns"');
  });

  it('should reject an invalid IPv4 address', () => {
    const error = captureError(() =>
      buildDeviceList([{ ip: '10.0.0.300', dns: '', command: 'show version' }], { defaultDeviceType: 'cisco_ios' }),
    );
    expect(error.code).toBe('InvalidAddress');
    expect(error.message).toBe('Row 1: "10.0.0.300" is not a valid IPv4 address');
  });

  it('should reject an unsupported device type', () => {
    const error = captureError(() =>
      buildDeviceList(
        [
          { ip: '10.0.0.1', dns: '', command: 'show version' },
          { ip: '10.0.0.2', dns: '', command: 'show version', deviceType: 'juniper_junos' },
        ],
        { defaultDeviceType: 'cisco_ios' },
      ),
    );
    expect(error.code).toBe('UnsupportedDeviceType');
    expect(error.message).toBe('Row 2: Unsupported device type "juniper_junos"');
  });

  it('should reject a device without commands', () => {
    const error = captureError(() =>
      buildDeviceList([{ ip: '10.0.0.1', dns: 'core1', command: '  \n ' }], { defaultDeviceType: 'cisco_ios' }),
    );
    expect(error.code).toBe('EmptyCommandSet');
    expect(error.message).toBe('Device 10.0.0.1 (core1) has no commands');
  });

  it('should reject an empty table', () => {
    expect(captureError(() => buildDeviceList([], { defaultDeviceType: 'cisco_ios' })).code).toBe('EmptyDeviceList');
  });
});

describe('buildExecutionUnits', () => {
  const planned = buildDeviceList(
    [
      { ip: '10.0.0.1', dns: 'a', command: 'show version' },
      { ip: '10.0.0.2', dns: 'b', command: 'show version', credentialProfile: 'branch' },
    ],
    { defaultDeviceType: 'cisco_ios' },
  );

  it('should attach mode, index and the credentials of each profile', () => {
    const credentials = new Map([
      ['lab', { username: 'netops', password: 'test-secret' }],
      ['branch', { username: 'branch-ops', password: 'test-secret-2' }],
    ]);

    const units = buildExecutionUnits(planned, credentials, { mode: 'config', defaultProfile: 'lab' });

    expect(units.map((u) => [u.index, u.credentials.username, u.commandSet.mode])).toEqual([
      [0, 'netops', 'config'],
      [1, 'branch-ops', 'config'],
    ]);
  });

  it('should reject a profile that was not resolved', () => {
    const credentials = new Map([['lab', { username: 'netops', password: 'test-secret' }]]);
    expect(() => buildExecutionUnits(planned, credentials, { mode: 'normal', defaultProfile: 'lab' })).toThrow(
      'No credentials found for profile "branch"',
    );
  });
});
