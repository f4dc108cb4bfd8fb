import { describe, it, expect } from 'vitest';
import { DEVICE_TYPES } from '@shared/constants';
import { ValidationError } from '../../../errors';
import { DEVICE_DRIVERS, isErrorOutput, resolveDeviceDriver } from '../deviceDrivers';

describe('deviceDrivers', () => {
  it('should have a driver for every device type', () => {
    for (const type of DEVICE_TYPES) {
      expect(DEVICE_DRIVERS[type].type).toBe(type);
    }
  });

  it('should reject unknown tags', () => {
    expect(() => resolveDeviceDriver('juniper_junos')).toThrow(ValidationError);
    expect(resolveDeviceDriver('cisco_asa').privilege?.command).toBe('enable');
  });

  describe('prompt patterns', () => {
    const ios = DEVICE_DRIVERS.cisco_ios.promptPattern;

    it.each(['router1#', 'output\r\nrouter1>', 'x\nsw-01.lab(config-if)# '])('should match Cisco prompt %j', (text) => {
      expect(ios.test(text)).toBe(true);
    });

    it.each(['Building configuration...\n', 'show run | include #', 'line one\nline two'])(
      'should not match Cisco output %j',
      (text) => {
        expect(ios.test(text)).toBe(false);
      },
    );

    it('should match platform prompts', () => {
      expect(DEVICE_DRIVERS.paloalto_panos.promptPattern.test('admin@fw01> ')).toBe(true);
      expect(DEVICE_DRIVERS.f5_tmsh.promptPattern.test('admin@(bigip1)(cfg-sync Standalone)(Active)(/Common)(tmos)# ')).toBe(true);
      expect(DEVICE_DRIVERS.linux.promptPattern.test('total 0\nops@jump01:~$ ')).toBe(true);
      expect(DEVICE_DRIVERS.cisco_ftd.promptPattern.test('> ')).toBe(true);
      expect(DEVICE_DRIVERS.cisco_ios.configMode?.prompt.test('router1(config)#')).toBe(true);
      expect(DEVICE_DRIVERS.cisco_ios.configMode?.prompt.test('router1#')).toBe(false);
    });
  });

  describe('isErrorOutput', () => {
    const ios = DEVICE_DRIVERS.cisco_ios;

    it('should flag device error messages', () => {
      expect(isErrorOutput("              ^\n% Invalid input detected at '^' marker.", ios)).toBe(true);
      expect(isErrorOutput('% Bad mask /33 for address 10.0.0.1', ios)).toBe(true);
      expect(isErrorOutput('bash: foo: command not found', DEVICE_DRIVERS.linux)).toBe(true);
    });

    it('should flag platform error prefixes', () => {
      expect(isErrorOutput('ERROR: % Invalid input detected', DEVICE_DRIVERS.cisco_asa)).toBe(true);
      expect(isErrorOutput('Syntax Error: "bogus" unknown property', DEVICE_DRIVERS.f5_tmsh)).toBe(true);
      expect(isErrorOutput('Invalid syntax.', DEVICE_DRIVERS.paloalto_panos)).toBe(true);
      expect(isErrorOutput('cat: /etc/missing: No such file or directory', DEVICE_DRIVERS.linux)).toBe(true);
    });

    it('should pass normal output', () => {
      expect(isErrorOutput('', ios)).toBe(false);
      expect(isErrorOutput('Cisco IOS XE Software, Version 17.03.04\nuptime is 5 weeks\nrouter1 has 3 interfaces', ios)).toBe(false);
    });

    it('should pass output that mentions errors without being one', () => {
      expect(isErrorOutput('     0 input errors, 0 CRC, 0 frame, 0 overrun, 0 ignored', ios)).toBe(false);
      expect(isErrorOutput('banner motd ^C Page not found? call NOC ^C\nhostname router1', ios)).toBe(false);
      expect(isErrorOutput('%LINK-3-UPDOWN: Interface Gi0/1, changed state to up', ios)).toBe(false);
      expect(isErrorOutput('grep: error count 0', DEVICE_DRIVERS.linux)).toBe(false);
    });
  });
});
