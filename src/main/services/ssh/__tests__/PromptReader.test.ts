import { describe, it, expect } from 'vitest';
import { DEVICE_DRIVERS } from '../../devices/deviceDrivers';
import { PromptReader } from '../PromptReader';

const IOS_PROMPT = DEVICE_DRIVERS.cisco_ios.promptPattern;

function reader(maxOutputChars = 1024 * 1024, expectEcho = true): PromptReader {
  return new PromptReader({ promptPattern: IOS_PROMPT, expectEcho, maxOutputChars });
}

describe('PromptReader', () => {
  it('should return the output between the echo and the prompt', () => {
    const r = reader();
    const result = r.feed('show clock\r\n*12:00:01.123 UTC Fri Mar 1 2024\r\nrouter1#');

    expect(result).toEqual({ complete: true, prompt: 'router1#' });
    expect(r.getOutput()).toBe('*12:00:01.123 UTC Fri Mar 1 2024');
  });

  it('should assemble output split across chunks', () => {
    const r = reader();
    expect(r.feed('show ver').complete).toBe(false);
    expect(r.feed('sion\r\nCisco IOS Software\r\nrou').complete).toBe(false);
    expect(r.feed('ter1#').complete).toBe(true);
    expect(r.getOutput()).toBe('Cisco IOS Software');
  });

  it('should return empty output for silent commands', () => {
    const r = reader();
    r.feed('terminal length 0\r\nrouter1>');
    expect(r.getOutput()).toBe('');
    expect(r.getPrompt()).toBe('router1>');
  });

  it('should match prompts wrapped in color codes', () => {
    const r = new PromptReader({
      promptPattern: DEVICE_DRIVERS.linux.promptPattern,
      expectEcho: true,
      maxOutputChars: 1024,
    });
    r.feed('ls\r\n\x1b[0m\x1b[01;34mbackups\x1b[0m\r\n\x1b[01;32mops@jump01\x1b[00m:~$ ');

    expect(r.isComplete()).toBe(true);
    expect(r.getOutput()).toBe('backups');
  });

  it('should read a banner without an echo line', () => {
    const r = reader(1024, false);
    r.feed('Authorized access only\r\n\r\nrouter1>');
    expect(r.getOutput()).toBe('Authorized access only');
  });

  it('should cap long output and keep watching the tail for the prompt', () => {
    const r = reader(10);
    r.feed('show tech\r\n');
    r.feed('x'.repeat(2000));
    expect(r.getAccumulatedOutput()).toHaveLength(522);

    r.feed('\r\nrouter1#');
    expect(r.isComplete()).toBe(true);
    expect(r.getOutput()).toBe('xxxxxxxxxx');
  });

  it('should ignore data after completion', () => {
    const r = reader();
    r.feed('show clock\r\n12:00\r\nrouter1#');
    expect(r.feed('more\r\nrouter1#')).toEqual({ complete: true, prompt: 'router1#' });
    expect(r.getOutput()).toBe('12:00');
  });
});
