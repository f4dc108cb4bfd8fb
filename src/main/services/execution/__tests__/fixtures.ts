import type { DeviceOutcome, ExecutionUnit, RunSettings, SessionResult } from '@shared/types';
import { DEFAULT_RUN_SETTINGS } from '@shared/types';
import { RunContext } from '../RunContext';
import { RunEmitter } from '../RunEmitter';

export const TIMESTAMP = '2024-03-01T12:00:00.000Z';

export function makeUnit(index: number, commands: string[] = ['show version']): ExecutionUnit {
  return {
    index,
    device: { address: `10.0.0.${index + 1}`, dns: `dev${index + 1}`, deviceType: 'cisco_ios', port: 22 },
    commandSet: { commands, mode: 'normal' },
    credentials: { username: 'netops', password: 'test-secret' },
  };
}

export function successOutcome(unit: ExecutionUnit): DeviceOutcome {
  return {
    terminal: 'success',
    attempts: 1,
    results: unit.commandSet.commands.map((command): SessionResult => ({
      command,
      output: `${command} ok`,
      status: 'success',
      timestamp: TIMESTAMP,
    })),
  };
}

export function makeContext(overrides: Partial<RunSettings> = {}): RunContext {
  return new RunContext('run-test', { ...DEFAULT_RUN_SETTINGS, ...overrides }, new RunEmitter());
}
