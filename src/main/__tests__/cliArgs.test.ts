import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors';
import { parseCliArgs } from '../cliArgs';

describe('parseCliArgs', () => {
  it('should parse a job file and options', () => {
    expect(
      parseCliArgs(['job.json', '--format', 'csv', '--format', 'xlsx', '--out', 'reports', '--pause-between', '5']),
    ).toEqual({
      jobFile: 'job.json',
      formats: ['csv', 'xlsx'],
      outDir: 'reports',
      pauseBetweenSeconds: 5,
    });
  });

  it('should accept options before the job file', () => {
    expect(parseCliArgs(['--settings', 'network_settings.json', 'job.json'])).toEqual({
      jobFile: 'job.json',
      settingsFile: 'network_settings.json',
    });
  });

  it.each<{ argv: string[]; message: RegExp }>([
    { argv: [], message: /^Missing job file\./ },
    { argv: ['job.json', '--format', 'pdf'], message: /^Unknown report format "pdf"$/ },
    { argv: ['job.json', '--out'], message: /^--out needs a value$/ },
    { argv: ['job.json', '--out', '--format'], message: /^--out needs a value$/ },
    { argv: ['job.json', '--pause-between', '-1'], message: /^--pause-between must be a non-negative number$/ },
    { argv: ['job.json', '--verbose'], message: /^Unknown option --verbose$/ },
    { argv: ['a.json', 'b.json'], message: /^Unexpected argument b\.json$/ },
  ])('should reject $argv', ({ argv, message }) => {
    expect(() => parseCliArgs(argv)).toThrow(ValidationError);
    expect(() => parseCliArgs(argv)).toThrow(message);
  });
});
