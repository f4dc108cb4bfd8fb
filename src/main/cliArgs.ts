/**
 * Argument parsing for the command-line entry.
 *
 * Usage:
 *   npm start -- <job.json> [options]
 *
 * Options:
 *   --settings <file>       JSON settings merged under the job's own settings
 *   --out <dir>             Output directory (default: logs/output)
 *   --format <csv|txt|json|xlsx> Report format; repeat for several
 *   --pause-between <sec>   Pause this long after each batch
 */

import { OutputFormatSchema, type OutputFormat } from './config/schemas';
import { ValidationError } from './errors';

export interface CliOptions {
  jobFile: string;
  settingsFile?: string;
  outDir?: string;
  formats?: OutputFormat[];
  pauseBetweenSeconds?: number;
}

export const USAGE = 'Usage: npm start -- <job.json> [--settings <file>] [--out <dir>] [--format csv|txt|json|xlsx] [--pause-between <seconds>]';

function isOutputFormat(value: string): value is OutputFormat {
  return OutputFormatSchema.safeParse(value).success;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  let jobFile: string | undefined;
  const options: Omit<CliOptions, 'jobFile'> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = (): string => {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ValidationError('InvalidSettings', `${arg} needs a value`);
      }
      i++;
      return next;
    };

    switch (arg) {
      case '--settings':
        options.settingsFile = value();
        break;
      case '--out':
        options.outDir = value();
        break;
      case '--format': {
        const format = value();
        if (!isOutputFormat(format)) {
          throw new ValidationError('InvalidSettings', `Unknown report format "${format}"`);
        }
        options.formats = [...(options.formats ?? []), format];
        break;
      }
      case '--pause-between': {
        const seconds = Number(value());
        if (!Number.isFinite(seconds) || seconds < 0) {
          throw new ValidationError('InvalidSettings', '--pause-between must be a non-negative number');
        }
        options.pauseBetweenSeconds = seconds;
        break;
      }
      default:
        if (arg.startsWith('--')) {
          throw new ValidationError('InvalidSettings', `Unknown option ${arg}`);
        }
        if (jobFile !== undefined) {
          throw new ValidationError('InvalidSettings', `Unexpected argument ${arg}`);
        }
        jobFile = arg;
    }
  }

  if (jobFile === undefined) {
    throw new ValidationError('InvalidSettings', `Missing job file. ${USAGE}`);
  }
  return { jobFile, ...options };
}
