/**
 * Command-line entry: run a JSON job file against its devices over SSH.
 *
 * Credentials come from the environment (see EnvCredentialProvider). Ctrl+C
 * cancels the run and still writes the report; a second Ctrl+C exits at once.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { parseCliArgs, USAGE } from './cliArgs';
import { JobFileSchema, validateInput } from './config/schemas';
import { loadRunSettings, resolveRunSettings } from './config/settings';
import { ValidationError, errorMessage } from './errors';
import { CommandRunner } from './services/execution/CommandRunner';
import { writeReport } from './services/export/ReportExporter';
import { EnvCredentialProvider } from './services/security/CredentialResolver';
import { SSHTransport } from './services/ssh/SSHTransport';
import { createLogger } from './utils/logger';

const log = createLogger('CLI');

const DEFAULT_OUTPUT_DIR = path.join('logs', 'output');

async function main(argv: readonly string[]): Promise<number> {
  const options = parseCliArgs(argv);

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(options.jobFile, 'utf8'));
  } catch (error) {
    throw new ValidationError('InvalidSettings', `Could not read job file ${options.jobFile}: ${errorMessage(error)}`);
  }
  const job = validateInput(JobFileSchema, raw);

  const fileSettings = options.settingsFile ? await loadRunSettings(options.settingsFile) : resolveRunSettings();
  const settings = resolveRunSettings({ ...fileSettings, ...job.settings });

  const runner = new CommandRunner({
    transport: new SSHTransport({ maxOutputChars: settings.maxOutputChars }),
    credentials: new EnvCredentialProvider(),
  });
  const handle = await runner.prepare({
    rows: job.rows,
    deviceType: job.deviceType,
    credentialProfile: job.credentialProfile,
    settings,
  });

  handle.events.on('device-completed', ({ address, terminal, progress }) => {
    console.log(`[${progress.percent.toFixed(1)}%] ${address}: ${terminal}`);
  });
  handle.events.on('attempt-failed', ({ address, attempt, maxAttempts, error, willRetry }) => {
    console.warn(`${address}: attempt ${attempt}/${maxAttempts} failed: ${error}${willRetry ? ' (retrying)' : ''}`);
  });

  const pauseSeconds = options.pauseBetweenSeconds ?? 0;
  if (pauseSeconds > 0) {
    handle.events.on('batch-completed', ({ progress }) => {
      if (progress.batchesCompleted >= progress.totalBatches) return;
      console.log(`Pausing ${pauseSeconds}s before the next batch`);
      handle.pause();
      setTimeout(() => handle.resume(), pauseSeconds * 1000);
    });
  }

  let interrupts = 0;
  process.on('SIGINT', () => {
    interrupts++;
    if (interrupts > 1) process.exit(130);
    console.warn('Cancelling: in-flight devices finish their current command. Press Ctrl+C again to exit now.');
    handle.cancel('Interrupted by user');
  });

  const report = await handle.execute();

  const written = await writeReport(report, {
    dir: options.outDir ?? job.output?.dir ?? DEFAULT_OUTPUT_DIR,
    baseName: job.output?.baseName ?? path.basename(options.jobFile, path.extname(options.jobFile)),
    formats: options.formats ?? job.output?.formats ?? ['csv'],
  });

  const { succeeded, failed, skipped, cancelled } = report.counters;
  console.log(`Done: ${succeeded} succeeded, ${failed} failed, ${skipped} skipped, ${cancelled} cancelled`);
  for (const file of written) console.log(`Report: ${file}`);

  if (report.cancelled) return 130;
  return failed > 0 ? 1 : 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    if (error instanceof ValidationError) {
      console.error(error.message);
      console.error(USAGE);
      process.exit(2);
    }
    log.error('Run failed', { error: errorMessage(error) });
    process.exit(1);
  });
