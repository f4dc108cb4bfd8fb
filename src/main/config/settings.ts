import { readFile } from 'fs/promises';
import type { RunSettings } from '@shared/types';
import { DEFAULT_RUN_SETTINGS } from '@shared/types';
import { ValidationError } from '../errors';
import { RunSettingsSchema, RunSettingsUpdateSchema, validateInput } from './schemas';

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ValidationError('InvalidSettings') on any out-of-range value.
 */
export function resolveRunSettings(overrides: Partial<RunSettings> = {}): RunSettings {
  const updates = validateInput(RunSettingsUpdateSchema, overrides);
  return validateInput(RunSettingsSchema, { ...DEFAULT_RUN_SETTINGS, ...updates });
}

/**
 * Read a JSON settings file (e.g. network_settings.json) and merge it onto the
 * defaults. A missing file yields the defaults.
 */
export async function loadRunSettings(filePath: string): Promise<RunSettings> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return resolveRunSettings();
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      'InvalidSettings',
      `Settings file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return resolveRunSettings(validateInput(RunSettingsUpdateSchema, parsed));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
