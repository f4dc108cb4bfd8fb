/**
 * Zod schemas for everything that enters a run from outside: run settings,
 * device rows and job files.
 *
 * Input arrives from a file-parsing collaborator or a JSON job file, so none of
 * it is trusted. Validation happens before dispatch; a failure aborts the run
 * with a ValidationError and no partial report.
 */

import { z } from 'zod';
import { DEVICE_TYPES } from '@shared/constants';
import { ValidationError, type ValidationErrorCode } from '../errors';

// ── Run settings ───────────────────────────────────────────────────────────

export const RunSettingsSchema = z.object({
  maxWorkers: z.number().int().min(1).max(50),
  batchSize: z.number().int().min(1).max(100),
  connectTimeoutSeconds: z.number().int().min(1).max(600),
  commandTimeoutSeconds: z.number().int().min(1).max(3600),
  retryCount: z.number().int().min(0).max(10),
  retryDelaySeconds: z.number().min(0).max(300),
  mode: z.enum(['normal', 'config']),
  maxOutputChars: z.number().int().min(1024).max(64 * 1024 * 1024),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

export const RunSettingsUpdateSchema = RunSettingsSchema.partial();

// ── Device rows ────────────────────────────────────────────────────────────

export const DeviceRowSchema = z.object({
  ip: z.string().trim().min(1).max(255),
  dns: z.string().trim().max(255),
  command: z.string().max(100000),
  deviceType: z.string().trim().min(1).max(50).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  credentialProfile: z.string().trim().min(1).max(100).optional(),
});

// ── Job file (command-line entry) ──────────────────────────────────────────

export const OutputFormatSchema = z.enum(['csv', 'txt', 'json', 'xlsx']);

export const JobFileSchema = z.object({
  deviceType: z.enum(DEVICE_TYPES),
  credentialProfile: z.string().trim().min(1).max(100),
  rows: z.array(z.record(z.unknown())).min(1),
  settings: RunSettingsUpdateSchema.optional(),
  output: z
    .object({
      dir: z.string().min(1).max(1024).optional(),
      baseName: z.string().min(1).max(255).optional(),
      formats: z.array(OutputFormatSchema).min(1).optional(),
    })
    .optional(),
});

export type JobFile = z.infer<typeof JobFileSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

// ── Helpers ────────────────────────────────────────────────────────────────

/**
 * Validate `input` against `schema`. Returns parsed data on success, or throws a
 * ValidationError listing every issue as `path: message`.
 */
export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  code: ValidationErrorCode = 'InvalidSettings',
  row?: number,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || 'input'}: ${i.message}`)
      .join('; ');
    throw new ValidationError(code, `Invalid input: ${issues}`, row);
  }
  return result.data;
}
