/**
 * Sanitization helpers for safe logging.
 *
 * Never log raw credential or connection objects; they carry passwords and
 * enable secrets. Use sanitizeForLog() before passing any such object to the
 * logger or into a progress event.
 */

const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  'password',
  'enableSecret',
  'secret',
  'privateKey',
  'passphrase',
  'token',
]);

/**
 * Returns a copy of `obj` with sensitive fields replaced by `'***'`.
 * Nested plain objects are masked as well.
 */
export function sanitizeForLog(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEYS.has(key) && value !== undefined) {
      out[key] = '***';
    } else if (isPlainObject(value)) {
      out[key] = sanitizeForLog(value);
    } else {
      out[key] = value;
    }
  }
  return out;
}

/** Replaces every occurrence of the given secrets inside free text. */
export function redactSecrets(text: string, secrets: ReadonlyArray<string | undefined>): string {
  let result = text;
  for (const secret of secrets) {
    if (secret) result = result.split(secret).join('***');
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}
