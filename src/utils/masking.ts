/**
 * Credential masking utilities for display output and Pino logger redaction.
 *
 * Registry passwords, packed auth strings and identity tokens read from the
 * Docker configuration never appear in logs or printed output.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify secret-looking values inside free text.
 */
export const SECRET_PATTERNS: RegExp[] = [
  // Basic auth header payloads
  /Basic\s+[A-Za-z0-9+/]+={0,2}/g,
  // Bearer tokens
  /Bearer\s+[A-Za-z0-9._~+/-]+=*/g,
  // Generic 40-char hex tokens (e.g. GitHub PATs, generic secrets)
  /\b[A-Fa-f0-9]{40}\b/g,
  // Generic long base64-looking tokens (≥32 chars, no spaces)
  /[A-Za-z0-9+/]{32,}={0,2}/g,
]

/**
 * Pino redaction paths for credential fields of the Docker configuration.
 * Pass this array to the `pino({ redact: ... })` option.
 *
 * @example
 * import pino from 'pino'
 * import { PINO_REDACT_PATHS } from './masking.js'
 * const logger = pino({ redact: PINO_REDACT_PATHS })
 */
export const PINO_REDACT_PATHS: string[] = [
  'password',
  'auth',
  '*.password',
  '*.auth',
  'auths.*.password',
  'auths.*.auth',
  'identitytoken',
  'registrytoken',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any known secret patterns in a string with `***`.
 *
 * This is a best-effort scrub for log messages and error strings; it does
 * NOT guarantee removal of every possible secret format.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of SECRET_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for display)
// ---------------------------------------------------------------------------

/**
 * Credential field names that are replaced with `***` in displayed output.
 */
const CREDENTIAL_FIELDS = new Set([
  'password',
  'auth',
  'identitytoken',
  'registrytoken',
  'token',
  'secret',
])

/**
 * Deep-clone a plain-object tree and replace non-null credential fields with `***`.
 *
 * Only operates on plain objects and arrays; primitives are returned as-is.
 * A credential field holding null stays null so absent values remain visible.
 */
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      if (CREDENTIAL_FIELDS.has(k) && v !== null && v !== undefined) {
        masked[k] = MASKED_VALUE
      } else {
        masked[k] = deepMask(v)
      }
    }
    return masked
  }
  return value
}
