/**
 * Read a JSON document from disk and validate it against a zod schema.
 */

import type { z } from 'zod'
import { ConfigParseError, ConfigReadError } from '../../core/errors.js'
import { formatIssues } from './config-schema.js'
import type { ConfigFileSystem } from './file-system.js'

/**
 * Describe a JSON.parse failure without echoing the document text, which may
 * hold credentials. Only the character position survives.
 */
export function describeJsonError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err)
  const position = /at position (\d+)/.exec(message)
  if (position !== null) return `invalid JSON at position ${position[1] ?? '?'}`
  if (/end of JSON input/i.test(message)) return 'unexpected end of JSON input'
  return 'invalid JSON'
}

/**
 * @param description - Human-readable kind of file, used in error messages
 *   (e.g. "Docker configuration file")
 * @throws {ConfigReadError} if the file exists but cannot be read
 * @throws {ConfigParseError} if the text is not JSON or does not match `schema`
 */
export function readJsonDocument<T extends z.ZodTypeAny>(
  fs: ConfigFileSystem,
  filePath: string,
  schema: T,
  description: string
): z.infer<T> {
  let raw: string
  try {
    raw = fs.readText(filePath)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigReadError(
      `Error reading ${description} '${filePath}': ${message}`,
      { filePath }
    )
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new ConfigParseError(
      `Error parsing ${description} '${filePath}': ${describeJsonError(err)}`,
      { filePath }
    )
  }

  const result = schema.safeParse(parsed)
  if (!result.success) {
    throw new ConfigParseError(
      `Error parsing ${description} '${filePath}':\n${formatIssues(result.error)}`,
      { filePath, issues: result.error.issues }
    )
  }
  return result.data
}
