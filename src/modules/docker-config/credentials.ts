/**
 * Registry credentials from the `auths` section of config.json.
 */

import type { DockerAuthEntry } from './config-schema.js'

/** Credentials stored for one registry */
export interface DockerAuth {
  readonly username: string | null
  readonly password: string | null
  readonly email: string | null
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*$/

/**
 * Decode standard base64, returning null when the text is not valid base64.
 * Padding is optional; a length that leaves a single dangling character is invalid.
 */
export function decodeBase64(encoded: string): string | null {
  const unpadded = encoded.replace(/={1,2}$/, '')
  if (!BASE64_PATTERN.test(unpadded) || unpadded.length % 4 === 1) return null
  return Buffer.from(unpadded, 'base64').toString('utf-8')
}

/**
 * Split packed `username:password` text on its first colon.
 * Returns null unless exactly two parts result.
 */
export function splitPackedAuth(decoded: string): [string, string] | null {
  const separator = decoded.indexOf(':')
  if (separator === -1) return null
  return [decoded.slice(0, separator), decoded.slice(separator + 1)]
}

/**
 * Build a DockerAuth from one `auths` entry.
 *
 * A packed `auth` value that decodes to `username:password` replaces the
 * discrete username and password fields. An `auth` value that does not decode
 * leaves them as they are. `email` only ever comes from its own field.
 */
export function parseDockerAuth(entry: DockerAuthEntry): DockerAuth {
  let username = entry.username ?? null
  let password = entry.password ?? null

  if (entry.auth !== undefined && entry.auth !== null) {
    const decoded = decodeBase64(entry.auth)
    const parts = decoded !== null ? splitPackedAuth(decoded) : null
    if (parts !== null) {
      username = parts[0]
      password = parts[1]
    }
  }

  return Object.freeze({
    username,
    password,
    email: entry.email ?? null,
  })
}
