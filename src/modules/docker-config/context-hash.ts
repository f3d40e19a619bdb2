import { createHash } from 'crypto'

/**
 * Directory name the Docker CLI stores a context under: the lowercase hex
 * SHA-256 digest of the context name's UTF-8 bytes.
 */
export function contextHash(contextName: string): string {
  return createHash('sha256').update(contextName, 'utf8').digest('hex')
}
