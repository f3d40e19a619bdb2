/**
 * Context resolver: named Docker context → daemon host and TLS settings.
 *
 * The Docker CLI stores each context under the SHA-256 of its name:
 *   contexts/meta/<hash>/meta.json   endpoint metadata
 *   contexts/tls/<hash>/docker/      TLS material (optional)
 */

import { ConfigReadError, ContextNotFoundError } from '../../core/errors.js'
import { childLogger, logger as rootLogger } from '../../utils/logger.js'
import { contextMetaPath, contextTlsPath } from './config-paths.js'
import { DockerContextMetaSchema } from './config-schema.js'
import { contextHash } from './context-hash.js'
import { nodeFileSystem } from './file-system.js'
import type { ConfigFileSystem } from './file-system.js'
import { readJsonDocument } from './json-document.js'

const logger = childLogger(rootLogger, { module: 'context-resolver' })

/** Context name the Docker CLI reserves for its built-in connection settings */
export const DEFAULT_CONTEXT = 'default'

export interface DockerContext {
  /** Context name from metadata, or the requested name; null for the empty context */
  readonly name: string | null
  /** Engine address, e.g. `unix:///var/run/docker.sock` or `tcp://host:2376` */
  readonly dockerHost: string | null
  readonly skipTlsVerify: boolean | null
  /** Directory holding the context's TLS material, when one exists */
  readonly tlsPath: string | null
  /**
   * True only when `SkipTLSVerify` is explicitly false. An absent flag and an
   * explicit true both yield false.
   */
  isTlsVerify(): boolean
}

function createDockerContext(
  name: string | null,
  dockerHost: string | null,
  skipTlsVerify: boolean | null,
  tlsPath: string | null
): DockerContext {
  return Object.freeze({
    name,
    dockerHost,
    skipTlsVerify,
    tlsPath,
    isTlsVerify: () => skipTlsVerify !== null && !skipTlsVerify,
  })
}

function hasTlsDirectory(fs: ConfigFileSystem, tlsPath: string): boolean {
  try {
    return fs.isDirectory(tlsPath)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigReadError(
      `Error reading Docker context TLS directory '${tlsPath}': ${message}`,
      { filePath: tlsPath }
    )
  }
}

/** Context meaning "connect using engine defaults" */
export function emptyDockerContext(): DockerContext {
  return createDockerContext(null, null, null, null)
}

/**
 * Resolve the context called `contextName` under `root`.
 *
 * @throws {ContextNotFoundError} if a non-default context has no metadata file
 * @throws {ConfigParseError} if the metadata file is not a valid document
 * @throws {ConfigReadError} if the metadata file or TLS directory cannot be inspected
 */
export function resolveDockerContext(
  root: string,
  contextName: string | null | undefined,
  fs: ConfigFileSystem = nodeFileSystem
): DockerContext {
  if (contextName === null || contextName === undefined || contextName === DEFAULT_CONTEXT) {
    return emptyDockerContext()
  }

  const hash = contextHash(contextName)
  const metaPath = contextMetaPath(root, hash)
  const tlsPath = contextTlsPath(root, hash)

  if (!fs.exists(metaPath)) {
    throw new ContextNotFoundError(contextName, metaPath)
  }

  const meta = readJsonDocument(fs, metaPath, DockerContextMetaSchema, 'Docker context metadata file')
  const endpoint = meta.Endpoints?.docker
  const hasTls = hasTlsDirectory(fs, tlsPath)

  logger.debug(
    { contextName, metaPath, tls: hasTls },
    'Resolved Docker context'
  )

  return createDockerContext(
    meta.Name ?? contextName,
    endpoint?.Host ?? null,
    endpoint?.SkipTLSVerify ?? null,
    hasTls ? tlsPath : null
  )
}
