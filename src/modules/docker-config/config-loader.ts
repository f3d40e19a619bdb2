/**
 * Global config loader: config.json → DockerConfig.
 *
 * A missing file is not an error; it yields an empty configuration, meaning
 * "use engine defaults, no registry credentials".
 */

import { childLogger, logger as rootLogger } from '../../utils/logger.js'
import { configFilePath } from './config-paths.js'
import { DockerConfigFileSchema } from './config-schema.js'
import type { DockerAuthEntry } from './config-schema.js'
import { parseDockerAuth } from './credentials.js'
import type { DockerAuth } from './credentials.js'
import { nodeFileSystem } from './file-system.js'
import type { ConfigFileSystem } from './file-system.js'
import { readJsonDocument } from './json-document.js'

const logger = childLogger(rootLogger, { module: 'config-loader' })

/** Parsed contents of config.json */
export interface DockerConfig {
  readonly currentContext: string | null
  /** Credential store helper used for every registry without its own helper */
  readonly credsStore: string | null
  /** Registry host → credential helper name */
  readonly credHelpers: Readonly<Record<string, string>>
  /** Registry key → stored credentials */
  readonly auths: Readonly<Record<string, DockerAuth>>
}

export function emptyDockerConfig(): DockerConfig {
  return Object.freeze({
    currentContext: null,
    credsStore: null,
    credHelpers: Object.freeze({}),
    auths: Object.freeze({}),
  })
}

/**
 * Load `<root>/config.json`.
 *
 * @throws {ConfigParseError} if the file exists but is not a valid configuration document
 * @throws {ConfigReadError} if the file exists but cannot be read
 */
export function loadDockerConfig(
  root: string,
  fs: ConfigFileSystem = nodeFileSystem
): DockerConfig {
  const filePath = configFilePath(root)
  if (!fs.exists(filePath)) {
    logger.debug({ filePath }, 'No Docker configuration file, using defaults')
    return emptyDockerConfig()
  }

  const document = readJsonDocument(fs, filePath, DockerConfigFileSchema, 'Docker configuration file')

  const auths: Record<string, DockerAuth> = Object.fromEntries(
    Object.entries<DockerAuthEntry>(document.auths ?? {}).map(
      ([registry, entry]): [string, DockerAuth] => [registry, parseDockerAuth(entry)]
    )
  )

  const config: DockerConfig = Object.freeze({
    currentContext: document.currentContext ?? null,
    credsStore: document.credsStore ?? null,
    credHelpers: Object.freeze({ ...(document.credHelpers ?? {}) }),
    auths: Object.freeze(auths),
  })

  logger.debug(
    {
      filePath,
      currentContext: config.currentContext,
      registries: Object.keys(auths).length,
      credHelpers: Object.keys(config.credHelpers).length,
    },
    'Loaded Docker configuration file'
  )
  return config
}
