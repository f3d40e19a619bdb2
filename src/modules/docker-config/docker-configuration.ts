/**
 * DockerConfigurationMetadata: the result of one resolution run.
 *
 * Pipeline (synchronous, all-or-nothing):
 *   configuration root  (DOCKER_CONFIG or ~/.docker)
 *     → config.json     (current context, helpers, auths)
 *     → active context  (contexts/meta/<hash>/meta.json, contexts/tls/<hash>/docker)
 */

import { childLogger, logger as rootLogger } from '../../utils/logger.js'
import { deepMask } from '../../utils/masking.js'
import { processEnvironment, resolveConfigLocation } from './config-paths.js'
import type { Environment } from './config-paths.js'
import { loadDockerConfig } from './config-loader.js'
import type { DockerConfig } from './config-loader.js'
import { resolveDockerContext } from './context-resolver.js'
import type { DockerContext } from './context-resolver.js'
import { nodeFileSystem } from './file-system.js'
import type { ConfigFileSystem } from './file-system.js'
import { findRegistryAuth } from './registry-lookup.js'
import type { RegistryAuthResult } from './registry-lookup.js'

const logger = childLogger(rootLogger, { module: 'docker-configuration' })

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ResolveOptions {
  /** File access used for every read (default: node fs) */
  fileSystem?: ConfigFileSystem
}

// ---------------------------------------------------------------------------
// DockerConfigurationMetadata
// ---------------------------------------------------------------------------

export class DockerConfigurationMetadata {
  private readonly _configLocation: string
  private readonly _config: DockerConfig
  private readonly _context: DockerContext
  private readonly _fs: ConfigFileSystem

  private constructor(
    configLocation: string,
    config: DockerConfig,
    context: DockerContext,
    fs: ConfigFileSystem
  ) {
    this._configLocation = configLocation
    this._config = config
    this._context = context
    this._fs = fs
  }

  /**
   * Resolve the Docker configuration for `env`.
   *
   * @throws {ConfigParseError} if config.json or the active context's meta.json is malformed
   * @throws {ContextNotFoundError} if the current context has no metadata on disk
   */
  static from(
    env: Environment = processEnvironment,
    options: ResolveOptions = {}
  ): DockerConfigurationMetadata {
    const fs = options.fileSystem ?? nodeFileSystem
    const configLocation = resolveConfigLocation(env)
    logger.debug({ configLocation }, 'Resolving Docker configuration')

    const config = loadDockerConfig(configLocation, fs)
    const context = resolveDockerContext(configLocation, config.currentContext, fs)
    return new DockerConfigurationMetadata(configLocation, config, context, fs)
  }

  /** The configuration root directory this result was resolved from */
  getConfigLocation(): string {
    return this._configLocation
  }

  getConfiguration(): DockerConfig {
    return this._config
  }

  /** The context named by `currentContext` */
  getContext(): DockerContext {
    return this._context
  }

  /**
   * Resolve another named context against the same configuration root.
   * config.json is not read again and this result is left unchanged.
   */
  forContext(contextName: string | null): DockerContext {
    return resolveDockerContext(this._configLocation, contextName, this._fs)
  }

  /** Stored credentials and credential helper for a registry host */
  getRegistryAuth(registry: string): RegistryAuthResult {
    return findRegistryAuth(this._config, registry)
  }

  /**
   * Plain-object view of the resolution with credentials masked.
   * Safe to display in CLI output or logs.
   */
  toMaskedJSON(): Record<string, unknown> {
    return {
      configLocation: this._configLocation,
      configuration: deepMask(this._config),
      context: {
        name: this._context.name,
        dockerHost: this._context.dockerHost,
        tlsVerify: this._context.isTlsVerify(),
        tlsPath: this._context.tlsPath,
      },
    }
  }
}

/**
 * Resolve the Docker configuration from the current process environment.
 *
 * @example
 * const docker = resolveDockerConfiguration()
 * const host = docker.getContext().dockerHost ?? 'unix:///var/run/docker.sock'
 */
export function resolveDockerConfiguration(
  env: Environment = processEnvironment,
  options: ResolveOptions = {}
): DockerConfigurationMetadata {
  return DockerConfigurationMetadata.from(env, options)
}
