/**
 * Locations inside the Docker CLI configuration directory.
 *
 * Layout:
 *   <root>/config.json
 *   <root>/contexts/meta/<sha256(name)>/meta.json
 *   <root>/contexts/tls/<sha256(name)>/docker/
 */

import { join } from 'path'
import { homedir } from 'os'

/** Environment variable that overrides the configuration directory */
export const DOCKER_CONFIG_ENV = 'DOCKER_CONFIG'

/** Directory under the user's home used when no override is set */
export const DEFAULT_CONFIG_DIR = '.docker'

export const CONFIG_FILE_NAME = 'config.json'
export const CONTEXTS_DIR = 'contexts'
export const META_DIR = 'meta'
export const TLS_DIR = 'tls'
export const CONTEXT_FILE_NAME = 'meta.json'

/** Endpoint name the Docker CLI uses for the engine inside context metadata */
export const DOCKER_ENDPOINT = 'docker'

/**
 * Process state the resolver depends on.
 */
export interface Environment {
  get(name: string): string | undefined
  homeDir(): string
}

export const processEnvironment: Environment = {
  get(name: string): string | undefined {
    return process.env[name]
  },
  homeDir(): string {
    return homedir()
  },
}

/**
 * Build an Environment from a fixed variable map, e.g. for tests or for
 * callers that resolve against a captured environment.
 */
export function environmentFrom(
  variables: Record<string, string | undefined>,
  home: string = homedir()
): Environment {
  return {
    get: (name) => variables[name],
    homeDir: () => home,
  }
}

/**
 * Resolve the Docker configuration root.
 * A non-empty `DOCKER_CONFIG` is used verbatim; otherwise `<home>/.docker`.
 */
export function resolveConfigLocation(env: Environment = processEnvironment): string {
  const override = env.get(DOCKER_CONFIG_ENV)
  if (override !== undefined && override !== '') return override
  return join(env.homeDir(), DEFAULT_CONFIG_DIR)
}

export function configFilePath(root: string): string {
  return join(root, CONFIG_FILE_NAME)
}

export function contextMetaPath(root: string, hash: string): string {
  return join(root, CONTEXTS_DIR, META_DIR, hash, CONTEXT_FILE_NAME)
}

export function contextTlsPath(root: string, hash: string): string {
  return join(root, CONTEXTS_DIR, TLS_DIR, hash, DOCKER_ENDPOINT)
}
