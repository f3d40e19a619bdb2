/**
 * Registry lookup over a loaded DockerConfig.
 *
 * `docker login` writes keys in several spellings (`https://index.docker.io/v1/`,
 * `ghcr.io`, `https://registry.example.com`), so lookups compare normalized
 * hosts after trying an exact key match.
 */

import type { DockerConfig } from './config-loader.js'
import type { DockerAuth } from './credentials.js'

/** Host every Docker Hub alias normalizes to */
export const DOCKER_HUB_HOST = 'index.docker.io'

const DOCKER_HUB_ALIASES = new Set([
  'docker.io',
  'index.docker.io',
  'registry-1.docker.io',
  'registry.hub.docker.com',
])

export interface RegistryAuthResult {
  /** The registry that was looked up, as given */
  readonly registry: string
  /** The `auths` key that matched, or null */
  readonly key: string | null
  readonly auth: DockerAuth | null
  /** Credential helper the Docker CLI would consult: per-registry helper, else credsStore */
  readonly helper: string | null
}

/**
 * Normalize a registry key or image registry host for comparison.
 */
export function normalizeRegistryKey(registry: string): string {
  // Remove protocol
  let host = registry.trim().replace(/^https?:\/\//i, '')

  // Remove any API path (`/v1/`, `/v2/`)
  const slash = host.indexOf('/')
  if (slash !== -1) host = host.slice(0, slash)

  host = host.toLowerCase()

  if (DOCKER_HUB_ALIASES.has(host)) return DOCKER_HUB_HOST
  return host
}

function findKey(keys: string[], registry: string): string | null {
  if (keys.includes(registry)) return registry
  const normalized = normalizeRegistryKey(registry)
  return keys.find((key) => normalizeRegistryKey(key) === normalized) ?? null
}

/**
 * Find the stored credentials and the credential helper for `registry`.
 */
export function findRegistryAuth(config: DockerConfig, registry: string): RegistryAuthResult {
  const key = findKey(Object.keys(config.auths), registry)
  const helperKey = findKey(Object.keys(config.credHelpers), registry)

  return Object.freeze({
    registry,
    key,
    auth: key !== null ? (config.auths[key] ?? null) : null,
    helper: (helperKey !== null ? config.credHelpers[helperKey] : undefined) ?? config.credsStore,
  })
}
