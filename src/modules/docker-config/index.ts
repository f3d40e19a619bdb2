/**
 * Barrel exports for the docker-config module.
 */

export {
  DockerConfigurationMetadata,
  resolveDockerConfiguration,
} from './docker-configuration.js'
export type { ResolveOptions } from './docker-configuration.js'
export {
  DOCKER_CONFIG_ENV,
  DEFAULT_CONFIG_DIR,
  DOCKER_ENDPOINT,
  processEnvironment,
  environmentFrom,
  resolveConfigLocation,
  configFilePath,
  contextMetaPath,
  contextTlsPath,
} from './config-paths.js'
export type { Environment } from './config-paths.js'
export { loadDockerConfig, emptyDockerConfig } from './config-loader.js'
export type { DockerConfig } from './config-loader.js'
export {
  DEFAULT_CONTEXT,
  resolveDockerContext,
  emptyDockerContext,
} from './context-resolver.js'
export type { DockerContext } from './context-resolver.js'
export { contextHash } from './context-hash.js'
export { parseDockerAuth, decodeBase64, splitPackedAuth } from './credentials.js'
export type { DockerAuth } from './credentials.js'
export {
  DOCKER_HUB_HOST,
  normalizeRegistryKey,
  findRegistryAuth,
} from './registry-lookup.js'
export type { RegistryAuthResult } from './registry-lookup.js'
export {
  DockerConfigFileSchema,
  DockerAuthEntrySchema,
  DockerContextMetaSchema,
  DockerEndpointSchema,
} from './config-schema.js'
export type {
  DockerConfigFile,
  DockerAuthEntry,
  DockerContextMeta,
  DockerEndpoint,
} from './config-schema.js'
export { nodeFileSystem } from './file-system.js'
export type { ConfigFileSystem } from './file-system.js'
