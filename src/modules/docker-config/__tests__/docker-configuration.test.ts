/**
 * Unit tests for docker-configuration.ts
 *
 * Tests:
 *  - End-to-end resolution from DOCKER_CONFIG and from ~/.docker
 *  - forContext() re-resolves without reading config.json again
 *  - All-or-nothing failure
 *  - Masked display output
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { join } from 'path'
import { mkdir } from 'fs/promises'
import {
  DockerConfigurationMetadata,
  resolveDockerConfiguration,
} from '../docker-configuration.js'
import { environmentFrom } from '../config-paths.js'
import { nodeFileSystem } from '../file-system.js'
import type { ConfigFileSystem } from '../file-system.js'
import { ConfigParseError, ContextNotFoundError } from '../../../core/errors.js'
import { createConfigRoot, removeConfigRoot, writeConfigJson, writeContext } from './helpers.js'

let root: string

beforeEach(async () => {
  root = await createConfigRoot()
})

afterEach(async () => {
  await removeConfigRoot(root)
  vi.restoreAllMocks()
})

function envFor(configDir: string): ReturnType<typeof environmentFrom> {
  return environmentFrom({ DOCKER_CONFIG: configDir }, '/nonexistent-home')
}

describe('DockerConfigurationMetadata.from', () => {
  it('resolves to empty configuration and context with no config file', () => {
    const result = DockerConfigurationMetadata.from(envFor(root))
    const config = result.getConfiguration()
    expect(config.credHelpers).toEqual({})
    expect(config.auths).toEqual({})
    expect(config.credsStore).toBeNull()
    const context = result.getContext()
    expect(context.dockerHost).toBeNull()
    expect(context.isTlsVerify()).toBe(false)
    expect(context.tlsPath).toBeNull()
  })

  it('uses ~/.docker when DOCKER_CONFIG is unset', async () => {
    const dockerDir = join(root, '.docker')
    await mkdir(dockerDir)
    await writeConfigJson(dockerDir, { credsStore: 'osxkeychain' })
    const result = DockerConfigurationMetadata.from(environmentFrom({}, root))
    expect(result.getConfigLocation()).toBe(dockerDir)
    expect(result.getConfiguration().credsStore).toBe('osxkeychain')
  })

  it('resolves the current context with TLS material', async () => {
    await writeConfigJson(root, { currentContext: 'remote' })
    const hash = await writeContext(root, 'remote', {
      meta: { Name: 'remote', Endpoints: { docker: { Host: 'tcp://192.168.1.20:2376', SkipTLSVerify: false } } },
      tls: true,
    })
    const context = DockerConfigurationMetadata.from(envFor(root)).getContext()
    expect(context.name).toBe('remote')
    expect(context.dockerHost).toBe('tcp://192.168.1.20:2376')
    expect(context.isTlsVerify()).toBe(true)
    expect(context.tlsPath).toBe(join(root, 'contexts', 'tls', hash, 'docker'))
  })

  it('never reads the contexts directory for the default context', async () => {
    await writeConfigJson(root, { currentContext: 'default' })
    const exists = vi.fn((path: string) => nodeFileSystem.exists(path))
    const fs: ConfigFileSystem = { ...nodeFileSystem, exists }
    const result = DockerConfigurationMetadata.from(envFor(root), { fileSystem: fs })
    expect(result.getContext().dockerHost).toBeNull()
    expect(exists).toHaveBeenCalledTimes(1)
    expect(exists).toHaveBeenCalledWith(join(root, 'config.json'))
  })

  it('fails when the current context does not exist', async () => {
    await writeConfigJson(root, { currentContext: 'gone' })
    expect(() => DockerConfigurationMetadata.from(envFor(root))).toThrow(
      "Docker context 'gone' does not exist"
    )
    expect(() => DockerConfigurationMetadata.from(envFor(root))).toThrow(ContextNotFoundError)
  })

  it('fails when config.json is malformed', async () => {
    await writeConfigJson(root, 'not json')
    expect(() => DockerConfigurationMetadata.from(envFor(root))).toThrow(ConfigParseError)
  })

  it('resolveDockerConfiguration is equivalent to from()', async () => {
    await writeConfigJson(root, { credsStore: 'pass' })
    expect(resolveDockerConfiguration(envFor(root)).getConfiguration().credsStore).toBe('pass')
  })
})

describe('DockerConfigurationMetadata.forContext', () => {
  it('resolves another context without re-reading config.json', async () => {
    await writeConfigJson(root, { currentContext: 'remote' })
    await writeContext(root, 'remote', {
      meta: { Endpoints: { docker: { Host: 'tcp://remote:2376', SkipTLSVerify: true } } },
    })
    await writeContext(root, 'other', {
      meta: { Endpoints: { docker: { Host: 'ssh://deploy@other', SkipTLSVerify: false } } },
    })

    const readText = vi.fn((path: string) => nodeFileSystem.readText(path))
    const fs: ConfigFileSystem = { ...nodeFileSystem, readText }
    const result = DockerConfigurationMetadata.from(envFor(root), { fileSystem: fs })

    const configPath = join(root, 'config.json')
    const configReads = (): number =>
      readText.mock.calls.filter(([path]) => path === configPath).length
    expect(configReads()).toBe(1)

    const other = result.forContext('other')
    expect(other.dockerHost).toBe('ssh://deploy@other')
    expect(other.isTlsVerify()).toBe(true)
    expect(configReads()).toBe(1)

    expect(result.getContext().dockerHost).toBe('tcp://remote:2376')
    expect(result.getContext().isTlsVerify()).toBe(false)
  })

  it('returns the empty context for default', async () => {
    await writeConfigJson(root, { currentContext: 'remote' })
    await writeContext(root, 'remote')
    const result = DockerConfigurationMetadata.from(envFor(root))
    const context = result.forContext('default')
    expect(context.dockerHost).toBeNull()
    expect(result.getContext().dockerHost).toBe('tcp://127.0.0.1:2376')
  })

  it('throws for an unknown context', () => {
    const result = DockerConfigurationMetadata.from(envFor(root))
    expect(() => result.forContext('nope')).toThrow(ContextNotFoundError)
  })
})

describe('DockerConfigurationMetadata.getRegistryAuth', () => {
  it('looks up credentials and helper from the loaded configuration', async () => {
    await writeConfigJson(root, {
      credsStore: 'desktop',
      auths: { 'https://index.docker.io/v1/': { auth: 'YWxpY2U6c2VjcmV0' } },
    })
    const result = DockerConfigurationMetadata.from(envFor(root)).getRegistryAuth('docker.io')
    expect(result.auth).toEqual({ username: 'alice', password: 'secret', email: null })
    expect(result.helper).toBe('desktop')
  })
})

describe('DockerConfigurationMetadata.toMaskedJSON', () => {
  it('masks passwords and keeps everything else', async () => {
    await writeConfigJson(root, {
      currentContext: 'remote',
      auths: { 'ghcr.io': { username: 'carol', password: 'hunter2' } },
    })
    await writeContext(root, 'remote')
    const masked = DockerConfigurationMetadata.from(envFor(root)).toMaskedJSON()
    expect(masked).toEqual({
      configLocation: root,
      configuration: {
        currentContext: 'remote',
        credsStore: null,
        credHelpers: {},
        auths: { 'ghcr.io': { username: 'carol', password: '***', email: null } },
      },
      context: {
        name: 'remote',
        dockerHost: 'tcp://127.0.0.1:2376',
        tlsVerify: true,
        tlsPath: null,
      },
    })
  })
})
