/**
 * Shared fixtures for docker-config tests: a throwaway configuration root
 * laid out the way the Docker CLI writes it.
 */

import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { contextHash } from '../context-hash.js'

export async function createConfigRoot(): Promise<string> {
  const root = join(
    tmpdir(),
    `docker-config-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`
  )
  await mkdir(root, { recursive: true })
  return root
}

export async function removeConfigRoot(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true })
}

export async function writeConfigJson(root: string, content: unknown): Promise<void> {
  const text = typeof content === 'string' ? content : JSON.stringify(content)
  await writeFile(join(root, 'config.json'), text, 'utf-8')
}

export interface ContextFixture {
  /** Raw meta.json text or an object to serialize */
  meta?: unknown
  /** Create contexts/tls/<hash>/docker */
  tls?: boolean
}

/**
 * Write the on-disk files for context `name`. Returns the hash directory name.
 */
export async function writeContext(
  root: string,
  name: string,
  fixture: ContextFixture = {}
): Promise<string> {
  const hash = contextHash(name)
  const metaDir = join(root, 'contexts', 'meta', hash)
  await mkdir(metaDir, { recursive: true })
  const meta = fixture.meta ?? {
    Name: name,
    Metadata: {},
    Endpoints: { docker: { Host: 'tcp://127.0.0.1:2376', SkipTLSVerify: false } },
  }
  const text = typeof meta === 'string' ? meta : JSON.stringify(meta)
  await writeFile(join(metaDir, 'meta.json'), text, 'utf-8')

  if (fixture.tls === true) {
    await mkdir(join(root, 'contexts', 'tls', hash, 'docker'), { recursive: true })
  }
  return hash
}
