/**
 * Synchronous file access used by the resolver.
 *
 * Every read of the Docker configuration tree goes through this interface so
 * callers can substitute or instrument disk access.
 */

import { existsSync, readFileSync, statSync } from 'fs'

export interface ConfigFileSystem {
  /** Whether anything exists at `path` */
  exists(path: string): boolean
  /** Whether `path` exists and is a directory */
  isDirectory(path: string): boolean
  /** Full UTF-8 contents of the file at `path` */
  readText(path: string): string
}

export const nodeFileSystem: ConfigFileSystem = {
  exists(path: string): boolean {
    return existsSync(path)
  },
  isDirectory(path: string): boolean {
    const stats = statSync(path, { throwIfNoEntry: false })
    return stats !== undefined && stats.isDirectory()
  },
  readText(path: string): string {
    return readFileSync(path, 'utf-8')
  },
}
