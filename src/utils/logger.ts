/**
 * Logger utility for docker-config-resolver
 * Uses pino for structured JSON logging; pretty printing is opt-in
 */

import { createRequire } from 'module'
import pino from 'pino'
import { PINO_REDACT_PATHS } from './masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
  /** Write to this stream instead of stdout; disables pretty printing */
  destination?: pino.DestinationStream
}

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // Embedded in a build tool (no NODE_ENV set): stay quiet unless something is wrong
  return 'warn'
}

/** Whether the optional pino-pretty transport is installed alongside this package */
export function canResolvePrettyTransport(): boolean {
  try {
    createRequire(import.meta.url).resolve('pino-pretty')
    return true
  } catch {
    return false
  }
}

/**
 * Whether to use pretty printing. Requires `LOG_PRETTY=true` and an
 * installed pino-pretty; NODE_ENV alone never turns it on.
 */
export function isPrettyMode(
  resolvePretty: () => boolean = canResolvePrettyTransport
): boolean {
  return process.env.LOG_PRETTY === 'true' && resolvePretty()
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  if (options.destination !== undefined) {
    return pino(baseOptions, options.destination)
  }

  const pretty = options.pretty === true ? canResolvePrettyTransport() : options.pretty ?? isPrettyMode()
  if (pretty) {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    })
  }

  return pino(baseOptions)
}

/** Root library logger */
export const logger = createLogger('docker-config')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
