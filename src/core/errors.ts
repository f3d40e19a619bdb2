/**
 * Error definitions for docker-config-resolver
 * Provides a structured error hierarchy for every resolution failure
 */

/** Base error class for all resolver errors */
export class DockerConfigError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'DockerConfigError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DockerConfigError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a configuration or context metadata file cannot be parsed */
export class ConfigParseError extends DockerConfigError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_PARSE_ERROR', context)
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when an existing file cannot be read */
export class ConfigReadError extends DockerConfigError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_READ_ERROR', context)
    this.name = 'ConfigReadError'
  }
}

/** Error thrown when the configured context has no metadata on disk */
export class ContextNotFoundError extends DockerConfigError {
  constructor(contextName: string, metaPath: string) {
    super(`Docker context '${contextName}' does not exist`, 'CONTEXT_NOT_FOUND', {
      contextName,
      metaPath,
    })
    this.name = 'ContextNotFoundError'
  }
}
