/** Base class for errors raised by this library. */
export class FlagError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'FlagError'
  }
}

/**
 * Local evaluation of one flag cannot proceed because property, cohort or
 * dependency data is missing. Callers fall back; this never means `false`.
 */
export class InconclusiveMatchError extends FlagError {
  constructor(message: string) {
    super(message, 'INCONCLUSIVE_MATCH')
    this.name = 'InconclusiveMatchError'
  }
}

export class CyclicDependencyError extends FlagError {
  constructor(public readonly flagKey: string) {
    super(`Cyclic dependency detected for flag: ${flagKey}`, 'CYCLIC_DEPENDENCY')
    this.name = 'CyclicDependencyError'
  }
}

export class MissingDependencyError extends FlagError {
  constructor(
    public readonly flagKey: string,
    public readonly dependencyKey: string,
  ) {
    super(`Missing dependency: ${flagKey} depends on ${dependencyKey}`, 'MISSING_DEPENDENCY')
    this.name = 'MissingDependencyError'
  }
}

export class ConfigurationError extends FlagError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'CONFIGURATION_ERROR')
    this.name = 'ConfigurationError'
  }
}

export class DefinitionParseError extends FlagError {
  constructor(message: string) {
    super(message, 'DEFINITION_PARSE_ERROR')
    this.name = 'DefinitionParseError'
  }
}

// -- Remote path --------------------------------------------------------------

/** A failure on the network path; `marker` feeds the `$feature_flag_error` property. */
export abstract class RemoteError extends FlagError {
  abstract readonly marker: string
}

export class TimeoutError extends RemoteError {
  readonly marker = 'timeout'

  constructor(message = 'Request timed out', options?: { cause?: unknown }) {
    super(message, 'TIMEOUT', options)
    this.name = 'TimeoutError'
  }
}

export class ConnectionError extends RemoteError {
  readonly marker = 'connection_error'

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONNECTION_ERROR', options)
    this.name = 'ConnectionError'
  }
}

/** A non-2xx HTTP response. */
export class APIError extends RemoteError {
  readonly marker: string

  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(`HTTP ${status}: ${message}`, 'API_ERROR')
    this.name = 'APIError'
    this.marker = `api_error_${status}`
  }
}

export class QuotaLimitedError extends RemoteError {
  readonly marker = 'quota_limited'

  constructor(message = 'Feature flags quota limited') {
    super(message, 'QUOTA_LIMITED')
    this.name = 'QuotaLimitedError'
  }
}

/** Maps anything thrown on the remote path to a {@link RemoteError}. */
export function classifyRemoteError(err: unknown): RemoteError {
  if (err instanceof RemoteError) return err
  if (err instanceof Error) {
    if (err.name === 'TimeoutError' || err.name === 'AbortError') {
      return new TimeoutError(err.message, { cause: err })
    }
    return new ConnectionError(err.message, { cause: err })
  }
  return new ConnectionError(String(err), { cause: err })
}
