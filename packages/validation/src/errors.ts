// --- Base Error ---

export class QueryKitError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'QueryKitError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Invalid Argument ---

export interface InvalidArgumentDetails {
  argument: string
  actual?: string | undefined
}

export class InvalidArgumentError extends QueryKitError {
  declare readonly code: 'INVALID_ARGUMENT'
  readonly details: InvalidArgumentDetails

  constructor(argument: string, message: string, actual?: unknown) {
    super('INVALID_ARGUMENT', message)
    this.name = 'InvalidArgumentError'
    this.details = actual === undefined ? { argument } : { argument, actual: describeValue(actual) }
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Configuration Error ---

export type ConfigurationErrorCode = 'CONNECTOR_MISSING' | 'PROVIDER_MISSING' | 'CLOSED'

export class ConfigurationError extends QueryKitError {
  declare readonly code: ConfigurationErrorCode

  constructor(code: ConfigurationErrorCode, message?: string | undefined) {
    super(code, message ?? defaultConfigurationMessage(code))
    this.name = 'ConfigurationError'
  }
}

// --- Unresolved Join ---

export interface UnresolvedJoinDetails {
  sourceTable?: string | undefined
  targetTable: string
}

export class UnresolvedJoinError extends QueryKitError {
  declare readonly code: 'UNRESOLVED_JOIN'
  readonly details: UnresolvedJoinDetails

  constructor(details: UnresolvedJoinDetails) {
    super('UNRESOLVED_JOIN', defaultUnresolvedJoinMessage(details))
    this.name = 'UnresolvedJoinError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Metadata Error ---

export interface MetadataErrorEntry {
  code: 'INVALID_DOCUMENT' | 'INVALID_TABLE' | 'INVALID_ALIAS' | 'INVALID_COLUMN' | 'INVALID_RELATIONSHIP' | 'INVALID_JOIN_PATH'
  message: string
  details: {
    entity?: string | undefined
    field?: string | undefined
    expected?: string | undefined
    actual?: string | undefined
  }
}

export class MetadataError extends QueryKitError {
  declare readonly code: 'METADATA_INVALID'
  readonly errors: readonly MetadataErrorEntry[]

  constructor(errors: readonly MetadataErrorEntry[]) {
    super('METADATA_INVALID', `Metadata invalid: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'MetadataError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Provider Error ---

export class ProviderError extends QueryKitError {
  declare readonly code: 'METADATA_LOAD_FAILED'

  constructor(message: string, cause?: Error | undefined) {
    super('METADATA_LOAD_FAILED', message, cause ? { cause } : undefined)
    this.name = 'ProviderError'
  }
}

// --- Execution Error ---

export interface ExecutionErrorDetails {
  connector: string
  sql: string
  params: Record<string, unknown>
}

export class ExecutionError extends QueryKitError {
  declare readonly code: 'QUERY_FAILED'
  readonly details: ExecutionErrorDetails

  constructor(details: ExecutionErrorDetails, cause?: Error | undefined) {
    super('QUERY_FAILED', `Query failed on ${details.connector} connector`, cause ? { cause } : undefined)
    this.name = 'ExecutionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Connection Error ---

export interface ConnectionErrorDetails {
  connector: string
  url?: string | undefined
}

export class ConnectionError extends QueryKitError {
  declare readonly code: 'CONNECTION_FAILED'
  readonly details: ConnectionErrorDetails

  constructor(message: string, details: ConnectionErrorDetails, cause?: Error | undefined) {
    super('CONNECTION_FAILED', message, cause ? { cause } : undefined)
    this.name = 'ConnectionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Helpers ---

function serializeError(err: unknown): unknown {
  if (err instanceof QueryKitError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

/** Short, JSON-safe description of an offending input value. */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`
  if (value === null) return 'null'
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value)
  if (Array.isArray(value)) return 'array'
  return typeof value
}

function defaultConfigurationMessage(code: ConfigurationErrorCode): string {
  switch (code) {
    case 'CONNECTOR_MISSING':
      return 'No connector configured for query execution'
    case 'PROVIDER_MISSING':
      return 'No metadata provider configured'
    case 'CLOSED':
      return 'Query kit is closed'
  }
}

function defaultUnresolvedJoinMessage(details: UnresolvedJoinDetails): string {
  if (details.sourceTable === undefined) {
    return `Cannot resolve join to '${details.targetTable}': no FROM table and no explicit condition`
  }
  return `Cannot resolve join from '${details.sourceTable}' to '${details.targetTable}': no explicit condition and no registered join path`
}
