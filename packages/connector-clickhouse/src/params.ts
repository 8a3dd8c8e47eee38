import type { ParameterMap } from '@querykit/core'
import { rewritePlaceholders } from '@querykit/core'

// ── Typed query parameters ─────────────────────────────────────

export interface TypedQuery {
  query: string
  queryParams: Record<string, unknown>
}

/**
 * ClickHouse type for a bound value.
 * Throws for values with no ClickHouse counterpart (objects, functions, symbols).
 */
export function clickHouseType(value: unknown): string {
  if (value === null || value === undefined) return 'Nullable(String)'
  if (Array.isArray(value)) return `Array(${elementType(value)})`
  if (value instanceof Date) return 'DateTime64(3)'
  switch (typeof value) {
    case 'string':
      return 'String'
    case 'boolean':
      return 'Bool'
    case 'bigint':
      return 'Int64'
    case 'number':
      return Number.isInteger(value) ? 'Int64' : 'Float64'
    default:
      throw new TypeError(`Unsupported parameter type: ${typeof value}`)
  }
}

function elementType(values: readonly unknown[]): string {
  const types = new Set<string>()
  let nullable = false
  for (const v of values) {
    if (v === null || v === undefined) {
      nullable = true
      continue
    }
    types.add(clickHouseType(v))
  }

  // Integers mixed with floats widen to Float64
  if (types.size === 2 && types.has('Int64') && types.has('Float64')) {
    types.delete('Int64')
  }
  if (types.size > 1) {
    throw new TypeError(`Mixed array element types: ${[...types].join(', ')}`)
  }

  const [inner = 'String'] = types
  return nullable && !inner.startsWith('Array(') ? `Nullable(${inner})` : inner
}

/** Rewrite `:name` to `{name:Type}` and collect the referenced values. */
export function toTypedQuery(sql: string, params: ParameterMap): TypedQuery {
  const queryParams: Record<string, unknown> = {}

  const query = rewritePlaceholders(sql, (name) => {
    if (!Object.hasOwn(params, name)) {
      throw new Error(`No value bound for placeholder :${name}`)
    }
    const value = params[name]
    queryParams[name] = value
    return `{${name}:${clickHouseType(value)}}`
  })

  return { query, queryParams }
}
