import { InvalidArgumentError } from '../errors.js'
import type { JoinKind, OrderDirection } from './rules.js'
import { normalizeKeyword, VALID_DIRECTIONS, VALID_JOIN_KINDS, VALID_WHERE_OPS } from './rules.js'

// ── Type guards ────────────────────────────────────────────────

function isOrderDirection(value: string): value is OrderDirection {
  return VALID_DIRECTIONS.has(value)
}

function isJoinKind(value: string): value is JoinKind {
  return VALID_JOIN_KINDS.has(value)
}

// ── Argument validators (throw InvalidArgumentError) ───────────

export function validateDirection(direction: unknown): OrderDirection {
  if (typeof direction === 'string') {
    const normalized = normalizeKeyword(direction)
    if (isOrderDirection(normalized)) return normalized
  }
  throw new InvalidArgumentError('direction', 'Order direction must be ASC or DESC', direction)
}

export function validateJoinKind(kind: unknown): JoinKind {
  if (typeof kind === 'string') {
    const normalized = normalizeKeyword(kind)
    if (isJoinKind(normalized)) return normalized
  }
  throw new InvalidArgumentError('kind', 'Join kind must be one of INNER, LEFT, RIGHT, FULL', kind)
}

export function validateOperator(operator: unknown): string {
  if (typeof operator === 'string') {
    const normalized = normalizeKeyword(operator)
    if (VALID_WHERE_OPS.has(normalized)) return normalized
  }
  throw new InvalidArgumentError('operator', `Unsupported where operator: ${String(operator)}`, operator)
}

/** LIMIT / OFFSET values: non-negative safe integers. */
export function validateCount(argument: 'limit' | 'offset', value: unknown): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(argument, `${argument} must be a non-negative integer`, value)
  }
  return value
}

export function validateTableName(argument: string, name: unknown): string {
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new InvalidArgumentError(argument, `${argument} must be a non-empty string`, name)
  }
  return name.trim()
}
