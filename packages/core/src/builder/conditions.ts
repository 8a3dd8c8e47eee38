import { InvalidArgumentError, validateOperator } from '@querykit/validation'
import type { Field, SqlExpression, WhereCondition } from '../types/ir.js'

// ── WHERE constructors ─────────────────────────────────────────

/** `field = value` */
export function equals(field: Field, value: unknown): WhereCondition {
  return { field: checkField(field), operator: '=', value }
}

/** `field <operator> value`, operator checked against the whitelist. */
export function compare(field: Field, operator: string, value: unknown): WhereCondition {
  return { field: checkField(field), operator: validateOperator(operator), value }
}

// ── Type guards ────────────────────────────────────────────────

export function isSqlExpression(value: unknown): value is SqlExpression {
  return typeof value === 'object' && value !== null && 'toSql' in value && typeof value.toSql === 'function'
}

export function isField(value: unknown): value is Field {
  return typeof value === 'string' || isSqlExpression(value)
}

export function isWhereCondition(value: unknown): value is WhereCondition {
  return (
    typeof value === 'object' &&
    value !== null &&
    'field' in value &&
    'operator' in value &&
    'value' in value &&
    isField(value.field) &&
    typeof value.operator === 'string'
  )
}

/** Non-blank string or SQL expression; anything else throws InvalidArgumentError. */
export function checkField(field: Field): Field {
  if (typeof field === 'string' && field.trim().length === 0) {
    throw new InvalidArgumentError('field', 'field must be a non-empty string', field)
  }
  if (!isField(field)) {
    throw new InvalidArgumentError('field', 'field must be a string or SQL expression', field)
  }
  return field
}
