import { InvalidArgumentError, validateAlias } from '@querykit/validation'
import type { Field, SqlExpression, TableRef } from '../types/ir.js'

// ── Shared SQL helpers ─────────────────────────────────────────

export function renderField(field: Field): string {
  return typeof field === 'string' ? field : field.toSql()
}

export function renderTable(ref: TableRef): string {
  return ref.alias !== undefined ? `${ref.name} AS ${ref.alias}` : ref.name
}

// ── Expression descriptors ─────────────────────────────────────

/** Caller-trusted SQL text, written verbatim. Never pass user input here. */
export function raw(sql: string): SqlExpression {
  const expr = { toSql: () => sql, toString: () => sql }
  return expr
}

const FUNCTION_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_.]*$/

export class SqlFunction implements SqlExpression {
  readonly name: string
  readonly args: readonly Field[]
  readonly alias: string | undefined

  constructor(name: string, args: readonly Field[], alias?: string | undefined) {
    if (!FUNCTION_NAME_REGEX.test(name)) {
      throw new InvalidArgumentError('name', `Invalid SQL function name: ${name}`, name)
    }
    if (alias !== undefined) {
      const aliasErr = validateAlias(alias)
      if (aliasErr !== null) throw new InvalidArgumentError('alias', aliasErr, alias)
    }
    this.name = name
    this.args = args
    this.alias = alias
  }

  /** Copy with an output alias: `COUNT(*) AS total`. */
  as(alias: string): SqlFunction {
    return new SqlFunction(this.name, this.args, alias)
  }

  toSql(): string {
    const call = `${this.name.toUpperCase()}(${this.args.map(renderField).join(', ')})`
    return this.alias !== undefined ? `${call} AS ${this.alias}` : call
  }

  toString(): string {
    return this.toSql()
  }
}

/** `fn('count', '*').as('total')` → `COUNT(*) AS total` */
export function fn(name: string, ...args: Field[]): SqlFunction {
  return new SqlFunction(name, args)
}
