import { InvalidArgumentError, validateAlias, validateTableName } from '@querykit/validation'
import type { TableRef } from '../types/ir.js'

/**
 * Normalize a table argument into a TableRef.
 *
 * Strings are tokenized on whitespace and split at the first standalone `AS`
 * keyword, in any letter case: `orders as o`, `orders AS o` → `{ name: 'orders', alias: 'o' }`.
 * `AS` inside an identifier (`class_assignments`) is never a separator.
 * The alias must be a plain identifier.
 */
export function parseTableRef(table: string | TableRef, argument = 'table'): TableRef {
  if (typeof table !== 'string') {
    const name = validateTableName(argument, table.name)
    if (table.alias === undefined) return { name }
    return { name, alias: checkAlias(`${argument}.alias`, validateTableName(`${argument}.alias`, table.alias)) }
  }

  const name = validateTableName(argument, table)
  const tokens = name.split(/\s+/)
  const last = tokens[tokens.length - 1]
  if (tokens.length > 1 && last !== undefined && isAs(last)) {
    throw new InvalidArgumentError(argument, `${argument} has AS without an alias`, table)
  }

  const asIndex = tokens.findIndex((t, i) => i > 0 && isAs(t))
  if (asIndex === -1) {
    return { name }
  }
  return {
    name: tokens.slice(0, asIndex).join(' '),
    alias: checkAlias(`${argument}.alias`, tokens.slice(asIndex + 1).join(' ')),
  }
}

/** Aliases are written into the SQL text, so they must be plain identifiers. */
function checkAlias(argument: string, alias: string): string {
  const err = validateAlias(alias)
  if (err !== null) {
    throw new InvalidArgumentError(argument, `${argument}: ${err}`, alias)
  }
  return alias
}

function isAs(token: string): boolean {
  return token.toLowerCase() === 'as'
}
