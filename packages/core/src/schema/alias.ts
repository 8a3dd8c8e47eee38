import { InvalidArgumentError } from '@querykit/validation'

/**
 * Derive a short table alias.
 *
 * - `orders` → `or` (single word longer than 3 chars: first two letters)
 * - `id` → `i` (single word of 3 chars or fewer: first letter)
 * - `order_items` → `oi` (one letter per underscore-separated word)
 *
 * No collision handling; see `SchemaRegistry` for that.
 */
export function generateAlias(tableName: string): string {
  if (typeof tableName !== 'string' || tableName.trim().length === 0) {
    throw new InvalidArgumentError('tableName', 'tableName must be a non-empty string', tableName)
  }

  const words = tableName.split('_')

  if (words.length === 1) {
    return (tableName.length > 3 ? tableName.slice(0, 2) : tableName.slice(0, 1)).toLowerCase()
  }

  const alias = words
    .filter((w) => w.length > 0)
    .map((w) => w.charAt(0))
    .join('')
    .toLowerCase()

  if (alias.length === 0) {
    throw new InvalidArgumentError('tableName', 'tableName must contain a word', tableName)
  }
  return alias
}
