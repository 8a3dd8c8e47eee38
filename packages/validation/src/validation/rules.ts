// ── Enum Validation Constants ──────────────────────────────────

export const VALID_DIRECTIONS = new Set(['ASC', 'DESC'])
export const VALID_JOIN_KINDS = new Set(['INNER', 'LEFT', 'RIGHT', 'FULL'])
export const VALID_WHERE_OPS = new Set<string>([
  '=',
  '!=',
  '<>',
  '<',
  '<=',
  '>',
  '>=',
  'LIKE',
  'NOT LIKE',
  'ILIKE',
  'NOT ILIKE',
])

export type OrderDirection = 'ASC' | 'DESC'
export type JoinKind = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL'

/** Upper-case and collapse inner whitespace so `not  like` matches `NOT LIKE`. */
export function normalizeKeyword(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toUpperCase()
}
