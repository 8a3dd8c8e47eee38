import type { JoinKind, OrderDirection } from '@querykit/validation'

// --- Fields ---

/**
 * Opaque expression supplied by the caller (function call, arithmetic, ...).
 * The generator writes `toSql()` verbatim and never interprets it.
 */
export interface SqlExpression {
  toSql(): string
}

export type Field = string | SqlExpression

// --- Table Reference ---

/** An absent alias renders unaliased unless a join path supplies one. */
export interface TableRef {
  name: string
  alias?: string | undefined
}

// --- WHERE ---

export interface WhereCondition {
  field: Field
  operator: string
  value: unknown
}

// --- JOIN ---

/** A missing condition is resolved through the SchemaRegistry at build time. */
export interface JoinClause {
  kind: JoinKind
  table: TableRef
  condition?: string | undefined
}

// --- ORDER BY ---

export interface OrderByClause {
  field: Field
  direction: OrderDirection
}

// --- QueryAst (accumulated builder state) ---

export interface QueryAst {
  select: Field[]
  from?: TableRef | undefined
  joins: JoinClause[]
  where: WhereCondition[]
  orderBy: OrderByClause[]
  limit?: number | undefined
  offset?: number | undefined
}

// --- Compilation output ---

/** Placeholder name (`p0`, `p1`, ...) → original, uncoerced value, in visit order. */
export type ParameterMap = Record<string, unknown>

export interface CompiledQuery {
  sql: string
  params: ParameterMap
}
