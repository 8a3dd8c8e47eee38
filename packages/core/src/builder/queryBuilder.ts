import type { JoinKind, OrderDirection } from '@querykit/validation'
import {
  ConfigurationError,
  InvalidArgumentError,
  validateCount,
  validateDirection,
  validateJoinKind,
} from '@querykit/validation'
import type { DebugSink } from '../debug/logger.js'
import { debugEntry } from '../debug/logger.js'
import type { SqlGeneratorOptions } from '../generator/generator.js'
import { SqlGenerator } from '../generator/generator.js'
import { parseTableRef } from '../resolution/tableRef.js'
import type { Connector, Row } from '../types/interfaces.js'
import type { CompiledQuery, Field, QueryAst, TableRef, WhereCondition } from '../types/ir.js'
import { checkField, compare, equals, isField, isWhereCondition } from './conditions.js'

// ── Public Types ───────────────────────────────────────────────

export type JoinKindInput = JoinKind | Lowercase<JoinKind>
export type OrderDirectionInput = OrderDirection | Lowercase<OrderDirection>

export interface QueryBuilderOptions extends SqlGeneratorOptions {
  readonly connector?: Connector | undefined
}

// ── QueryBuilder ───────────────────────────────────────────────

/**
 * Fluent accumulator for one query.
 *
 * Every mutating call returns the same builder. A builder is a single-session
 * value: do not share one between unrelated queries or mutate it while an
 * `execute()` started from it is still pending.
 *
 * @example
 * new QueryBuilder({ registry })
 *   .select('o.id', 'c.name')
 *   .fromTable('orders AS o')
 *   .join('customers AS c', 'o.customer_id = c.id')
 *   .where('o.status', 'shipped')
 *   .orderBy('o.created_at', 'desc')
 *   .limit(20)
 *   .build()
 */
export class QueryBuilder {
  private readonly ast: QueryAst = { select: [], joins: [], where: [], orderBy: [] }
  private readonly generator: SqlGenerator
  private readonly connector: Connector | undefined
  private readonly debug: DebugSink | undefined

  constructor(options: QueryBuilderOptions = {}) {
    this.generator = new SqlGenerator(options)
    this.connector = options.connector
    this.debug = options.debug
  }

  /** Append fields verbatim; order and duplicates are kept. */
  select(...fields: Field[]): this {
    for (const field of fields) {
      this.ast.select.push(checkField(field))
    }
    return this
  }

  /** Set the FROM table, replacing any earlier one. Accepts `name`, `name AS alias` or a TableRef. */
  fromTable(table: string | TableRef): this {
    this.ast.from = parseTableRef(table)
    return this
  }

  /**
   * Add a join. Without a condition the join is resolved through the
   * SchemaRegistry (FROM table → join table) when the query is built.
   */
  join(table: string | TableRef, condition?: string | undefined, kind: JoinKindInput = 'INNER'): this {
    const ref = parseTableRef(table)
    const joinKind = validateJoinKind(kind)
    const trimmed = condition?.trim()
    this.ast.joins.push(
      trimmed !== undefined && trimmed.length > 0
        ? { kind: joinKind, table: ref, condition: trimmed }
        : { kind: joinKind, table: ref },
    )
    return this
  }

  leftJoin(table: string | TableRef, condition?: string | undefined): this {
    return this.join(table, condition, 'LEFT')
  }

  rightJoin(table: string | TableRef, condition?: string | undefined): this {
    return this.join(table, condition, 'RIGHT')
  }

  fullJoin(table: string | TableRef, condition?: string | undefined): this {
    return this.join(table, condition, 'FULL')
  }

  /** Add a prebuilt condition (see `equals` / `compare`). */
  where(condition: WhereCondition): this
  /** `field = value` */
  where(field: Field, value: unknown): this
  /** `field <operator> value` */
  where(field: Field, operator: string, value: unknown): this
  where(first: Field | WhereCondition, ...rest: [] | [unknown] | [string, unknown]): this {
    if (rest.length === 0) {
      if (!isWhereCondition(first)) {
        throw new InvalidArgumentError('value', 'where() needs a value or a condition', first)
      }
      this.ast.where.push(compare(first.field, first.operator, first.value))
      return this
    }

    if (!isField(first)) {
      throw new InvalidArgumentError('field', 'where() field must be a string or SQL expression', first)
    }
    if (rest.length === 1) {
      this.ast.where.push(equals(first, rest[0]))
    } else {
      this.ast.where.push(compare(first, rest[0], rest[1]))
    }
    return this
  }

  orderBy(field: Field, direction: OrderDirectionInput = 'asc'): this {
    this.ast.orderBy.push({ field: checkField(field), direction: validateDirection(direction) })
    return this
  }

  limit(limit: number): this {
    this.ast.limit = validateCount('limit', limit)
    return this
  }

  offset(offset: number): this {
    this.ast.offset = validateCount('offset', offset)
    return this
  }

  /** Compile the current state. Repeated calls without mutation give identical output. */
  build(): CompiledQuery {
    return this.generator.compile(this.ast)
  }

  /** Copy of the accumulated clauses. */
  toAst(): QueryAst {
    const { from, limit, offset } = this.ast
    return {
      select: [...this.ast.select],
      from: from !== undefined ? { ...from } : undefined,
      joins: this.ast.joins.map((j) => ({ ...j, table: { ...j.table } })),
      where: this.ast.where.map((c) => ({ ...c })),
      orderBy: this.ast.orderBy.map((o) => ({ ...o })),
      limit,
      offset,
    }
  }

  /**
   * Build and run through the connector. Connector errors propagate unchanged.
   */
  async execute(): Promise<Row[]> {
    if (this.connector === undefined) {
      throw new ConfigurationError('CONNECTOR_MISSING')
    }

    const { sql, params } = this.build()
    const t0 = Date.now()
    const rows = await this.connector.executeQuery(sql, params)
    if (this.debug !== undefined) {
      this.debug(debugEntry('execution', `Executed (${rows.length} rows)`, Date.now() - t0))
    }
    return rows
  }
}
