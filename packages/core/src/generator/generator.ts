import { UnresolvedJoinError } from '@querykit/validation'
import type { DebugSink } from '../debug/logger.js'
import { debugEntry } from '../debug/logger.js'
import type { SchemaRegistry } from '../metadata/registry.js'
import type {
  CompiledQuery,
  JoinClause,
  OrderByClause,
  ParameterMap,
  QueryAst,
  TableRef,
  WhereCondition,
} from '../types/ir.js'
import { renderField, renderTable } from './fragments.js'

// ── Options ────────────────────────────────────────────────────

/**
 * What to do with a join that has no condition and no registered join path.
 * - `'error'`: throw UnresolvedJoinError
 * - `'omit'`: emit the join without an ON fragment
 */
export type UnresolvedJoinPolicy = 'error' | 'omit'

export interface SqlGeneratorOptions {
  readonly registry?: SchemaRegistry | undefined
  readonly unresolvedJoins?: UnresolvedJoinPolicy | undefined
  readonly debug?: DebugSink | undefined
}

// ── SqlGenerator ───────────────────────────────────────────────

/**
 * Compiles a QueryAst into SQL text with `:pN` placeholders and a parameter map.
 *
 * Clause order: SELECT, FROM, JOIN…, WHERE, ORDER BY, LIMIT, OFFSET.
 * Holds no per-query state; the same AST and registry snapshot always yield the same output.
 */
export class SqlGenerator {
  private readonly options: SqlGeneratorOptions

  constructor(options: SqlGeneratorOptions = {}) {
    this.options = options
  }

  compile(ast: QueryAst): CompiledQuery {
    const t0 = Date.now()
    const compilation = new Compilation(this.options)
    const sql = compilation.build(ast)
    const params = compilation.params

    if (this.options.debug !== undefined) {
      this.options.debug(
        debugEntry('sql-generation', `Generated (${Object.keys(params).length} params)`, Date.now() - t0, { sql }),
      )
    }
    return { sql, params }
  }
}

export function compileQuery(ast: QueryAst, options: SqlGeneratorOptions = {}): CompiledQuery {
  return new SqlGenerator(options).compile(ast)
}

// ── Internal per-compilation state ─────────────────────────────

class Compilation {
  readonly params: ParameterMap = {}
  private paramCount = 0
  private readonly options: SqlGeneratorOptions

  constructor(options: SqlGeneratorOptions) {
    this.options = options
  }

  build(ast: QueryAst): string {
    const clauses: string[] = []

    clauses.push(ast.select.length > 0 ? `SELECT ${ast.select.map(renderField).join(', ')}` : 'SELECT *')

    if (ast.from !== undefined) {
      clauses.push(`FROM ${renderTable(ast.from)}`)
    }

    for (const j of ast.joins) {
      clauses.push(this.joinClause(j, ast.from))
    }

    if (ast.where.length > 0) {
      clauses.push(`WHERE ${ast.where.map((c) => this.whereCond(c)).join(' AND ')}`)
    }

    if (ast.orderBy.length > 0) {
      clauses.push(`ORDER BY ${ast.orderBy.map((o) => this.orderByClause(o)).join(', ')}`)
    }

    if (ast.limit !== undefined) {
      clauses.push(`LIMIT ${String(ast.limit)}`)
    }

    if (ast.offset !== undefined) {
      clauses.push(`OFFSET ${String(ast.offset)}`)
    }

    return clauses.join(' ')
  }

  // --- JOIN ---

  private joinClause(j: JoinClause, from: TableRef | undefined): string {
    let table = j.table
    let condition = j.condition

    if (condition === undefined) {
      const path = from !== undefined ? this.options.registry?.resolveJoin(from.name, j.table.name) : undefined
      if (path !== undefined) {
        condition = path.condition
        // An explicit alias is never replaced by the path's alias
        if (table.alias === undefined) table = { name: table.name, alias: path.alias }
        this.log(`Resolved ${from?.name ?? ''} → ${j.table.name} via registry`, { condition })
      } else if ((this.options.unresolvedJoins ?? 'error') === 'error') {
        throw new UnresolvedJoinError({ sourceTable: from?.name, targetTable: j.table.name })
      } else {
        this.log(`Unresolved join to ${j.table.name}, emitted without ON`, { sourceTable: from?.name })
      }
    }

    const head = `${j.kind} JOIN ${renderTable(table)}`
    return condition !== undefined ? `${head} ON ${condition}` : head
  }

  // --- WHERE ---

  private whereCond(c: WhereCondition): string {
    return `${renderField(c.field)} ${c.operator} :${this.ref(c.value)}`
  }

  // --- ORDER BY ---

  private orderByClause(o: OrderByClause): string {
    return `${renderField(o.field)} ${o.direction}`
  }

  // --- Param helpers ---

  private ref(value: unknown): string {
    const name = `p${String(this.paramCount)}`
    this.paramCount++
    this.params[name] = value
    return name
  }

  private log(message: string, details: unknown): void {
    if (this.options.debug !== undefined) {
      this.options.debug(debugEntry('join-resolution', message, undefined, details))
    }
  }
}
