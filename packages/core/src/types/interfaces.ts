import type { ParameterMap } from './ir.js'

export type Row = Record<string, unknown>

// --- Connector (implemented by connector packages) ---

/**
 * Query execution contract.
 *
 * Error contract:
 * - `executeQuery()` should throw `ExecutionError` (code: `'QUERY_FAILED'`) on any failure.
 * - `ping()` should throw `ConnectionError` (code: `'CONNECTION_FAILED'`) on any failure.
 *
 * Parameters arrive as the named map produced by the generator (`:p0`, `:p1`, ...)
 * and must be bound through the driver's own parameter mechanism.
 */
export interface Connector {
  executeQuery(sql: string, params: ParameterMap): Promise<Row[]>
  ping?(): Promise<void>
  close?(): Promise<void>
}
