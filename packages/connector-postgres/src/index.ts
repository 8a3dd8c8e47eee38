import type { Connector, ParameterMap, Row } from '@querykit/core'
import { rewritePlaceholders } from '@querykit/core'
import { ConnectionError, ExecutionError } from '@querykit/validation'
import type { PoolConfig } from 'pg'
import pg from 'pg'

// Parse NUMERIC/DECIMAL and INT8 as JavaScript numbers instead of strings
pg.types.setTypeParser(1700, parseFloat) // numeric / decimal
pg.types.setTypeParser(20, Number) // int8 / bigint

export interface PostgresConnectorConfig {
  readonly connectionString?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly database?: string | undefined
  readonly user?: string | undefined
  readonly password?: string | undefined
  readonly ssl?: PoolConfig['ssl']
  readonly max?: number | undefined
  readonly timeoutMs?: number | undefined
}

export interface PositionalQuery {
  text: string
  values: unknown[]
}

/**
 * Rewrite `:name` placeholders to `$1..$n`, numbered by first appearance.
 * A repeated name reuses its position. Names missing from `params` throw.
 */
export function toPositional(sql: string, params: ParameterMap): PositionalQuery {
  const positions = new Map<string, number>()
  const values: unknown[] = []

  const text = rewritePlaceholders(sql, (name) => {
    let position = positions.get(name)
    if (position === undefined) {
      if (!Object.hasOwn(params, name)) {
        throw new Error(`No value bound for placeholder :${name}`)
      }
      values.push(params[name])
      position = values.length
      positions.set(name, position)
    }
    return `$${String(position)}`
  })

  return { text, values }
}

export function createPostgresConnector(config: PostgresConnectorConfig): Connector {
  const pool = new pg.Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    max: config.max,
    statement_timeout: config.timeoutMs,
  })

  return {
    async executeQuery(sql: string, params: ParameterMap): Promise<Row[]> {
      try {
        const { text, values } = toPositional(sql, params)
        const result = await pool.query<Row>(text, values)
        return result.rows
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new ExecutionError({ connector: 'postgres', sql, params: { ...params } }, cause)
      }
    },

    async ping(): Promise<void> {
      try {
        await pool.query('SELECT 1')
      } catch (err) {
        throw new ConnectionError(
          'PostgreSQL ping failed',
          { connector: 'postgres', url: config.connectionString },
          err instanceof Error ? err : undefined,
        )
      }
    },

    async close(): Promise<void> {
      await pool.end()
    },
  }
}

export type { Connector } from '@querykit/core'
