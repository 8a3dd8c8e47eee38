import type { ClickHouseClientConfigOptions } from '@clickhouse/client'
import { createClient } from '@clickhouse/client'
import type { Connector, ParameterMap, Row } from '@querykit/core'
import { ConnectionError, ExecutionError } from '@querykit/validation'
import { toTypedQuery } from './params.js'

export interface ClickHouseConnectorConfig {
  readonly url?: string | undefined
  readonly username?: string | undefined
  readonly password?: string | undefined
  readonly database?: string | undefined
  readonly timeoutMs?: number | undefined
}

export function createClickHouseConnector(config: ClickHouseConnectorConfig): Connector {
  const options: ClickHouseClientConfigOptions = {}
  if (config.url !== undefined) options.url = config.url
  if (config.username !== undefined) options.username = config.username
  if (config.password !== undefined) options.password = config.password
  if (config.database !== undefined) options.database = config.database
  if (config.timeoutMs !== undefined) {
    options.clickhouse_settings = { max_execution_time: Math.ceil(config.timeoutMs / 1000) }
  }

  const client = createClient(options)

  return {
    async executeQuery(sql: string, params: ParameterMap): Promise<Row[]> {
      try {
        const { query, queryParams } = toTypedQuery(sql, params)
        const result = await client.query({
          query,
          query_params: queryParams,
          format: 'JSONEachRow',
        })
        return await result.json<Row>()
      } catch (err) {
        const cause = err instanceof Error ? err : new Error(String(err))
        throw new ExecutionError({ connector: 'clickhouse', sql, params: { ...params } }, cause)
      }
    },

    async ping(): Promise<void> {
      const failed = (cause?: Error | undefined): ConnectionError =>
        new ConnectionError('ClickHouse ping failed', { connector: 'clickhouse', url: config.url }, cause)

      let result: Awaited<ReturnType<typeof client.ping>>
      try {
        result = await client.ping()
      } catch (err) {
        throw failed(err instanceof Error ? err : undefined)
      }
      if (!result.success) {
        throw failed()
      }
    },

    async close(): Promise<void> {
      await client.close()
    },
  }
}

export { clickHouseType, toTypedQuery } from './params.js'
export type { TypedQuery } from './params.js'
