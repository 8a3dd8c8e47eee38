import { ConnectionError, ExecutionError } from '@querykit/validation'
import { afterEach, describe, expect, it, vi } from 'vitest'

// ── Mock @clickhouse/client ────────────────────────────────────

const mockPing = vi.fn()
const mockQuery = vi.fn()
const mockClose = vi.fn()
const mockCreateClient = vi.fn(() => ({
  query: mockQuery,
  ping: mockPing,
  close: mockClose,
}))

vi.mock('@clickhouse/client', () => ({
  createClient: mockCreateClient,
}))

// ── Tests ──────────────────────────────────────────────────────

describe('connector-clickhouse', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  it('passes only the configured options to the client', async () => {
    const { createClickHouseConnector } = await import('../src/index.js')
    createClickHouseConnector({ url: 'http://localhost:8123', password: 'test-secret', timeoutMs: 2500 })

    expect(mockCreateClient).toHaveBeenCalledWith({
      url: 'http://localhost:8123',
      password: 'test-secret',
      clickhouse_settings: { max_execution_time: 3 },
    })
  })

  it('executes with typed query params', async () => {
    const { createClickHouseConnector } = await import('../src/index.js')
    const connector = createClickHouseConnector({})
    mockQuery.mockResolvedValue({ json: () => Promise.resolve([{ n: '2' }]) })

    const rows = await connector.executeQuery('SELECT count() AS n FROM events WHERE kind = :p0', { p0: 'click' })

    expect(rows).toEqual([{ n: '2' }])
    expect(mockQuery).toHaveBeenCalledWith({
      query: 'SELECT count() AS n FROM events WHERE kind = {p0:String}',
      query_params: { p0: 'click' },
      format: 'JSONEachRow',
    })
  })

  it('execute error throws ExecutionError', async () => {
    const { createClickHouseConnector } = await import('../src/index.js')
    const connector = createClickHouseConnector({})
    mockQuery.mockRejectedValue(new Error('Table __bad__ does not exist'))

    try {
      await connector.executeQuery('SELECT * FROM __bad__', {})
      expect.fail('Expected ExecutionError')
    } catch (err) {
      expect(err).toBeInstanceOf(ExecutionError)
      const e = err as ExecutionError
      expect(e.code).toBe('QUERY_FAILED')
      expect(e.message).toBe('Query failed on clickhouse connector')
    }
  })

  it('unsupported parameter type throws ExecutionError without querying', async () => {
    const { createClickHouseConnector } = await import('../src/index.js')
    const connector = createClickHouseConnector({})

    try {
      await connector.executeQuery('SELECT * FROM t WHERE a = :p0', { p0: { nested: true } })
      expect.fail('Expected ExecutionError')
    } catch (err) {
      expect(err).toBeInstanceOf(ExecutionError)
      expect((err as ExecutionError).cause).toBeInstanceOf(TypeError)
    }
    expect(mockQuery).not.toHaveBeenCalled()
  })

  it('ping failure throws ConnectionError', async () => {
    const { createClickHouseConnector } = await import('../src/index.js')
    const connector = createClickHouseConnector({ url: 'http://localhost:8123' })
    mockPing.mockResolvedValue({ success: false })

    try {
      await connector.ping?.()
      expect.fail('Expected ConnectionError')
    } catch (err) {
      expect(err).toBeInstanceOf(ConnectionError)
      const e = err as ConnectionError
      expect(e.code).toBe('CONNECTION_FAILED')
      expect(e.message).toBe('ClickHouse ping failed')
      expect(e.details).toEqual({ connector: 'clickhouse', url: 'http://localhost:8123' })
    }
  })

  it('ping success does not throw', async () => {
    const { createClickHouseConnector } = await import('../src/index.js')
    const connector = createClickHouseConnector({})
    mockPing.mockResolvedValue({ success: true })

    await expect(connector.ping?.()).resolves.toBeUndefined()
  })

  it('ping network error throws ConnectionError with the cause', async () => {
    const { createClickHouseConnector } = await import('../src/index.js')
    const connector = createClickHouseConnector({})
    const networkError = new Error('ECONNREFUSED')
    mockPing.mockRejectedValue(networkError)

    try {
      await connector.ping?.()
      expect.fail('Expected ConnectionError')
    } catch (err) {
      expect(err).toBeInstanceOf(ConnectionError)
      expect((err as ConnectionError).cause).toBe(networkError)
    }
  })

  it('close closes the client', async () => {
    const { createClickHouseConnector } = await import('../src/index.js')
    const connector = createClickHouseConnector({})
    mockClose.mockResolvedValue(undefined)

    await connector.close?.()
    expect(mockClose).toHaveBeenCalledTimes(1)
  })
})
