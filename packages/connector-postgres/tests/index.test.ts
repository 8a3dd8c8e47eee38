import { ConnectionError, ExecutionError } from '@querykit/validation'
import { afterEach, describe, expect, it, vi } from 'vitest'

// ── Mock pg ────────────────────────────────────────────────────

const mockQuery = vi.fn()
const mockEnd = vi.fn()
const mockPool = vi.fn(function () {
  return { query: mockQuery, end: mockEnd }
})
const mockSetTypeParser = vi.fn()

vi.mock('pg', () => ({
  default: {
    Pool: mockPool,
    types: { setTypeParser: mockSetTypeParser },
  },
}))

// ── Tests ──────────────────────────────────────────────────────

describe('toPositional', () => {
  it('numbers placeholders by first appearance', async () => {
    const { toPositional } = await import('../src/index.js')
    expect(toPositional('SELECT * FROM t WHERE a = :p0 AND b = :p1', { p0: 'x', p1: 2 })).toEqual({
      text: 'SELECT * FROM t WHERE a = $1 AND b = $2',
      values: ['x', 2],
    })
  })

  it('reuses the position of a repeated name', async () => {
    const { toPositional } = await import('../src/index.js')
    expect(toPositional('SELECT :p1 WHERE a = :p0 OR b = :p1', { p0: 'a', p1: 'b' })).toEqual({
      text: 'SELECT $1 WHERE a = $2 OR b = $1',
      values: ['b', 'a'],
    })
  })

  it('leaves literals and casts alone', async () => {
    const { toPositional } = await import('../src/index.js')
    expect(toPositional("SELECT ':p0', id::text FROM t WHERE a = :p0", { p0: 1 })).toEqual({
      text: "SELECT ':p0', id::text FROM t WHERE a = $1",
      values: [1],
    })
  })

  it('throws on an unbound placeholder', async () => {
    const { toPositional } = await import('../src/index.js')
    expect(() => toPositional('SELECT :p3', {})).toThrow('No value bound for placeholder :p3')
  })
})

describe('connector-postgres', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  it('passes config to the pool', async () => {
    const { createPostgresConnector } = await import('../src/index.js')
    createPostgresConnector({ host: 'localhost', database: 'app', password: 'test-secret', timeoutMs: 5000 })
    expect(mockPool).toHaveBeenCalledWith(
      expect.objectContaining({ host: 'localhost', database: 'app', password: 'test-secret', statement_timeout: 5000 }),
    )
  })

  it('executes with positional values and returns rows', async () => {
    const { createPostgresConnector } = await import('../src/index.js')
    const connector = createPostgresConnector({})
    mockQuery.mockResolvedValue({ rows: [{ id: 1 }], rowCount: 1 })

    const rows = await connector.executeQuery('SELECT id FROM users WHERE status = :p0', { p0: 'active' })

    expect(rows).toEqual([{ id: 1 }])
    expect(mockQuery).toHaveBeenCalledWith('SELECT id FROM users WHERE status = $1', ['active'])
  })

  it('execute error throws ExecutionError', async () => {
    const { createPostgresConnector } = await import('../src/index.js')
    const connector = createPostgresConnector({})
    const driverError = new Error('relation "__bad__" does not exist')
    mockQuery.mockRejectedValue(driverError)

    try {
      await connector.executeQuery('SELECT * FROM __bad__ WHERE id = :p0', { p0: 1 })
      expect.fail('Expected ExecutionError')
    } catch (err) {
      expect(err).toBeInstanceOf(ExecutionError)
      const e = err as ExecutionError
      expect(e.code).toBe('QUERY_FAILED')
      expect(e.message).toBe('Query failed on postgres connector')
      expect(e.details).toEqual({
        connector: 'postgres',
        sql: 'SELECT * FROM __bad__ WHERE id = :p0',
        params: { p0: 1 },
      })
      expect(e.cause).toBe(driverError)
    }
  })

  it('unbound placeholder throws ExecutionError without querying', async () => {
    const { createPostgresConnector } = await import('../src/index.js')
    const connector = createPostgresConnector({})

    await expect(connector.executeQuery('SELECT :p0', {})).rejects.toBeInstanceOf(ExecutionError)
    expect(mockQuery).not.toHaveBeenCalled()
  })

  it('ping failure throws ConnectionError', async () => {
    const { createPostgresConnector } = await import('../src/index.js')
    const connector = createPostgresConnector({ connectionString: 'postgres://localhost:5432/app' })
    mockQuery.mockRejectedValue(new Error('ECONNREFUSED'))

    try {
      await connector.ping?.()
      expect.fail('Expected ConnectionError')
    } catch (err) {
      expect(err).toBeInstanceOf(ConnectionError)
      const e = err as ConnectionError
      expect(e.code).toBe('CONNECTION_FAILED')
      expect(e.message).toBe('PostgreSQL ping failed')
      expect(e.details).toEqual({ connector: 'postgres', url: 'postgres://localhost:5432/app' })
    }
  })

  it('ping success runs SELECT 1', async () => {
    const { createPostgresConnector } = await import('../src/index.js')
    const connector = createPostgresConnector({})
    mockQuery.mockResolvedValue({ rows: [], rowCount: 1 })

    await expect(connector.ping?.()).resolves.toBeUndefined()
    expect(mockQuery).toHaveBeenCalledWith('SELECT 1')
  })

  it('close ends the pool', async () => {
    const { createPostgresConnector } = await import('../src/index.js')
    const connector = createPostgresConnector({})
    mockEnd.mockResolvedValue(undefined)

    await connector.close?.()
    expect(mockEnd).toHaveBeenCalledTimes(1)
  })
})
