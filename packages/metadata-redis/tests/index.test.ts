import { MetadataError } from '@querykit/validation'
import { afterEach, describe, expect, it, vi } from 'vitest'

// ── Mock ioredis ───────────────────────────────────────────────

const mockGet = vi.fn()
const mockPing = vi.fn()
const mockQuit = vi.fn()
const mockRedis = vi.fn(function () {
  return { get: mockGet, ping: mockPing, quit: mockQuit }
})

vi.mock('ioredis', () => ({
  Redis: mockRedis,
}))

// ── Tests ──────────────────────────────────────────────────────

describe('metadata-redis', () => {
  afterEach(() => {
    vi.clearAllMocks()
  })

  it('connects by URL when given', async () => {
    const { createRedisMetadataProvider } = await import('../src/index.js')
    createRedisMetadataProvider({ url: 'redis://localhost:6379/2' })
    expect(mockRedis).toHaveBeenCalledWith('redis://localhost:6379/2')
  })

  it('connects with defaults and only the configured options', async () => {
    const { createRedisMetadataProvider } = await import('../src/index.js')
    createRedisMetadataProvider({ password: 'test-secret', db: 1 })
    expect(mockRedis).toHaveBeenCalledWith({ host: 'localhost', port: 6379, password: 'test-secret', db: 1 })
  })

  it('loads and validates the document under the default key', async () => {
    const { createRedisMetadataProvider } = await import('../src/index.js')
    const provider = createRedisMetadataProvider({})
    mockGet.mockResolvedValue(JSON.stringify({ tables: { customers: { alias: 'c' } } }))

    await expect(provider.load()).resolves.toEqual({ tables: { customers: { alias: 'c' } } })
    expect(mockGet).toHaveBeenCalledWith('querykit:metadata')
  })

  it('reads a custom key', async () => {
    const { createRedisMetadataProvider } = await import('../src/index.js')
    const provider = createRedisMetadataProvider({ key: 'tenant-a:schema' })
    mockGet.mockResolvedValue('{}')

    await expect(provider.load()).resolves.toEqual({})
    expect(mockGet).toHaveBeenCalledWith('tenant-a:schema')
  })

  it('missing key throws MetadataError', async () => {
    const { createRedisMetadataProvider } = await import('../src/index.js')
    const provider = createRedisMetadataProvider({})
    mockGet.mockResolvedValue(null)

    try {
      await provider.load()
      expect.fail('Expected MetadataError')
    } catch (err) {
      expect(err).toBeInstanceOf(MetadataError)
      const e = err as MetadataError
      expect(e.errors).toEqual([
        {
          code: 'INVALID_DOCUMENT',
          message: "Metadata key 'querykit:metadata' not found",
          details: { entity: 'querykit:metadata' },
        },
      ])
    }
  })

  it('invalid JSON throws MetadataError', async () => {
    const { createRedisMetadataProvider } = await import('../src/index.js')
    const provider = createRedisMetadataProvider({})
    mockGet.mockResolvedValue('{not json')

    await expect(provider.load()).rejects.toThrow(MetadataError)
    await expect(provider.load()).rejects.toMatchObject({
      errors: [{ message: "Metadata key 'querykit:metadata' does not hold valid JSON" }],
    })
  })

  it('invalid document throws MetadataError from validation', async () => {
    const { createRedisMetadataProvider } = await import('../src/index.js')
    const provider = createRedisMetadataProvider({})
    mockGet.mockResolvedValue(JSON.stringify({ tables: [] }))

    await expect(provider.load()).rejects.toBeInstanceOf(MetadataError)
  })

  it('ping and close delegate to the client', async () => {
    const { createRedisMetadataProvider } = await import('../src/index.js')
    const provider = createRedisMetadataProvider({})
    mockPing.mockResolvedValue('PONG')
    mockQuit.mockResolvedValue('OK')

    await provider.ping()
    await provider.close()
    expect(mockPing).toHaveBeenCalledTimes(1)
    expect(mockQuit).toHaveBeenCalledTimes(1)
  })
})
