import type { MetadataProvider } from '@querykit/core'
import type { MetadataDocument } from '@querykit/validation'
import { assertMetadata, MetadataError } from '@querykit/validation'
import type { RedisOptions } from 'ioredis'
import { Redis } from 'ioredis'

export const DEFAULT_METADATA_KEY = 'querykit:metadata'

export interface RedisMetadataConfig {
  readonly url?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly password?: string | undefined
  readonly db?: number | undefined
  readonly keyPrefix?: string | undefined
  /** Key holding the JSON metadata document (default: `querykit:metadata`). */
  readonly key?: string | undefined
}

export interface RedisMetadataProvider extends MetadataProvider {
  ping(): Promise<void>
  close(): Promise<void>
}

/**
 * Loads the metadata document stored as JSON under a single Redis key.
 * A missing key or a value that is not valid JSON throws MetadataError.
 */
export function createRedisMetadataProvider(config: RedisMetadataConfig): RedisMetadataProvider {
  const key = config.key ?? DEFAULT_METADATA_KEY
  const redis = config.url !== undefined ? new Redis(config.url) : new Redis(redisOptions(config))

  return {
    async load(): Promise<MetadataDocument> {
      const raw = await redis.get(key)
      if (raw === null) {
        throw documentError(key, `Metadata key '${key}' not found`)
      }

      let doc: unknown
      try {
        doc = JSON.parse(raw)
      } catch {
        throw documentError(key, `Metadata key '${key}' does not hold valid JSON`)
      }

      assertMetadata(doc)
      return doc
    },

    async ping(): Promise<void> {
      await redis.ping()
    },

    async close(): Promise<void> {
      await redis.quit()
    },
  }
}

function redisOptions(config: RedisMetadataConfig): RedisOptions {
  const options: RedisOptions = {
    host: config.host ?? 'localhost',
    port: config.port ?? 6379,
  }
  if (config.password !== undefined) options.password = config.password
  if (config.db !== undefined) options.db = config.db
  if (config.keyPrefix !== undefined) options.keyPrefix = config.keyPrefix
  return options
}

function documentError(key: string, message: string): MetadataError {
  return new MetadataError([{ code: 'INVALID_DOCUMENT', message, details: { entity: key } }])
}
