import { ConfigurationError } from '@querykit/validation'
import { QueryBuilder } from './builder/queryBuilder.js'
import type { DebugSink } from './debug/logger.js'
import type { UnresolvedJoinPolicy } from './generator/generator.js'
import { SchemaRegistry } from './metadata/registry.js'
import type { Connector } from './types/interfaces.js'
import type { MetadataProvider } from './types/providers.js'

// ── Public Types ───────────────────────────────────────────────

export interface CreateQueryKitOptions {
  readonly metadataProvider?: MetadataProvider | undefined
  readonly connector?: Connector | undefined
  readonly unresolvedJoins?: UnresolvedJoinPolicy | undefined
  readonly debug?: DebugSink | undefined
  /** Ping the connector before returning (default: true). */
  readonly validateConnection?: boolean | undefined
}

export interface QueryKit {
  readonly registry: SchemaRegistry
  /** A fresh builder bound to this kit's registry and connector. */
  query(): QueryBuilder
  reloadMetadata(): Promise<void>
  close(): Promise<void>
}

// ── createQueryKit ─────────────────────────────────────────────

export async function createQueryKit(options: CreateQueryKitOptions = {}): Promise<QueryKit> {
  const { metadataProvider, connector, unresolvedJoins, debug } = options

  // 1. Load + register metadata (empty registry without a provider)
  const registry =
    metadataProvider !== undefined
      ? await SchemaRegistry.create(metadataProvider, { debug })
      : new SchemaRegistry(undefined, { debug })

  // 2. Ping the connector
  if (options.validateConnection !== false && connector?.ping !== undefined) {
    await connector.ping()
  }

  let closed = false

  return {
    registry,

    query() {
      if (closed) {
        throw new ConfigurationError('CLOSED')
      }
      return new QueryBuilder({ registry, connector, unresolvedJoins, debug })
    },

    async reloadMetadata() {
      if (metadataProvider === undefined) {
        throw new ConfigurationError('PROVIDER_MISSING')
      }
      await registry.reload(metadataProvider)
    },

    async close() {
      if (closed) return
      closed = true
      await connector?.close?.()
    },
  }
}
