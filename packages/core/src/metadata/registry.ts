import type {
  ColumnDeclaration,
  ColumnMeta,
  JoinPath,
  JoinPathDeclaration,
  MetadataDocument,
  Relationship,
  RelationshipDeclaration,
  TableMeta,
} from '@querykit/validation'
import { MetadataError, ProviderError, validateMetadata } from '@querykit/validation'
import type { DebugSink } from '../debug/logger.js'
import { debugEntry } from '../debug/logger.js'
import { generateAlias } from '../schema/alias.js'
import type { MetadataProvider } from '../types/providers.js'

/**
 * Snapshot of registered metadata and its derived indexes.
 * Never mutated after construction; `registerSchema` swaps in a new one.
 */
export interface SchemaSnapshot {
  readonly metadata: MetadataDocument
  readonly tables: ReadonlyMap<string, TableMeta>
  readonly columns: ReadonlyMap<string, readonly ColumnMeta[]>
  readonly relationships: ReadonlyMap<string, RelationshipDeclaration>
  /** table name → alias (declared, or generated with collision suffixes) */
  readonly aliases: ReadonlyMap<string, string>
  /** sourceTable → targetTable → JoinPath */
  readonly joinPaths: ReadonlyMap<string, ReadonlyMap<string, JoinPath>>
  /** Relationship ids left out of join-path derivation because a field is missing. */
  readonly skippedRelationships: readonly string[]
  /** Column entries without a name, as `table#index`. */
  readonly skippedColumns: readonly string[]
  /** Precomputed paths without a condition, as `source->target`. */
  readonly skippedJoinPaths: readonly string[]
  /** True when join paths came precomputed with the document. */
  readonly precomputed: boolean
}

export interface SchemaRegistryOptions {
  readonly debug?: DebugSink | undefined
}

/**
 * In-memory schema metadata with a one-hop join-path index.
 *
 * - `registerSchema` is a full replace, never incremental
 * - Atomic swap: readers holding a snapshot keep seeing it
 * - Failed registrations preserve the previous snapshot
 * - Two relationships for the same ordered table pair: the later one wins
 *
 * Registration is synchronous, so it cannot interleave with lookups on the same thread.
 */
export class SchemaRegistry {
  private snapshot: SchemaSnapshot
  private readonly debug: DebugSink | undefined

  constructor(metadata?: MetadataDocument | undefined, options: SchemaRegistryOptions = {}) {
    this.debug = options.debug
    this.snapshot = SchemaRegistry.buildSnapshot({})
    if (metadata !== undefined) {
      this.registerSchema(metadata)
    }
  }

  /**
   * Create a registry by loading from a provider.
   * Throws ProviderError if loading fails, MetadataError if the document is invalid.
   */
  static async create(provider: MetadataProvider, options: SchemaRegistryOptions = {}): Promise<SchemaRegistry> {
    const metadata = await SchemaRegistry.loadMetadata(provider)
    return new SchemaRegistry(metadata, options)
  }

  getSnapshot(): SchemaSnapshot {
    return this.snapshot
  }

  /**
   * Replace all tables, columns and relationships and rebuild the alias map
   * and join-path index. A precomputed `joinPaths` index is trusted as-is.
   */
  registerSchema(metadata: MetadataDocument): void {
    const t0 = Date.now()
    const err = validateMetadata(metadata)
    if (err !== null) {
      throw err
    }

    const next = SchemaRegistry.buildSnapshot(metadata)
    this.snapshot = next

    if (this.debug !== undefined) {
      const pathCount = [...next.joinPaths.values()].reduce((n, targets) => n + targets.size, 0)
      this.debug(
        debugEntry(
          'metadata',
          `Registered ${next.tables.size} tables, ${pathCount} join paths${next.precomputed ? ' (precomputed)' : ''}`,
          Date.now() - t0,
          skippedDetails(next),
        ),
      )
    }
  }

  /**
   * Re-load metadata from a provider.
   * On failure the old snapshot is kept and the error is thrown.
   */
  async reload(provider: MetadataProvider): Promise<void> {
    const metadata = await SchemaRegistry.loadMetadata(provider)
    this.registerSchema(metadata)
  }

  /** One-hop lookup. `undefined` means the caller must supply a condition. */
  resolveJoin(sourceTable: string, targetTable: string): JoinPath | undefined {
    return this.snapshot.joinPaths.get(sourceTable)?.get(targetTable)
  }

  /** Registered alias for a table, or a generated one for tables the registry does not know. */
  aliasFor(table: string): string {
    return this.snapshot.aliases.get(table) ?? generateAlias(table)
  }

  getTable(name: string): TableMeta | undefined {
    return this.snapshot.tables.get(name)
  }

  getColumns(table: string): readonly ColumnMeta[] | undefined {
    return this.snapshot.columns.get(table)
  }

  /** Complete relationships, keyed by id. */
  getRelationships(): ReadonlyMap<string, Relationship> {
    const complete = new Map<string, Relationship>()
    for (const [id, rel] of this.snapshot.relationships) {
      if (isComplete(rel)) complete.set(id, rel)
    }
    return complete
  }

  // --- Internal helpers ---

  private static async loadMetadata(provider: MetadataProvider): Promise<MetadataDocument> {
    try {
      return await provider.load()
    } catch (err) {
      if (err instanceof MetadataError) throw err
      throw new ProviderError(
        `Metadata provider failed to load: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err : undefined,
      )
    }
  }

  private static buildSnapshot(metadata: MetadataDocument): SchemaSnapshot {
    const tables = new Map(Object.entries<TableMeta>(metadata.tables ?? {}))
    const { columns, skippedColumns } = buildColumns(metadata.columns ?? {})
    const relationships = new Map(Object.entries<RelationshipDeclaration>(metadata.relationships ?? {}))
    const aliases = buildAliasMap(tables)
    const base = { metadata, tables, columns, relationships, aliases, skippedColumns }

    if (metadata.joinPaths !== undefined) {
      const joinPaths = new Map<string, Map<string, JoinPath>>()
      const skippedJoinPaths: string[] = []
      for (const [source, targets] of Object.entries(metadata.joinPaths)) {
        for (const [target, declared] of Object.entries<JoinPathDeclaration>(targets)) {
          const path = completeJoinPath(target, declared)
          if (path === undefined) {
            skippedJoinPaths.push(`${source}->${target}`)
            continue
          }
          setPath(joinPaths, source, target, path)
        }
      }
      return { ...base, joinPaths, skippedRelationships: [], skippedJoinPaths, precomputed: true }
    }

    const joinPaths = new Map<string, Map<string, JoinPath>>()
    const skippedRelationships: string[] = []
    for (const [id, rel] of relationships) {
      if (!isComplete(rel)) {
        skippedRelationships.push(id)
        continue
      }
      const targetAlias = aliases.get(rel.targetTable) ?? generateAlias(rel.targetTable)
      setPath(joinPaths, rel.sourceTable, rel.targetTable, {
        table: rel.targetTable,
        alias: targetAlias,
        condition: `${rel.sourceTable}.${rel.sourceColumn} = ${targetAlias}.${rel.targetColumn}`,
      })
    }

    return { ...base, joinPaths, skippedRelationships, skippedJoinPaths: [], precomputed: false }
  }
}

function setPath(index: Map<string, Map<string, JoinPath>>, source: string, target: string, path: JoinPath): void {
  const existing = index.get(source)
  if (existing !== undefined) {
    existing.set(target, path)
  } else {
    index.set(source, new Map([[target, path]]))
  }
}

function buildColumns(declared: Readonly<Record<string, readonly ColumnDeclaration[]>>): {
  columns: Map<string, readonly ColumnMeta[]>
  skippedColumns: string[]
} {
  const columns = new Map<string, readonly ColumnMeta[]>()
  const skippedColumns: string[] = []
  for (const [table, list] of Object.entries(declared)) {
    const kept: ColumnMeta[] = []
    list.forEach((col, i) => {
      if (isNonEmpty(col.name)) {
        kept.push({ ...col, name: col.name })
      } else {
        skippedColumns.push(`${table}#${String(i)}`)
      }
    })
    columns.set(table, kept)
  }
  return { columns, skippedColumns }
}

/** Precomputed paths are used verbatim; only a missing condition makes one unusable. */
function completeJoinPath(target: string, declared: JoinPathDeclaration): JoinPath | undefined {
  if (!isNonEmpty(declared.condition)) return undefined
  const table = isNonEmpty(declared.table) ? declared.table : target
  return isNonEmpty(declared.alias)
    ? { table, alias: declared.alias, condition: declared.condition }
    : { table, condition: declared.condition }
}

function skippedDetails(snapshot: SchemaSnapshot): Record<string, readonly string[]> | undefined {
  const details: Record<string, readonly string[]> = {}
  if (snapshot.skippedRelationships.length > 0) details.skippedRelationships = snapshot.skippedRelationships
  if (snapshot.skippedColumns.length > 0) details.skippedColumns = snapshot.skippedColumns
  if (snapshot.skippedJoinPaths.length > 0) details.skippedJoinPaths = snapshot.skippedJoinPaths
  return Object.keys(details).length > 0 ? details : undefined
}

/**
 * Declared aliases are kept as-is. Generated aliases that collide with one
 * already taken get a numeric suffix: `or`, `or2`, `or3`, ...
 */
function buildAliasMap(tables: ReadonlyMap<string, TableMeta>): Map<string, string> {
  const aliases = new Map<string, string>()
  const taken = new Set<string>()

  for (const [name, meta] of tables) {
    if (meta.alias !== undefined) {
      aliases.set(name, meta.alias)
      taken.add(meta.alias.toLowerCase())
    }
  }

  for (const [name, meta] of tables) {
    if (meta.alias !== undefined) continue
    const base = generateAlias(name)
    let alias = base
    for (let n = 2; taken.has(alias); n++) {
      alias = `${base}${String(n)}`
    }
    aliases.set(name, alias)
    taken.add(alias)
  }

  return aliases
}

function isComplete(rel: RelationshipDeclaration): rel is Relationship {
  return (
    isNonEmpty(rel.sourceTable) &&
    isNonEmpty(rel.sourceColumn) &&
    isNonEmpty(rel.targetTable) &&
    isNonEmpty(rel.targetColumn)
  )
}

function isNonEmpty(value: string | undefined): value is string {
  return typeof value === 'string' && value.length > 0
}
