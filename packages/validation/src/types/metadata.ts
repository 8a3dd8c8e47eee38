// --- Tables & Columns ---

export interface TableMeta {
  readonly alias?: string | undefined
  readonly schema?: string | undefined
  readonly description?: string | undefined
}

export interface ColumnMeta {
  readonly name: string
  readonly type?: string | undefined
  readonly nullable?: boolean | undefined
}

/** Column entry as discovered; entries without a name are skipped on registration. */
export type ColumnDeclaration = Partial<ColumnMeta>

// --- Relationships ---

/**
 * A declared foreign-key-like link between two tables.
 * Documents produced by incremental discovery may leave fields out;
 * such entries are skipped when join paths are derived.
 */
export interface Relationship {
  readonly sourceTable: string
  readonly sourceColumn: string
  readonly targetTable: string
  readonly targetColumn: string
}

export type RelationshipDeclaration = Partial<Relationship>

// --- Join Paths ---

/** An absent alias renders the joined table unaliased. */
export interface JoinPath {
  readonly table: string
  readonly alias?: string | undefined
  readonly condition: string
}

/** Precomputed path as supplied; `table` defaults to the target key, no `condition` means skipped. */
export type JoinPathDeclaration = Partial<JoinPath>

/** sourceTable → targetTable → JoinPathDeclaration */
export type JoinPathIndex = Readonly<Record<string, Readonly<Record<string, JoinPathDeclaration>>>>

// --- Metadata Document ---

export interface MetadataDocument {
  readonly tables?: Readonly<Record<string, TableMeta>> | undefined
  readonly columns?: Readonly<Record<string, readonly ColumnDeclaration[]>> | undefined
  readonly relationships?: Readonly<Record<string, RelationshipDeclaration>> | undefined
  readonly joinPaths?: JoinPathIndex | undefined
}
