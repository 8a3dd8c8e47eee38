import type { MetadataErrorEntry } from './errors.js'
import { MetadataError } from './errors.js'
import type { MetadataDocument } from './types/metadata.js'

// --- Alias Validation ---

const ALIAS_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/

export function validateAlias(alias: string): string | null {
  if (alias.length === 0 || alias.length > 64) {
    return `alias must be 1–64 characters, got ${alias.length}`
  }
  if (!ALIAS_REGEX.test(alias)) {
    return `alias must match ^[A-Za-z_][A-Za-z0-9_]*$, got '${alias}'`
  }
  return null
}

// --- Metadata Document Validation ---

type FieldType = 'string' | 'boolean'

const COLUMN_FIELDS: Readonly<Record<string, FieldType>> = { name: 'string', type: 'string', nullable: 'boolean' }
const RELATIONSHIP_FIELDS: Readonly<Record<string, FieldType>> = {
  sourceTable: 'string',
  sourceColumn: 'string',
  targetTable: 'string',
  targetColumn: 'string',
}
const JOIN_PATH_FIELDS: Readonly<Record<string, FieldType>> = { table: 'string', alias: 'string', condition: 'string' }

/**
 * Structural check of a metadata document.
 *
 * Documents may be partially populated. Missing fields in column entries,
 * relationships and precomputed join paths are not errors here (the registry
 * skips incomplete entries); fields that are present must have the right type.
 */
export function validateMetadata(doc: unknown): MetadataError | null {
  if (!isRecord(doc)) {
    return new MetadataError([
      {
        code: 'INVALID_DOCUMENT',
        message: 'Metadata document must be an object',
        details: { expected: 'object', actual: kindOf(doc) },
      },
    ])
  }

  const errors: MetadataErrorEntry[] = []

  // --- Tables ---
  const declaredAliases = new Map<string, string>()
  const tables = sectionOf(doc, 'tables', errors)
  for (const [name, table] of Object.entries(tables ?? {})) {
    if (!/[A-Za-z0-9]/.test(name)) {
      errors.push({
        code: 'INVALID_TABLE',
        message: `Table name '${name}' must contain a letter or digit`,
        details: { entity: name },
      })
      continue
    }
    if (!isRecord(table)) {
      errors.push({
        code: 'INVALID_TABLE',
        message: `Table '${name}' must be an object`,
        details: { entity: name, expected: 'object', actual: kindOf(table) },
      })
      continue
    }
    const alias = table.alias
    if (alias === undefined) continue
    if (typeof alias !== 'string') {
      errors.push({
        code: 'INVALID_ALIAS',
        message: `Table '${name}': alias must be a string`,
        details: { entity: name, field: 'alias', expected: 'string', actual: kindOf(alias) },
      })
      continue
    }
    const aliasErr = validateAlias(alias)
    if (aliasErr !== null) {
      errors.push({
        code: 'INVALID_ALIAS',
        message: `Table '${name}': ${aliasErr}`,
        details: { entity: name, field: 'alias', actual: alias },
      })
      continue
    }
    const owner = declaredAliases.get(alias.toLowerCase())
    if (owner !== undefined) {
      errors.push({
        code: 'INVALID_ALIAS',
        message: `Duplicate alias '${alias}' (tables '${owner}' and '${name}')`,
        details: { entity: name, field: 'alias', actual: alias },
      })
    } else {
      declaredAliases.set(alias.toLowerCase(), name)
    }
  }

  // --- Columns ---
  const columns = sectionOf(doc, 'columns', errors)
  for (const [table, list] of Object.entries(columns ?? {})) {
    if (!Array.isArray(list)) {
      errors.push({
        code: 'INVALID_COLUMN',
        message: `Columns of table '${table}' must be an array`,
        details: { entity: table, expected: 'array', actual: kindOf(list) },
      })
      continue
    }
    list.forEach((col: unknown, i) => {
      const entity = `${table}#${i}`
      if (!isRecord(col)) {
        errors.push({
          code: 'INVALID_COLUMN',
          message: `Column #${i} of table '${table}' must be an object`,
          details: { entity, expected: 'object', actual: kindOf(col) },
        })
        return
      }
      checkFieldTypes(col, COLUMN_FIELDS, 'INVALID_COLUMN', `Column #${i} of table '${table}'`, entity, errors)
    })
  }

  // --- Relationships ---
  const relationships = sectionOf(doc, 'relationships', errors)
  for (const [id, rel] of Object.entries(relationships ?? {})) {
    if (!isRecord(rel)) {
      errors.push({
        code: 'INVALID_RELATIONSHIP',
        message: `Relationship '${id}' must be an object`,
        details: { entity: id, expected: 'object', actual: kindOf(rel) },
      })
      continue
    }
    checkFieldTypes(rel, RELATIONSHIP_FIELDS, 'INVALID_RELATIONSHIP', `Relationship '${id}'`, id, errors)
  }

  // --- Precomputed join paths ---
  const joinPaths = sectionOf(doc, 'joinPaths', errors)
  for (const [source, targets] of Object.entries(joinPaths ?? {})) {
    if (!isRecord(targets)) {
      errors.push({
        code: 'INVALID_JOIN_PATH',
        message: `Join paths from '${source}' must be an object`,
        details: { entity: source, expected: 'object', actual: kindOf(targets) },
      })
      continue
    }
    for (const [target, path] of Object.entries(targets)) {
      const entity = `${source}->${target}`
      if (!isRecord(path)) {
        errors.push({
          code: 'INVALID_JOIN_PATH',
          message: `Join path '${entity}' must be an object`,
          details: { entity, expected: 'object', actual: kindOf(path) },
        })
        continue
      }
      checkFieldTypes(path, JOIN_PATH_FIELDS, 'INVALID_JOIN_PATH', `Join path '${entity}'`, entity, errors)
    }
  }

  if (errors.length === 0) {
    return null
  }

  return new MetadataError(errors)
}

/** Throwing form of {@link validateMetadata}. */
export function assertMetadata(doc: unknown): asserts doc is MetadataDocument {
  const err = validateMetadata(doc)
  if (err !== null) {
    throw err
  }
}

// --- Helpers ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function checkFieldTypes(
  entry: Record<string, unknown>,
  fields: Readonly<Record<string, FieldType>>,
  code: MetadataErrorEntry['code'],
  label: string,
  entity: string,
  errors: MetadataErrorEntry[],
): void {
  for (const [field, expected] of Object.entries(fields)) {
    const value = entry[field]
    if (value !== undefined && value !== null && typeof value !== expected) {
      errors.push({
        code,
        message: `${label}: ${field} must be a ${expected}`,
        details: { entity, field, expected, actual: kindOf(value) },
      })
    }
  }
}

function sectionOf(
  doc: Record<string, unknown>,
  key: 'tables' | 'columns' | 'relationships' | 'joinPaths',
  errors: MetadataErrorEntry[],
): Record<string, unknown> | undefined {
  const section = doc[key]
  if (section === undefined) return undefined
  if (isRecord(section)) return section
  errors.push({
    code: 'INVALID_DOCUMENT',
    message: `'${key}' must be an object`,
    details: { field: key, expected: 'object', actual: kindOf(section) },
  })
  return undefined
}

function kindOf(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}
