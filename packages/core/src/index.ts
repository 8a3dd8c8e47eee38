// Re-export types from validation package
export type {
  ColumnDeclaration,
  ColumnMeta,
  JoinKind,
  JoinPath,
  JoinPathDeclaration,
  JoinPathIndex,
  MetadataDocument,
  MetadataErrorEntry,
  OrderDirection,
  Relationship,
  RelationshipDeclaration,
  TableMeta,
} from '@querykit/validation'
// Re-export errors and validation functions
export {
  ConfigurationError,
  ConnectionError,
  ExecutionError,
  InvalidArgumentError,
  MetadataError,
  ProviderError,
  QueryKitError,
  UnresolvedJoinError,
  validateMetadata,
} from '@querykit/validation'
// Builder
export { compare, equals, isSqlExpression } from './builder/conditions.js'
export type { JoinKindInput, OrderDirectionInput, QueryBuilderOptions } from './builder/queryBuilder.js'
export { QueryBuilder } from './builder/queryBuilder.js'
// Debug
export type { DebugLogEntry, DebugPhase, DebugSink } from './debug/logger.js'
export { debugEntry, withDebugLog } from './debug/logger.js'
export { fn, raw, renderField, renderTable, SqlFunction } from './generator/fragments.js'
// Generator
export type { SqlGeneratorOptions, UnresolvedJoinPolicy } from './generator/generator.js'
export { compileQuery, SqlGenerator } from './generator/generator.js'
export { placeholderNames, rewritePlaceholders } from './generator/placeholders.js'
// Static provider helpers
export { staticMetadata } from './metadata/providers.js'
// Schema Registry
export type { SchemaRegistryOptions, SchemaSnapshot } from './metadata/registry.js'
export { SchemaRegistry } from './metadata/registry.js'
// Pipeline
export type { CreateQueryKitOptions, QueryKit } from './pipeline.js'
export { createQueryKit } from './pipeline.js'
// Table references
export { parseTableRef } from './resolution/tableRef.js'
export { generateAlias } from './schema/alias.js'
// Public interfaces
export type { Connector, Row } from './types/interfaces.js'
// IR types
export type {
  CompiledQuery,
  Field,
  JoinClause,
  OrderByClause,
  ParameterMap,
  QueryAst,
  SqlExpression,
  TableRef,
  WhereCondition,
} from './types/ir.js'
// Providers
export type { MetadataProvider } from './types/providers.js'
