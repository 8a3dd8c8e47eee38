// Errors
export type {
  ConfigurationErrorCode,
  ConnectionErrorDetails,
  ExecutionErrorDetails,
  InvalidArgumentDetails,
  MetadataErrorEntry,
  UnresolvedJoinDetails,
} from './errors.js'
export {
  ConfigurationError,
  ConnectionError,
  describeValue,
  ExecutionError,
  InvalidArgumentError,
  MetadataError,
  ProviderError,
  QueryKitError,
  UnresolvedJoinError,
} from './errors.js'

// Metadata validation
export { assertMetadata, validateAlias, validateMetadata } from './metadataValidation.js'

// Types: metadata
export type {
  ColumnDeclaration,
  ColumnMeta,
  JoinPath,
  JoinPathDeclaration,
  JoinPathIndex,
  MetadataDocument,
  Relationship,
  RelationshipDeclaration,
  TableMeta,
} from './types/metadata.js'

// Argument validation
export {
  validateCount,
  validateDirection,
  validateJoinKind,
  validateOperator,
  validateTableName,
} from './validation/arguments.js'
export type { JoinKind, OrderDirection } from './validation/rules.js'
export { normalizeKeyword, VALID_DIRECTIONS, VALID_JOIN_KINDS, VALID_WHERE_OPS } from './validation/rules.js'
