export {
  createDynamoDbClient,
  type DynamoDbClientSettings,
} from "./adapters/dynamodb/create-dynamodb-client"
export {
  DynamoDbTableBackend,
  type DynamoDbTableBackendDeps,
} from "./adapters/dynamodb/dynamodb-table-backend"
export {
  type MemoryIndexDefinition,
  type MemoryKeySchema,
  MemoryTableBackend,
  type MemoryTableDefinition,
} from "./adapters/memory/memory-table-backend"
export { MemoryTableValidationError } from "./adapters/memory/memory-table-error"
export {
  createLoggerFromConfig,
  type CreateTableStoreOptions,
  createTableStore,
  dynamoDbClientSettings,
} from "./config/create-table-store"
export {
  CONFIG_ENV_PREFIX,
  fieldsFromConfig,
  type LoadTableStoreConfigOptions,
  loadTableStoreConfig,
  type TableStoreConfig,
  tableStoreConfigSchema,
} from "./config/table-store-config"
export { attributeValueCodec } from "./core/codec/value-codec"
export { CallContext, ContextKey } from "./core/context/call-context"
export {
  type OperationDetails,
  type OperationName,
  operationDetailsFromContext,
} from "./core/context/operation-details"
export { decodeCursor, encodeCursor } from "./core/cursor/cursor-codec"
export {
  DeleteFailedKeyNotExistsError,
  InvalidCursorError,
  isConditionalCheckFailed,
  ReservedFieldError,
  type StoreErrorCode,
  StoreOperationError,
  UnsupportedCursorAttributeError,
} from "./core/errors"
export { ExpressionError } from "./core/expression/expression-error"
export { composeHooks } from "./core/hooks/compose-hooks"
export { createLoggingHooks, type LoggingHooksOptions } from "./core/hooks/logging-hooks"
export { noopHooks } from "./core/hooks/noop-hooks"
export {
  applyDeleteOptions,
  type DeleteOption,
  type DeleteOptions,
  defaultDeleteOptions,
  deleteWithCheck,
} from "./core/options/delete-options"
export {
  applyReadOptions,
  defaultReadOptions,
  type IndexRef,
  type ReadOption,
  type ReadOptions,
  readWithConsistentRead,
  readWithIndex,
  readWithLastEvaluatedKey,
  readWithLimit,
} from "./core/options/read-options"
export {
  applyStoreOptions,
  defaultStoreOptions,
  type StoreOption,
  type StoreOptions,
  withClock,
  withCreateConstraintDisabled,
  withFields,
  withStoreHooks,
  withValueCodec,
} from "./core/options/store-options"
export {
  applyWriteOptions,
  defaultWriteOptions,
  type WriteOption,
  type WriteOptions,
  writeWithCreateConstraintDisabled,
  writeWithExtraFields,
  writeWithTTL,
  writeWithVersion,
} from "./core/options/write-options"
export { TableStore, type TableStoreDeps } from "./core/store/table-store"
export {
  DEFAULT_EXPIRES_ATTRIBUTE,
  DEFAULT_PARTITION_KEY_ATTRIBUTE,
  DEFAULT_PAYLOAD_ATTRIBUTE,
  DEFAULT_SORT_KEY_ATTRIBUTE,
  DEFAULT_VERSION_ATTRIBUTE,
  defaultFields,
  type FieldsDef,
  reservedFieldNames,
} from "./ports/fields"
export type { StoreHooks } from "./ports/hooks"
export type { Key } from "./ports/key"
export type { OperationResult, StoreGetResult, StoreListResult } from "./ports/operation-result"
export type {
  DeleteItemResponse,
  GetItemResponse,
  QueryResponse,
  TableBackend,
  TableRequest,
  TableResponse,
  UpdateItemResponse,
} from "./ports/table-backend"
export type { ValueCodec } from "./ports/value-codec"
