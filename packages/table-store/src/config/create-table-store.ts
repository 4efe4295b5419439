import type { DynamoDBClient } from "@aws-sdk/client-dynamodb"
import { createPinoLogger, type Logger } from "@tablekit/logger"

import {
  createDynamoDbClient,
  type DynamoDbClientSettings,
} from "../adapters/dynamodb/create-dynamodb-client"
import { DynamoDbTableBackend } from "../adapters/dynamodb/dynamodb-table-backend"
import { createLoggingHooks, type LoggingHooksOptions } from "../core/hooks/logging-hooks"
import { type StoreOption, withFields, withStoreHooks } from "../core/options/store-options"
import { TableStore } from "../core/store/table-store"
import type { Key } from "../ports/key"
import type { TableBackend } from "../ports/table-backend"
import { fieldsFromConfig, type TableStoreConfig } from "./table-store-config"

export type CreateTableStoreOptions<V> = {
  config: TableStoreConfig

  /** Used as is when given; `client` is then ignored. */
  backend?: TableBackend

  /** Defaults to a client built from the config's region and endpoint. */
  client?: DynamoDBClient

  /** When given, every backend call is logged through it. */
  logger?: Logger
  logging?: LoggingHooksOptions

  /** Applied after the options derived from the config. */
  options?: readonly StoreOption<V>[]
}

export function createTableStore<P extends Key, S extends Key, V>(
  opts: CreateTableStoreOptions<V>,
): TableStore<P, S, V> {
  const { config } = opts

  const backend =
    opts.backend ??
    new DynamoDbTableBackend({
      client: opts.client ?? createDynamoDbClient(dynamoDbClientSettings(config)),
    })

  const hooks = opts.logger
    ? [
        withStoreHooks(
          createLoggingHooks(
            opts.logger.child({ module: "table-store", tableName: config.TABLE_NAME }),
            opts.logging,
          ),
        ),
      ]
    : []

  return new TableStore<P, S, V>(
    { backend, tableName: config.TABLE_NAME },
    withFields(fieldsFromConfig(config)),
    ...hooks,
    ...(opts.options ?? []),
  )
}

export function dynamoDbClientSettings(config: TableStoreConfig): DynamoDbClientSettings {
  return {
    region: config.AWS_REGION,
    ...(config.DYNAMODB_ENDPOINT !== undefined && { endpoint: config.DYNAMODB_ENDPOINT }),
    ...(config.DYNAMODB_MAX_ATTEMPTS !== undefined && { maxAttempts: config.DYNAMODB_MAX_ATTEMPTS }),
  }
}

export function createLoggerFromConfig(config: TableStoreConfig): Logger {
  return createPinoLogger(undefined, { level: config.LOG_LEVEL, prettify: config.LOG_PRETTY })
}
