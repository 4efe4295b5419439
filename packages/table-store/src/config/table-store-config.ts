import { type Config, type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@tablekit/config"
import { logLevelNames } from "@tablekit/logger"
import { z } from "zod"

import {
  DEFAULT_EXPIRES_ATTRIBUTE,
  DEFAULT_PARTITION_KEY_ATTRIBUTE,
  DEFAULT_PAYLOAD_ATTRIBUTE,
  DEFAULT_SORT_KEY_ATTRIBUTE,
  DEFAULT_VERSION_ATTRIBUTE,
  type FieldsDef,
} from "../ports/fields"

export const CONFIG_ENV_PREFIX = "TABLEKIT_"

const attributeName = z.string().min(1)

export const tableStoreConfigSchema = z.object({
  TABLE_NAME: z.string().min(1),
  AWS_REGION: z.string().min(1).default("us-east-1"),
  DYNAMODB_ENDPOINT: z.url().optional(),
  DYNAMODB_MAX_ATTEMPTS: z.coerce.number().int().positive().optional(),

  PARTITION_KEY_ATTRIBUTE: attributeName.default(DEFAULT_PARTITION_KEY_ATTRIBUTE),
  SORT_KEY_ATTRIBUTE: attributeName.default(DEFAULT_SORT_KEY_ATTRIBUTE),
  EXPIRES_ATTRIBUTE: attributeName.default(DEFAULT_EXPIRES_ATTRIBUTE),
  VERSION_ATTRIBUTE: attributeName.default(DEFAULT_VERSION_ATTRIBUTE),
  PAYLOAD_ATTRIBUTE: attributeName.default(DEFAULT_PAYLOAD_ATTRIBUTE),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type TableStoreConfig = z.infer<typeof tableStoreConfigSchema>

export type LoadTableStoreConfigOptions = {
  /**
   * Defaults to an optional `.env` file then the process environment, both
   * read with the `TABLEKIT_` prefix.
   */
  sources?: readonly ConfigSource[]
}

export async function loadTableStoreConfig(
  options: LoadTableStoreConfigOptions = {},
): Promise<Config<TableStoreConfig>> {
  return loadConfig({
    schema: tableStoreConfigSchema,
    sources: options.sources ?? [
      new DotenvSource({ file: ".env", required: false, prefix: CONFIG_ENV_PREFIX }),
      new EnvSource({ prefix: CONFIG_ENV_PREFIX }),
    ],
  })
}

export function fieldsFromConfig(config: TableStoreConfig): FieldsDef {
  return {
    partitionKeyName: config.PARTITION_KEY_ATTRIBUTE,
    sortKeyName: config.SORT_KEY_ATTRIBUTE,
    expiresName: config.EXPIRES_ATTRIBUTE,
    versionName: config.VERSION_ATTRIBUTE,
    payloadName: config.PAYLOAD_ATTRIBUTE,
  }
}
