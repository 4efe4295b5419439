/**
 * A source of raw configuration values.
 *
 * Sources only load; coercion and validation happen in the schema. When
 * several sources provide the same key, the later one wins.
 */
export interface ConfigSource {
  /** Shown by `explain()`, e.g. "env" or "dotenv:.env.local". */
  readonly name: string

  /** `undefined` values are treated as "not provided". */
  load(): Promise<Record<string, unknown>>
}
