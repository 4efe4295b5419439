/**
 * Validated configuration with per-key provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ TABLE_NAME: z.string(), AWS_REGION: z.string().default("us-east-1") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("TABLE_NAME")    // "orders"
 * config.explain("AWS_REGION") // "default"
 * ```
 */
export interface Config<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /** Name of the source that supplied `key`, or "default" for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Keys some source provided that the schema does not know. */
  unknownKeys(): string[]
}
