import { BaseError } from "@tablekit/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { Config } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { LoadedConfig } from "./config"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(details: string, sources: readonly string[]) {
    super(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { sources },
      isOperational: false,
    })
  }
}

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** Applied in order. Defaults to the unprefixed process environment. */
  sources?: readonly ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<Config<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolved = sources ?? [new EnvSource()]

  for (const source of resolved) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(
      z.prettifyError(result.error),
      resolved.map((s) => s.name),
    )
  }

  return new LoadedConfig<T>(result.data, provenance, new Set(Object.keys(merged)))
}
