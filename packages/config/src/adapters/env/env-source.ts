import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys starting with this prefix are read; the prefix is stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    if (!this.prefix) return { ...this.env }

    const out: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        out[key.slice(this.prefix.length)] = value
      }
    }

    return out
  }
}
