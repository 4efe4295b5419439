import type { Config } from "../ports/config"

export class LoadedConfig<T extends Record<string, unknown>> implements Config<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<T> {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  unknownKeys(): string[] {
    const known = new Set(Object.keys(this.data))

    return [...this.providedKeys].filter((k) => !known.has(k))
  }
}
