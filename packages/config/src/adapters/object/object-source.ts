import type { ConfigSource } from "../../ports/source"

/** In-code overrides, typically last in the source list. */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Record<string, unknown>,
    name: string = "object:overrides",
  ) {
    this.name = name
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
