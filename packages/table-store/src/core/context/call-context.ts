/**
 * Typed handle for a value carried on a {@link CallContext}.
 *
 * Two keys never collide, even with the same description.
 */
export class ContextKey<T> {
  private readonly bound = new WeakMap<CallContext, { readonly value: T }>()

  constructor(readonly description: string) {}

  /** @internal */
  bind(ctx: CallContext, value: T): void {
    this.bound.set(ctx, { value })
  }

  /** @internal */
  lookup(ctx: CallContext): { readonly value: T } | undefined {
    return this.bound.get(ctx)
  }
}

/**
 * Immutable per-call context: an optional cancellation signal plus values
 * attached by the store and its hooks.
 *
 * Deriving never mutates the receiver; lookups walk towards the root and the
 * nearest binding wins.
 */
export class CallContext {
  private constructor(
    readonly signal: AbortSignal | undefined,
    private readonly parent: CallContext | undefined,
  ) {}

  static background(): CallContext {
    return new CallContext(undefined, undefined)
  }

  withSignal(signal: AbortSignal): CallContext {
    return new CallContext(signal, this)
  }

  withValue<T>(key: ContextKey<T>, value: T): CallContext {
    const child = new CallContext(this.signal, this)
    key.bind(child, value)
    return child
  }

  value<T>(key: ContextKey<T>): T | undefined {
    let current: CallContext | undefined = this
    while (current) {
      const entry = key.lookup(current)
      if (entry) return entry.value
      current = current.parent
    }
    return undefined
  }
}
