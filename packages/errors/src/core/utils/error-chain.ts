function causeOf(v: unknown): unknown {
  if (typeof v !== "object" || v === null || !("cause" in v)) return undefined

  return v.cause
}

/**
 * Walk the `cause` chain starting at `err`, returning every value met.
 *
 * Stops at `maxDepth` entries or when a cycle is detected.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)
    current = causeOf(current)
  }

  return chain
}

/**
 * Return the first value in the cause chain matching `predicate`.
 *
 * @example
 * ```ts
 * const throttled = findInChain(err, (e): e is Error =>
 *   e instanceof Error && e.name === "ThrottlingException",
 * )
 * ```
 */
export function findInChain<T>(
  err: unknown,
  predicate: (value: unknown) => value is T,
): T | undefined {
  for (const value of errorChain(err)) {
    if (predicate(value)) return value
  }

  return undefined
}
