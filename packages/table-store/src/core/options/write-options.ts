import type { Milliseconds } from "@tablekit/clock"

export type WriteOptions = {
  /** Time to live from now; `0` leaves the expiry attribute unset. */
  ttl: Milliseconds
  /** Expected current version for updates; `0` skips the check. */
  version: number
  extraFields: Record<string, unknown>
  /** Per-call override of the store-wide create guard setting. */
  createConstraintDisabled: boolean | undefined
}

export type WriteOption =
  | { readonly kind: "ttl"; readonly ttl: Milliseconds }
  | { readonly kind: "version"; readonly version: number }
  | { readonly kind: "extra_fields"; readonly fields: Readonly<Record<string, unknown>> }
  | { readonly kind: "create_constraint_disabled"; readonly disabled: boolean }

/** Sets the expiry attribute to now plus `ttl`, as epoch seconds. */
export function writeWithTTL(ttl: Milliseconds): WriteOption {
  return { kind: "ttl", ttl }
}

/**
 * Makes an update conditional on the stored version. Values of `0` or less
 * disable the check.
 */
export function writeWithVersion(version: number): WriteOption {
  return { kind: "version", version }
}

/**
 * Writes additional top-level attributes alongside the payload, for use as
 * secondary index keys or filters. Entries merge with earlier extra fields.
 */
export function writeWithExtraFields(fields: Readonly<Record<string, unknown>>): WriteOption {
  return { kind: "extra_fields", fields }
}

export function writeWithCreateConstraintDisabled(disabled: boolean): WriteOption {
  return { kind: "create_constraint_disabled", disabled }
}

export function defaultWriteOptions(): WriteOptions {
  return { ttl: 0, version: 0, extraFields: {}, createConstraintDisabled: undefined }
}

export function applyWriteOptions(
  target: WriteOptions,
  options: readonly WriteOption[],
): WriteOptions {
  for (const option of options) {
    switch (option.kind) {
      case "ttl":
        target.ttl = option.ttl
        break
      case "version":
        target.version = option.version
        break
      case "extra_fields":
        target.extraFields = { ...target.extraFields, ...option.fields }
        break
      case "create_constraint_disabled":
        target.createConstraintDisabled = option.disabled
        break
    }
  }

  return target
}
