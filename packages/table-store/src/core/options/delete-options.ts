export type DeleteOptions = {
  /** Require the record to exist; enabled by default. */
  checkExists: boolean
}

export type DeleteOption = { readonly kind: "check_exists"; readonly enabled: boolean }

/** `false` makes delete unconditional and idempotent. */
export function deleteWithCheck(enabled: boolean): DeleteOption {
  return { kind: "check_exists", enabled }
}

export function defaultDeleteOptions(): DeleteOptions {
  return { checkExists: true }
}

export function applyDeleteOptions(
  target: DeleteOptions,
  options: readonly DeleteOption[],
): DeleteOptions {
  for (const option of options) {
    target.checkExists = option.enabled
  }

  return target
}
