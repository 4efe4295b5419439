import { type Clock, SystemClock } from "@tablekit/clock"

import { defaultFields, type FieldsDef } from "../../ports/fields"
import type { StoreHooks } from "../../ports/hooks"
import type { ValueCodec } from "../../ports/value-codec"
import { attributeValueCodec } from "../codec/value-codec"
import { noopHooks } from "../hooks/noop-hooks"

export type StoreOptions<V> = {
  hooks: StoreHooks
  fields: FieldsDef
  codec: ValueCodec<V>
  clock: Clock
  createConstraintDisabled: boolean
}

export type HooksStoreOption = { readonly kind: "hooks"; readonly hooks: StoreHooks }
export type FieldsStoreOption = { readonly kind: "fields"; readonly fields: Partial<FieldsDef> }
export type ValueCodecStoreOption<V> = { readonly kind: "value_codec"; readonly codec: ValueCodec<V> }
export type ClockStoreOption = { readonly kind: "clock"; readonly clock: Clock }
export type CreateConstraintStoreOption = {
  readonly kind: "create_constraint_disabled"
  readonly disabled: boolean
}

export type StoreOption<V> =
  | HooksStoreOption
  | FieldsStoreOption
  | ValueCodecStoreOption<V>
  | ClockStoreOption
  | CreateConstraintStoreOption

/** Replaces the no-op hooks installed by default. */
export function withStoreHooks(hooks: StoreHooks): HooksStoreOption {
  return { kind: "hooks", hooks }
}

/**
 * Renames some of the managed attributes; names not given keep their current
 * value.
 */
export function withFields(fields: Partial<FieldsDef>): FieldsStoreOption {
  return { kind: "fields", fields }
}

export function withValueCodec<V>(codec: ValueCodec<V>): ValueCodecStoreOption<V> {
  return { kind: "value_codec", codec }
}

/** Clock used to compute expiry timestamps. */
export function withClock(clock: Clock): ClockStoreOption {
  return { kind: "clock", clock }
}

/**
 * Store-wide default for dropping the existence guard on create, turning it
 * into an upsert. A write option can override it per call.
 */
export function withCreateConstraintDisabled(disabled: boolean): CreateConstraintStoreOption {
  return { kind: "create_constraint_disabled", disabled }
}

export function defaultStoreOptions<V>(): StoreOptions<V> {
  return {
    hooks: noopHooks,
    fields: defaultFields,
    codec: attributeValueCodec<V>(),
    clock: new SystemClock(),
    createConstraintDisabled: false,
  }
}

export function applyStoreOptions<V>(
  target: StoreOptions<V>,
  options: readonly StoreOption<V>[],
): StoreOptions<V> {
  for (const option of options) {
    switch (option.kind) {
      case "hooks":
        target.hooks = option.hooks
        break
      case "fields":
        target.fields = mergeFields(target.fields, option.fields)
        break
      case "value_codec":
        target.codec = option.codec
        break
      case "clock":
        target.clock = option.clock
        break
      case "create_constraint_disabled":
        target.createConstraintDisabled = option.disabled
        break
    }
  }

  return target
}

function mergeFields(current: FieldsDef, patch: Partial<FieldsDef>): FieldsDef {
  return {
    partitionKeyName: patch.partitionKeyName ?? current.partitionKeyName,
    sortKeyName: patch.sortKeyName ?? current.sortKeyName,
    expiresName: patch.expiresName ?? current.expiresName,
    versionName: patch.versionName ?? current.versionName,
    payloadName: patch.payloadName ?? current.payloadName,
  }
}
