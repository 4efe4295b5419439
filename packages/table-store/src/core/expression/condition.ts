import type { AttributeValue } from "@aws-sdk/client-dynamodb"

/** Condition tree over top-level attributes; also used for key conditions. */
export type Condition =
  | { readonly kind: "attribute_exists"; readonly name: string }
  | { readonly kind: "attribute_not_exists"; readonly name: string }
  | { readonly kind: "equals"; readonly name: string; readonly value: AttributeValue }
  | { readonly kind: "begins_with"; readonly name: string; readonly prefix: string }
  | { readonly kind: "and"; readonly conditions: readonly Condition[] }

export function attributeExists(name: string): Condition {
  return { kind: "attribute_exists", name }
}

export function attributeNotExists(name: string): Condition {
  return { kind: "attribute_not_exists", name }
}

export function equals(name: string, value: AttributeValue): Condition {
  return { kind: "equals", name, value }
}

export function beginsWith(name: string, prefix: string): Condition {
  return { kind: "begins_with", name, prefix }
}

/** Conjunction; nested conjunctions are flattened. */
export function and(...conditions: readonly Condition[]): Condition {
  return {
    kind: "and",
    conditions: conditions.flatMap((c) => (c.kind === "and" ? c.conditions : [c])),
  }
}
