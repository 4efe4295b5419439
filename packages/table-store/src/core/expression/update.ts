import type { AttributeValue } from "@aws-sdk/client-dynamodb"

import { ExpressionError } from "./expression-error"

export type UpdateAction = {
  readonly kind: "add" | "set"
  readonly name: string
  readonly value: AttributeValue
}

/**
 * Collects `ADD` and `SET` actions on top-level attributes.
 *
 * @example
 * ```ts
 * const update = new UpdateBuilder().add("version", { N: "1" }).set("payload", { S: "x" })
 * // ADD #n0 :v0 SET #n1 = :v1
 * ```
 */
export class UpdateBuilder {
  private readonly actions: UpdateAction[] = []

  /** Adds a number to a numeric attribute, creating it when absent. */
  add(name: string, value: AttributeValue): this {
    return this.push({ kind: "add", name, value })
  }

  set(name: string, value: AttributeValue): this {
    return this.push({ kind: "set", name, value })
  }

  get size(): number {
    return this.actions.length
  }

  entries(): readonly UpdateAction[] {
    return this.actions
  }

  private push(action: UpdateAction): this {
    if (action.name === "") {
      throw new ExpressionError("update attribute name must not be empty")
    }
    if (this.actions.some((a) => a.name === action.name)) {
      throw new ExpressionError(`attribute "${action.name}" is updated more than once`)
    }

    this.actions.push(action)
    return this
  }
}
