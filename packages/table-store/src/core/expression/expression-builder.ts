import type { AttributeValue } from "@aws-sdk/client-dynamodb"

import type { Condition } from "./condition"
import { ExpressionError } from "./expression-error"
import type { UpdateBuilder } from "./update"

/**
 * Rendered expressions sharing one set of placeholders. Absent parts were not
 * requested; the maps are absent when empty.
 */
export type Expression = {
  readonly keyCondition?: string
  readonly condition?: string
  readonly update?: string
  readonly names?: Record<string, string>
  readonly values?: Record<string, AttributeValue>
}

/**
 * Renders conditions and updates with `#nN` name and `:vN` value
 * placeholders. A name is given one placeholder however often it appears.
 * Parts render in a fixed order: key condition, condition, update.
 */
export class ExpressionBuilder {
  private keyCondition: Condition | undefined
  private condition: Condition | undefined
  private update: UpdateBuilder | undefined

  withKeyCondition(condition: Condition): this {
    this.keyCondition = condition
    return this
  }

  withCondition(condition: Condition): this {
    this.condition = condition
    return this
  }

  withUpdate(update: UpdateBuilder): this {
    this.update = update
    return this
  }

  build(): Expression {
    const placeholders = new Placeholders()

    const keyCondition = this.keyCondition && renderCondition(this.keyCondition, placeholders)
    const condition = this.condition && renderCondition(this.condition, placeholders)
    const update = this.update && renderUpdate(this.update, placeholders)

    return {
      ...(keyCondition !== undefined && { keyCondition }),
      ...(condition !== undefined && { condition }),
      ...(update !== undefined && { update }),
      ...placeholders.maps(),
    }
  }
}

class Placeholders {
  private readonly names = new Map<string, string>()
  private readonly values: Record<string, AttributeValue> = {}
  private valueCount = 0

  name(attribute: string): string {
    if (attribute === "") throw new ExpressionError("attribute name must not be empty")

    const existing = this.names.get(attribute)
    if (existing) return existing

    const placeholder = `#n${this.names.size}`
    this.names.set(attribute, placeholder)
    return placeholder
  }

  value(value: AttributeValue): string {
    const placeholder = `:v${this.valueCount++}`
    this.values[placeholder] = value
    return placeholder
  }

  maps(): Pick<Expression, "names" | "values"> {
    return {
      ...(this.names.size > 0 && {
        names: Object.fromEntries([...this.names].map(([attr, ph]) => [ph, attr])),
      }),
      ...(this.valueCount > 0 && { values: { ...this.values } }),
    }
  }
}

function renderCondition(condition: Condition, p: Placeholders): string {
  switch (condition.kind) {
    case "attribute_exists":
      return `attribute_exists(${p.name(condition.name)})`
    case "attribute_not_exists":
      return `attribute_not_exists(${p.name(condition.name)})`
    case "equals":
      return `${p.name(condition.name)} = ${p.value(condition.value)}`
    case "begins_with":
      return `begins_with(${p.name(condition.name)}, ${p.value({ S: condition.prefix })})`
    case "and":
      if (condition.conditions.length === 0) {
        throw new ExpressionError("conjunction must have at least one operand")
      }
      return condition.conditions.map((c) => renderCondition(c, p)).join(" AND ")
  }
}

function renderUpdate(update: UpdateBuilder, p: Placeholders): string {
  if (update.size === 0) throw new ExpressionError("update has no actions")

  const adds: string[] = []
  const sets: string[] = []

  for (const action of update.entries()) {
    const name = p.name(action.name)
    const value = p.value(action.value)

    if (action.kind === "add") adds.push(`${name} ${value}`)
    else sets.push(`${name} = ${value}`)
  }

  return [
    ...(adds.length > 0 ? [`ADD ${adds.join(", ")}`] : []),
    ...(sets.length > 0 ? [`SET ${sets.join(", ")}`] : []),
  ].join(" ")
}
