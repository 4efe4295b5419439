import type { AttributeValue } from "@aws-sdk/client-dynamodb"

import { attributesEqual } from "../../core/codec/attribute-values"
import {
  and,
  attributeExists,
  attributeNotExists,
  beginsWith,
  type Condition,
  equals,
} from "../../core/expression/condition"
import type { UpdateAction } from "../../core/expression/update"
import { MemoryTableValidationError } from "./memory-table-error"

export type Item = Record<string, AttributeValue>

export type ExpressionAttributes = {
  names?: Record<string, string>
  values?: Record<string, AttributeValue>
}

const NAME = String.raw`(#?[A-Za-z0-9_]+)`
const VALUE = String.raw`(:[A-Za-z0-9_]+)`

const termPatterns = {
  exists: new RegExp(`^attribute_exists\\(\\s*${NAME}\\s*\\)$`),
  notExists: new RegExp(`^attribute_not_exists\\(\\s*${NAME}\\s*\\)$`),
  equals: new RegExp(`^${NAME}\\s*=\\s*${VALUE}$`),
  beginsWith: new RegExp(`^begins_with\\(\\s*${NAME}\\s*,\\s*${VALUE}\\s*\\)$`),
}

const addPattern = new RegExp(`^${NAME}\\s+${VALUE}$`)
const setPattern = new RegExp(`^${NAME}\\s*=\\s*${VALUE}$`)

/**
 * Parses conjunctions of `attribute_exists`, `attribute_not_exists`, `=` and
 * `begins_with` terms, resolving placeholders.
 */
export function parseCondition(expression: string, attrs: ExpressionAttributes): Condition {
  const terms = expression
    .split(/\s+AND\s+/)
    .map((t) => stripParens(t.trim()))
    .map((term): Condition => {
      let m = termPatterns.exists.exec(term)
      if (m?.[1] !== undefined) return attributeExists(resolveName(m[1], attrs))

      m = termPatterns.notExists.exec(term)
      if (m?.[1] !== undefined) return attributeNotExists(resolveName(m[1], attrs))

      m = termPatterns.equals.exec(term)
      if (m?.[1] !== undefined && m[2] !== undefined) {
        return equals(resolveName(m[1], attrs), resolveValue(m[2], attrs))
      }

      m = termPatterns.beginsWith.exec(term)
      if (m?.[1] !== undefined && m[2] !== undefined) {
        const prefix = resolveValue(m[2], attrs)
        if (prefix.S === undefined) {
          throw new MemoryTableValidationError("begins_with operand must be a string")
        }
        return beginsWith(resolveName(m[1], attrs), prefix.S)
      }

      throw new MemoryTableValidationError(`unsupported expression term: ${term}`)
    })

  const [first, ...rest] = terms
  if (first === undefined) throw new MemoryTableValidationError("empty condition expression")

  return rest.length === 0 ? first : and(first, ...rest)
}

export function evaluateCondition(condition: Condition, item: Item | undefined): boolean {
  switch (condition.kind) {
    case "attribute_exists":
      return item?.[condition.name] !== undefined
    case "attribute_not_exists":
      return item?.[condition.name] === undefined
    case "equals": {
      const actual = item?.[condition.name]
      return actual !== undefined && attributesEqual(actual, condition.value)
    }
    case "begins_with": {
      const actual = item?.[condition.name]
      return actual?.S !== undefined && actual.S.startsWith(condition.prefix)
    }
    case "and":
      return condition.conditions.every((c) => evaluateCondition(c, item))
  }
}

/** Parses `ADD` and `SET` clauses of plain `name value` / `name = value` actions. */
export function parseUpdate(expression: string, attrs: ExpressionAttributes): UpdateAction[] {
  const parts = expression.trim().split(/\b(ADD|SET)\b/)
  if ((parts[0] ?? "").trim() !== "") {
    throw new MemoryTableValidationError(`unsupported update expression: ${expression}`)
  }

  const actions: UpdateAction[] = []

  for (let i = 1; i < parts.length; i += 2) {
    const keyword = parts[i]
    const body = parts[i + 1] ?? ""

    for (const raw of body.split(",")) {
      const action = raw.trim()
      const m = (keyword === "ADD" ? addPattern : setPattern).exec(action)
      if (m?.[1] === undefined || m[2] === undefined) {
        throw new MemoryTableValidationError(`unsupported ${keyword} action: ${action}`)
      }

      actions.push({
        kind: keyword === "ADD" ? "add" : "set",
        name: resolveName(m[1], attrs),
        value: resolveValue(m[2], attrs),
      })
    }
  }

  if (actions.length === 0) throw new MemoryTableValidationError("empty update expression")
  return actions
}

export function applyUpdate(item: Item, actions: readonly UpdateAction[]): Item {
  const next: Item = { ...item }

  for (const action of actions) {
    if (action.kind === "set") {
      next[action.name] = action.value
      continue
    }

    if (action.value.N === undefined) {
      throw new MemoryTableValidationError(`ADD operand for "${action.name}" must be a number`)
    }

    const current = next[action.name]
    if (current === undefined) {
      next[action.name] = action.value
    } else if (current.N !== undefined) {
      next[action.name] = { N: String(Number(current.N) + Number(action.value.N)) }
    } else {
      throw new MemoryTableValidationError(`cannot ADD to non-numeric attribute "${action.name}"`)
    }
  }

  return next
}

function resolveName(token: string, attrs: ExpressionAttributes): string {
  if (!token.startsWith("#")) return token

  const name = attrs.names?.[token]
  if (name === undefined) {
    throw new MemoryTableValidationError(`undefined expression attribute name: ${token}`)
  }
  return name
}

function resolveValue(token: string, attrs: ExpressionAttributes): AttributeValue {
  const value = attrs.values?.[token]
  if (value === undefined) {
    throw new MemoryTableValidationError(`undefined expression attribute value: ${token}`)
  }
  return value
}

function stripParens(term: string): string {
  return term.startsWith("(") && term.endsWith(")") ? stripParens(term.slice(1, -1).trim()) : term
}
