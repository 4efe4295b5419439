import {
  type AttributeValue,
  ConditionalCheckFailedException,
  type ConsumedCapacity,
  type DeleteItemCommandInput,
  type GetItemCommandInput,
  type QueryCommandInput,
  ResourceNotFoundException,
  type ReturnConsumedCapacity,
  type UpdateItemCommandInput,
} from "@aws-sdk/client-dynamodb"

import { attributesEqual, canonicalNumber, compareKeyAttributes } from "../../core/codec/attribute-values"
import type { Condition } from "../../core/expression/condition"
import type {
  DeleteItemResponse,
  GetItemResponse,
  QueryResponse,
  TableBackend,
  UpdateItemResponse,
} from "../../ports/table-backend"
import {
  applyUpdate,
  evaluateCondition,
  type ExpressionAttributes,
  type Item,
  parseCondition,
  parseUpdate,
} from "./expression-evaluator"
import { MemoryTableValidationError } from "./memory-table-error"

export type MemoryKeySchema = {
  readonly partitionKeyName: string
  readonly sortKeyName: string
}

export type MemoryIndexDefinition = MemoryKeySchema & {
  readonly name: string
}

export type MemoryTableDefinition = MemoryKeySchema & {
  readonly tableName: string
  /** Secondary indexes; items lacking either index key are left out of it. */
  readonly indexes?: readonly MemoryIndexDefinition[]
}

/**
 * In-process {@link TableBackend} with DynamoDB's conditional write, paging
 * and index semantics for the expressions the store emits.
 *
 * @remarks
 * Items are copied on the way in and out. Expired items are never removed.
 */
export class MemoryTableBackend implements TableBackend {
  private readonly items = new Map<string, Item>()

  constructor(private readonly table: MemoryTableDefinition) {}

  get size(): number {
    return this.items.size
  }

  async getItem(input: GetItemCommandInput, signal?: AbortSignal): Promise<GetItemResponse> {
    signal?.throwIfAborted()
    this.checkTable(input.TableName)

    const item = this.items.get(this.storageKey(input.Key))

    return {
      ...(item && { Item: structuredClone(item) }),
      ...capacity(this.table.tableName, input.ReturnConsumedCapacity, input.ConsistentRead ? 1 : 0.5),
    }
  }

  async updateItem(input: UpdateItemCommandInput, signal?: AbortSignal): Promise<UpdateItemResponse> {
    signal?.throwIfAborted()
    this.checkTable(input.TableName)

    const storageKey = this.storageKey(input.Key)
    const existing = this.items.get(storageKey)
    const attrs = { names: input.ExpressionAttributeNames, values: input.ExpressionAttributeValues }

    if (input.UpdateExpression === undefined) {
      throw new MemoryTableValidationError("UpdateExpression is required")
    }
    const actions = parseUpdate(input.UpdateExpression, attrs)
    const keyAction = actions.find(
      (a) => a.name === this.table.partitionKeyName || a.name === this.table.sortKeyName,
    )
    if (keyAction) {
      throw new MemoryTableValidationError(`cannot update key attribute "${keyAction.name}"`)
    }

    this.checkCondition(input.ConditionExpression, attrs, existing)

    const next = applyUpdate({ ...existing, ...input.Key }, actions)
    this.items.set(storageKey, next)

    return {
      ...(input.ReturnValues === "ALL_NEW" && { Attributes: structuredClone(next) }),
      ...(input.ReturnValues === "ALL_OLD" && existing && { Attributes: structuredClone(existing) }),
      ...capacity(this.table.tableName, input.ReturnConsumedCapacity, 1),
    }
  }

  async deleteItem(input: DeleteItemCommandInput, signal?: AbortSignal): Promise<DeleteItemResponse> {
    signal?.throwIfAborted()
    this.checkTable(input.TableName)

    const storageKey = this.storageKey(input.Key)
    const existing = this.items.get(storageKey)
    const attrs = { names: input.ExpressionAttributeNames, values: input.ExpressionAttributeValues }

    this.checkCondition(input.ConditionExpression, attrs, existing)
    this.items.delete(storageKey)

    return {
      ...(input.ReturnValues === "ALL_OLD" && existing && { Attributes: structuredClone(existing) }),
      ...capacity(this.table.tableName, input.ReturnConsumedCapacity, 1),
    }
  }

  async query(input: QueryCommandInput, signal?: AbortSignal): Promise<QueryResponse> {
    signal?.throwIfAborted()
    this.checkTable(input.TableName)

    const schema = this.keySchema(input.IndexName)
    if (input.KeyConditionExpression === undefined) {
      throw new MemoryTableValidationError("KeyConditionExpression is required")
    }
    if (input.Limit !== undefined && !(Number.isInteger(input.Limit) && input.Limit > 0)) {
      throw new MemoryTableValidationError(`Limit must be a positive integer, got ${input.Limit}`)
    }
    const keyCondition = parseCondition(input.KeyConditionExpression, {
      names: input.ExpressionAttributeNames,
      values: input.ExpressionAttributeValues,
    })
    const partitionValue = this.partitionValue(keyCondition, schema)

    const matches = [...this.items.values()]
      .filter((item) => {
        const partition = item[schema.partitionKeyName]
        return (
          partition !== undefined &&
          attributesEqual(partition, partitionValue) &&
          item[schema.sortKeyName] !== undefined &&
          evaluateCondition(keyCondition, item)
        )
      })
      .sort((a, b) => this.compareOrder(schema, a, b))

    if (input.ScanIndexForward === false) matches.reverse()

    const start = input.ExclusiveStartKey
    const offset = start ? this.offsetAfter(schema, matches, start, input.ScanIndexForward !== false) : 0
    const page = matches.slice(offset, input.Limit === undefined ? undefined : offset + input.Limit)
    const last = page.at(-1)
    const truncated = input.Limit !== undefined && page.length === input.Limit && last !== undefined

    return {
      Items: page.map((item) => structuredClone(item)),
      Count: page.length,
      ...(truncated && { LastEvaluatedKey: this.continuationKey(schema, last) }),
      ...capacity(this.table.tableName, input.ReturnConsumedCapacity, input.ConsistentRead ? 1 : 0.5),
    }
  }

  private checkTable(tableName: string | undefined): void {
    if (tableName !== this.table.tableName) {
      throw new ResourceNotFoundException({
        message: "Requested resource not found",
        $metadata: {},
      })
    }
  }

  private checkCondition(
    expression: string | undefined,
    attrs: ExpressionAttributes,
    existing: Item | undefined,
  ): void {
    if (expression === undefined) return

    if (!evaluateCondition(parseCondition(expression, attrs), existing)) {
      throw new ConditionalCheckFailedException({
        message: "The conditional request failed",
        $metadata: {},
      })
    }
  }

  private keySchema(indexName: string | undefined): MemoryKeySchema {
    if (indexName === undefined) return this.table

    const index = this.table.indexes?.find((i) => i.name === indexName)
    if (!index) {
      throw new MemoryTableValidationError(`table has no index named "${indexName}"`)
    }
    return index
  }

  private storageKey(key: Item | undefined): string {
    const { partitionKeyName, sortKeyName } = this.table
    const partition = key?.[partitionKeyName]
    const sort = key?.[sortKeyName]

    if (!key || partition === undefined || sort === undefined || Object.keys(key).length !== 2) {
      throw new MemoryTableValidationError("the provided key element does not match the schema")
    }

    return JSON.stringify([scalarText(partition), scalarText(sort)])
  }

  private partitionValue(condition: Condition, schema: MemoryKeySchema): AttributeValue {
    const terms = condition.kind === "and" ? condition.conditions : [condition]

    const partition = terms.find(
      (t) => t.kind === "equals" && t.name === schema.partitionKeyName,
    )
    const others = terms.filter((t) => t !== partition)

    if (partition?.kind !== "equals") {
      throw new MemoryTableValidationError("query must test the partition key for equality")
    }
    if (others.length > 1 || others.some((t) => !("name" in t) || t.name !== schema.sortKeyName)) {
      throw new MemoryTableValidationError("query key condition may only test the sort key")
    }

    return partition.value
  }

  /** Sort key first, then the table's primary key for ties within an index. */
  private compareOrder(schema: MemoryKeySchema, a: Item, b: Item): number {
    for (const name of [schema.sortKeyName, this.table.partitionKeyName, this.table.sortKeyName]) {
      const left = a[name]
      const right = b[name]
      if (left === undefined || right === undefined) continue

      const order = compareKeyAttributes(left, right)
      if (order !== 0) return order
    }
    return 0
  }

  private offsetAfter(schema: MemoryKeySchema, items: readonly Item[], start: Item, forward: boolean): number {
    const index = items.findIndex((item) => {
      const order = this.compareOrder(schema, item, start)
      return forward ? order > 0 : order < 0
    })
    return index === -1 ? items.length : index
  }

  private continuationKey(schema: MemoryKeySchema, item: Item): Item {
    const names = new Set([
      this.table.partitionKeyName,
      this.table.sortKeyName,
      schema.partitionKeyName,
      schema.sortKeyName,
    ])

    const key: Item = {}
    for (const name of names) {
      const value = item[name]
      if (value !== undefined) key[name] = value
    }
    return key
  }
}

function scalarText(attr: AttributeValue): string {
  if (attr.S !== undefined) return `S:${attr.S}`
  if (attr.N !== undefined) return `N:${canonicalNumber(attr.N)}`
  if (attr.B !== undefined) return `B:${Buffer.from(attr.B).toString("base64")}`
  throw new MemoryTableValidationError("key attributes must be strings, numbers or binary")
}

function capacity(
  tableName: string,
  mode: ReturnConsumedCapacity | undefined,
  units: number,
): { ConsumedCapacity?: ConsumedCapacity } {
  if (mode === undefined || mode === "NONE") return {}
  return { ConsumedCapacity: { TableName: tableName, CapacityUnits: units } }
}
