import type {
  AttributeValue,
  DeleteItemCommandInput,
  GetItemCommandInput,
  QueryCommandInput,
  UpdateItemCommandInput,
} from "@aws-sdk/client-dynamodb"

import type { FieldsDef } from "../../ports/fields"
import { reservedFieldNames } from "../../ports/fields"
import type { Key } from "../../ports/key"
import type { OperationResult, StoreGetResult, StoreListResult } from "../../ports/operation-result"
import type { TableBackend, TableRequest, TableResponse } from "../../ports/table-backend"
import { convertExtraField } from "../codec/extra-field"
import { marshalKey } from "../codec/attribute-values"
import type { CallContext } from "../context/call-context"
import { type OperationName, withOperationDetails } from "../context/operation-details"
import { decodeCursor, encodeCursor } from "../cursor/cursor-codec"
import {
  DeleteFailedKeyNotExistsError,
  isConditionalCheckFailed,
  ReservedFieldError,
  StoreOperationError,
} from "../errors"
import { and, attributeExists, attributeNotExists, beginsWith, equals } from "../expression/condition"
import { type Expression, ExpressionBuilder } from "../expression/expression-builder"
import { UpdateBuilder } from "../expression/update"
import { applyDeleteOptions, defaultDeleteOptions, type DeleteOption } from "../options/delete-options"
import { applyReadOptions, defaultReadOptions, type ReadOption } from "../options/read-options"
import {
  applyStoreOptions,
  defaultStoreOptions,
  type StoreOption,
  type StoreOptions,
} from "../options/store-options"
import {
  applyWriteOptions,
  defaultWriteOptions,
  type WriteOption,
  type WriteOptions,
} from "../options/write-options"

export type TableStoreDeps = {
  backend: TableBackend
  tableName: string
}

/**
 * Typed, versioned records in one table addressed by partition and sort key.
 *
 * @remarks
 * Every write adds 1 to the version attribute on the table side, so a new
 * record starts at version 1. Creates are guarded by "does not exist",
 * updates by "exists" and optionally by the expected version; a failed guard
 * surfaces as the SDK's `ConditionalCheckFailedException`. Deletes are guarded
 * by "exists" unless disabled and report a failed guard as
 * {@link DeleteFailedKeyNotExistsError}.
 *
 * The store keeps no record state between calls and is safe to share.
 *
 * @example
 * ```ts
 * const store = new TableStore<string, string, Uint8Array>({ backend, tableName: "records" })
 * const ctx = CallContext.background()
 *
 * const { version } = await store.create(ctx, "tenant-1", "doc/1", bytes, writeWithTTL(60_000))
 * await store.update(ctx, "tenant-1", "doc/1", next, writeWithVersion(version))
 * ```
 */
export class TableStore<P extends Key, S extends Key, V> {
  private readonly options: StoreOptions<V>

  constructor(
    private readonly deps: TableStoreDeps,
    ...options: readonly StoreOption<V>[]
  ) {
    this.options = applyStoreOptions(defaultStoreOptions<V>(), options)
  }

  get tableName(): string {
    return this.deps.tableName
  }

  get fields(): FieldsDef {
    return this.options.fields
  }

  /**
   * Writes a new record at version 1.
   *
   * @throws {ReservedFieldError} when an extra field uses a managed attribute name
   * @throws ConditionalCheckFailedException when the record already exists and
   * the create guard is enabled
   */
  async create(
    ctx: CallContext,
    partitionKey: P,
    sortKey: S,
    value: V,
    ...options: readonly WriteOption[]
  ): Promise<OperationResult> {
    const opCtx = withOperationDetails(ctx, "Create", partitionKey, sortKey)
    const opts = applyWriteOptions(defaultWriteOptions(), options)
    const update = this.buildUpdate("Create", value, opts)

    const builder = new ExpressionBuilder().withUpdate(update)
    if (!(opts.createConstraintDisabled ?? this.options.createConstraintDisabled)) {
      builder.withCondition(
        and(attributeNotExists(this.fields.partitionKeyName), attributeNotExists(this.fields.sortKeyName)),
      )
    }

    return this.writeItem(opCtx, "Create", partitionKey, sortKey, this.buildExpression("Create", builder))
  }

  async get(
    ctx: CallContext,
    partitionKey: P,
    sortKey: S,
    ...options: readonly ReadOption[]
  ): Promise<StoreGetResult<V>> {
    const opCtx = withOperationDetails(ctx, "Get", partitionKey, sortKey)
    const opts = applyReadOptions(defaultReadOptions(), options)

    const request: GetItemCommandInput = {
      TableName: this.tableName,
      Key: this.itemKey("Get", partitionKey, sortKey),
      ConsistentRead: opts.consistentRead,
      ReturnConsumedCapacity: "TOTAL",
    }

    const response = await this.dispatch(opCtx, "Get", partitionKey, sortKey, request, (signal) =>
      this.deps.backend.getItem(request, signal),
    )

    const item = response.Item ?? {}
    const result: OperationResult = {
      version: this.decodeVersion("Get", item),
      ...(response.ConsumedCapacity && { consumedCapacity: response.ConsumedCapacity }),
    }

    const payload = item[this.fields.payloadName]
    if (payload === undefined) return { kind: "not_found", result }

    return { kind: "found", value: this.unmarshalValue("Get", payload), result }
  }

  /**
   * Replaces the payload of an existing record and bumps its version.
   *
   * @throws {ReservedFieldError} when an extra field uses a managed attribute name
   * @throws ConditionalCheckFailedException when the record is missing or its
   * version differs from the one given with `writeWithVersion`
   */
  async update(
    ctx: CallContext,
    partitionKey: P,
    sortKey: S,
    value: V,
    ...options: readonly WriteOption[]
  ): Promise<OperationResult> {
    const opCtx = withOperationDetails(ctx, "Update", partitionKey, sortKey)
    const opts = applyWriteOptions(defaultWriteOptions(), options)
    const update = this.buildUpdate("Update", value, opts)

    const exists = and(attributeExists(this.fields.partitionKeyName), attributeExists(this.fields.sortKeyName))
    const condition =
      opts.version > 0
        ? and(exists, equals(this.fields.versionName, { N: String(opts.version) }))
        : exists

    const builder = new ExpressionBuilder().withUpdate(update).withCondition(condition)

    return this.writeItem(opCtx, "Update", partitionKey, sortKey, this.buildExpression("Update", builder))
  }

  /**
   * @throws {DeleteFailedKeyNotExistsError} when the record is missing and the
   * existence check is enabled
   */
  async delete(
    ctx: CallContext,
    partitionKey: P,
    sortKey: S,
    ...options: readonly DeleteOption[]
  ): Promise<void> {
    const opCtx = withOperationDetails(ctx, "Delete", partitionKey, sortKey)
    const opts = applyDeleteOptions(defaultDeleteOptions(), options)

    const expression = opts.checkExists
      ? this.buildExpression(
          "Delete",
          new ExpressionBuilder().withCondition(
            and(attributeExists(this.fields.partitionKeyName), attributeExists(this.fields.sortKeyName)),
          ),
        )
      : undefined

    const request: DeleteItemCommandInput = {
      TableName: this.tableName,
      Key: this.itemKey("Delete", partitionKey, sortKey),
      ReturnConsumedCapacity: "TOTAL",
      ...(expression && {
        ConditionExpression: expression.condition,
        ExpressionAttributeNames: expression.names,
      }),
    }

    try {
      await this.dispatch(opCtx, "Delete", partitionKey, sortKey, request, (signal) =>
        this.deps.backend.deleteItem(request, signal),
      )
    } catch (err) {
      if (isConditionalCheckFailed(err)) {
        throw new DeleteFailedKeyNotExistsError({ tableName: this.tableName, cause: err })
      }
      throw err
    }
  }

  /**
   * Lists records in a partition whose sort key starts with `prefix`, in
   * ascending sort key order. Expired records the table has not yet removed
   * are included.
   *
   * @throws {InvalidCursorError} when the resume cursor cannot be decoded
   * @throws {UnsupportedCursorAttributeError} when the page ends on a key that
   * is not made of string attributes
   */
  async listBySortKeyPrefix(
    this: TableStore<P, string, V>,
    ctx: CallContext,
    partitionKey: P,
    prefix: string,
    ...options: readonly ReadOption[]
  ): Promise<StoreListResult<V>> {
    const opCtx = withOperationDetails(ctx, "ListBySortKeyPrefix", partitionKey, prefix)
    const opts = applyReadOptions(defaultReadOptions(), options)

    const partitionKeyName = opts.index?.partitionKeyName ?? this.fields.partitionKeyName
    const sortKeyName = opts.index?.sortKeyName ?? this.fields.sortKeyName

    const partition = this.marshalKeyPart("ListBySortKeyPrefix", "partition", partitionKey)
    const expression = this.buildExpression(
      "ListBySortKeyPrefix",
      new ExpressionBuilder().withKeyCondition(
        and(equals(partitionKeyName, partition), beginsWith(sortKeyName, prefix)),
      ),
    )

    const request: QueryCommandInput = {
      TableName: this.tableName,
      KeyConditionExpression: expression.keyCondition,
      ExpressionAttributeNames: expression.names,
      ExpressionAttributeValues: expression.values,
      ReturnConsumedCapacity: "TOTAL",
      ...(opts.index && { IndexName: opts.index.name }),
      ...(opts.consistentRead && { ConsistentRead: true }),
      ...(opts.limit > 0 && { Limit: opts.limit }),
      ...(opts.lastEvaluatedKey !== "" && {
        ExclusiveStartKey: decodeCursor(opts.lastEvaluatedKey),
      }),
    }

    const response = await this.dispatch(
      opCtx,
      "ListBySortKeyPrefix",
      partitionKey,
      prefix,
      request,
      (signal) => this.deps.backend.query(request, signal),
    )

    const values = (response.Items ?? []).map((item) => {
      const payload = item[this.fields.payloadName]
      if (payload === undefined) {
        throw new StoreOperationError(
          "unmarshal_failed",
          `tablekit: failed to unmarshal items, payload attribute "${this.fields.payloadName}" is missing`,
          { operation: "ListBySortKeyPrefix", tableName: this.tableName },
        )
      }
      return this.unmarshalValue("ListBySortKeyPrefix", payload)
    })

    return {
      values,
      result: {
        version: 0,
        lastEvaluatedKey: encodeCursor(response.LastEvaluatedKey),
        ...(response.ConsumedCapacity && { consumedCapacity: response.ConsumedCapacity }),
      },
    }
  }

  private async writeItem(
    ctx: CallContext,
    operation: OperationName,
    partitionKey: P,
    sortKey: S,
    expression: Expression,
  ): Promise<OperationResult> {
    const request: UpdateItemCommandInput = {
      TableName: this.tableName,
      Key: this.itemKey(operation, partitionKey, sortKey),
      UpdateExpression: expression.update,
      ...(expression.condition !== undefined && { ConditionExpression: expression.condition }),
      ExpressionAttributeNames: expression.names,
      ExpressionAttributeValues: expression.values,
      ReturnValues: "ALL_NEW",
      ReturnConsumedCapacity: "TOTAL",
    }

    const response = await this.dispatch(ctx, operation, partitionKey, sortKey, request, (signal) =>
      this.deps.backend.updateItem(request, signal),
    )

    return {
      version: this.decodeVersion(operation, response.Attributes ?? {}),
      ...(response.ConsumedCapacity && { consumedCapacity: response.ConsumedCapacity }),
    }
  }

  /**
   * Runs one backend call between the two hooks. Conditional failures pass
   * through untouched; anything else is wrapped.
   */
  private async dispatch<R extends TableResponse>(
    ctx: CallContext,
    operation: OperationName,
    partitionKey: Key,
    sortKey: Key,
    request: TableRequest,
    call: (signal: AbortSignal | undefined) => Promise<R>,
  ): Promise<R> {
    const hooked = this.options.hooks.requestBuilt(ctx, partitionKey, sortKey, request)

    let response: R
    try {
      response = await call(hooked.signal)
    } catch (err) {
      if (isConditionalCheckFailed(err)) throw err
      throw new StoreOperationError("backend_call_failed", backendFailureMessage[operation], {
        operation,
        tableName: this.tableName,
        cause: err,
      })
    }

    this.options.hooks.responseReceived(hooked, partitionKey, sortKey, response)
    return response
  }

  private buildUpdate(operation: OperationName, value: V, opts: WriteOptions): UpdateBuilder {
    const reserved = reservedFieldNames(this.fields)
    const collision = Object.keys(opts.extraFields).find((name) => reserved.includes(name))
    if (collision !== undefined) throw new ReservedFieldError(collision, reserved)

    const payload = this.marshalValue(operation, value)

    try {
      const update = new UpdateBuilder()
        .add(this.fields.versionName, { N: "1" })
        .set(this.fields.payloadName, payload)

      for (const [name, field] of Object.entries(opts.extraFields)) {
        if (field === undefined) continue
        update.set(name, this.marshalExtraField(operation, name, field))
      }

      if (opts.ttl > 0) {
        const expiresAt = Math.floor((this.options.clock.nowMs() + opts.ttl) / 1000)
        update.set(this.fields.expiresName, { N: String(expiresAt) })
      }

      return update
    } catch (err) {
      if (err instanceof StoreOperationError) throw err
      throw new StoreOperationError("build_update_failed", "tablekit: failed to build update", {
        operation,
        tableName: this.tableName,
        cause: err,
      })
    }
  }

  private buildExpression(operation: OperationName, builder: ExpressionBuilder): Expression {
    try {
      return builder.build()
    } catch (err) {
      throw new StoreOperationError("build_expression_failed", "tablekit: failed to build expression", {
        operation,
        tableName: this.tableName,
        cause: err,
      })
    }
  }

  private itemKey(operation: OperationName, partitionKey: Key, sortKey: Key): Record<string, AttributeValue> {
    return {
      [this.fields.partitionKeyName]: this.marshalKeyPart(operation, "partition", partitionKey),
      [this.fields.sortKeyName]: this.marshalKeyPart(operation, "sort", sortKey),
    }
  }

  private marshalKeyPart(operation: OperationName, part: "partition" | "sort", key: Key): AttributeValue {
    try {
      return marshalKey(key)
    } catch (err) {
      throw new StoreOperationError("marshal_failed", `tablekit: failed to build ${part} key`, {
        operation,
        tableName: this.tableName,
        cause: err,
      })
    }
  }

  private marshalValue(operation: OperationName, value: V): AttributeValue {
    try {
      return this.options.codec.marshal(value)
    } catch (err) {
      throw new StoreOperationError("marshal_failed", "tablekit: failed to marshal value", {
        operation,
        tableName: this.tableName,
        cause: err,
      })
    }
  }

  private marshalExtraField(operation: OperationName, name: string, value: unknown): AttributeValue {
    try {
      return convertExtraField(value)
    } catch (err) {
      throw new StoreOperationError("marshal_failed", `tablekit: failed to marshal field "${name}"`, {
        operation,
        tableName: this.tableName,
        cause: err,
      })
    }
  }

  private unmarshalValue(operation: OperationName, attr: AttributeValue): V {
    try {
      return this.options.codec.unmarshal(attr)
    } catch (err) {
      throw new StoreOperationError("unmarshal_failed", "tablekit: failed to unmarshal value", {
        operation,
        tableName: this.tableName,
        cause: err,
      })
    }
  }

  private decodeVersion(operation: OperationName, item: Record<string, AttributeValue>): number {
    const attr = item[this.fields.versionName]
    if (attr === undefined) return 0

    const version = attr.N === undefined ? Number.NaN : Number(attr.N)
    if (!Number.isSafeInteger(version)) {
      throw new StoreOperationError(
        "unmarshal_failed",
        `tablekit: failed to unmarshal version attribute "${this.fields.versionName}"`,
        { operation, tableName: this.tableName },
      )
    }

    return version
  }
}

const backendFailureMessage: Record<OperationName, string> = {
  Create: "tablekit: failed to create record",
  Get: "tablekit: failed to get record",
  Update: "tablekit: failed to update record",
  Delete: "tablekit: failed to delete record",
  ListBySortKeyPrefix: "tablekit: failed to execute query",
}
