import { type Clock, type Milliseconds, SystemClock } from "@tablekit/clock"
import type { LogMeta, Logger } from "@tablekit/logger"

import type { StoreHooks } from "../../ports/hooks"
import type { TableRequest } from "../../ports/table-backend"
import { type CallContext, ContextKey } from "../context/call-context"
import { operationDetailsFromContext } from "../context/operation-details"

export type LoggingHooksOptions = {
  /** Clock used to time backend calls. Defaults to the system clock. */
  clock?: Clock
  level?: "trace" | "debug" | "info"
}

const requestStartedAt = new ContextKey<Milliseconds>("tablekit.requestStartedAt")

/**
 * Hooks that log each backend call: once when the request is built and once
 * when the response arrives, with the call's duration.
 */
export function createLoggingHooks(logger: Logger, options: LoggingHooksOptions = {}): StoreHooks {
  const clock = options.clock ?? new SystemClock()
  const level = options.level ?? "debug"

  return {
    requestBuilt(ctx, _partitionKey, _sortKey, request) {
      logger[level]("table request built", { ...operationMeta(ctx), ...requestMeta(request) })

      return ctx.withValue(requestStartedAt, clock.nowMs())
    },

    responseReceived(ctx, _partitionKey, _sortKey, response) {
      const startedAt = ctx.value(requestStartedAt)

      logger[level]("table response received", {
        ...operationMeta(ctx),
        ...(startedAt !== undefined && { durationMs: clock.nowMs() - startedAt }),
        ...(response.ConsumedCapacity && { consumedCapacity: response.ConsumedCapacity }),
      })

      return ctx
    },
  }
}

function operationMeta(ctx: CallContext): LogMeta {
  const details = operationDetailsFromContext(ctx)
  if (!details) return {}

  return {
    operation: details.name,
    partitionKey: details.partitionKey,
    sortKey: details.sortKey,
  }
}

function requestMeta(request: TableRequest): LogMeta {
  return {
    ...(request.TableName !== undefined && { tableName: request.TableName }),
    ...("IndexName" in request &&
      request.IndexName !== undefined && { indexName: request.IndexName }),
  }
}
