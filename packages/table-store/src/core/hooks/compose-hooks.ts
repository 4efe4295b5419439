import type { StoreHooks } from "../../ports/hooks"

/**
 * Runs several hook sets in order, threading the context each returns into
 * the next.
 */
export function composeHooks(...hooks: readonly StoreHooks[]): StoreHooks {
  return {
    requestBuilt: (ctx, partitionKey, sortKey, request) =>
      hooks.reduce((acc, h) => h.requestBuilt(acc, partitionKey, sortKey, request), ctx),
    responseReceived: (ctx, partitionKey, sortKey, response) =>
      hooks.reduce((acc, h) => h.responseReceived(acc, partitionKey, sortKey, response), ctx),
  }
}
