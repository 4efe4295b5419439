import type { CallContext } from "../core/context/call-context"
import type { Key } from "./key"
import type { TableRequest, TableResponse } from "./table-backend"

/**
 * Instrumentation callbacks invoked around every backend call.
 *
 * @remarks
 * For listings `sortKey` is the requested prefix. Hooks must not throw; they
 * are never needed for correctness.
 */
export type StoreHooks = {
  /**
   * Called with the fully built request just before dispatch. The returned
   * context is the one the backend call and `responseReceived` see.
   */
  requestBuilt(
    ctx: CallContext,
    partitionKey: Key,
    sortKey: Key,
    request: TableRequest,
  ): CallContext

  /** Called after a successful response, before it is decoded. */
  responseReceived(
    ctx: CallContext,
    partitionKey: Key,
    sortKey: Key,
    response: TableResponse,
  ): CallContext
}
