import type { StoreHooks } from "../../ports/hooks"

export const noopHooks: StoreHooks = Object.freeze({
  requestBuilt: (ctx) => ctx,
  responseReceived: (ctx) => ctx,
})
