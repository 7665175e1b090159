/**
 * @resonance/supply — One-time burn bookkeeping.
 *
 * @packageDocumentation
 */

export { BurnController } from "./burn-controller.js";
export type { BurnControllerOptions } from "./burn-controller.js";
export {
  FileSupplyStateStore,
  InMemorySupplyStateStore,
  computeStateHash,
  serializeSupplyState,
  deserializeSupplyState,
} from "./supply-store.js";
export { SupplyError } from "./types.js";
export type {
  BurnEvaluation,
  SerializedSupplyState,
  SupplyErrorCode,
  SupplyStateStore,
} from "./types.js";
