/**
 * @resonance/watcher — Polls confirmations and drives reconciliation.
 *
 * @packageDocumentation
 */

export { ConfirmationWatcher } from "./watcher.js";
export type { ConfirmationWatcherOptions, RecordProof } from "./watcher.js";
export { EvmTransferSource, compareEvents } from "./evm-transfer-source.js";
export { FileCursorStore, InMemoryCursorStore } from "./cursor-store.js";
export { WatcherError, CursorError } from "./types.js";
export type {
  ConfirmationSource,
  EvmTransferSourceConfig,
  CursorStore,
  EventOutcome,
  BatchResult,
  CommitmentSummary,
  WatcherStatus,
  WatcherErrorCode,
  CursorErrorCode,
} from "./types.js";
