/**
 * @resonance/watcher — Core types.
 */

import type { ConfirmationEvent } from "@resonance/types";

// =============================================================================
// Event source
// =============================================================================

/**
 * External confirmation feed, queryable by block range.
 */
export interface ConfirmationSource {
  /** Current chain head block number. */
  head(): Promise<number>;

  /**
   * Events in [fromBlock, toBlock], ordered by (blockNumber, logIndex).
   */
  fetch(fromBlock: number, toBlock: number): Promise<readonly ConfirmationEvent[]>;
}

export interface EvmTransferSourceConfig {
  readonly rpcUrl: string;
  readonly chainId: number;
  /** ERC-20 whose Transfer events are the feed */
  readonly tokenAddress: `0x${string}`;
  /** Transport timeout in ms (default: 30000) */
  readonly timeoutMs?: number;
}

// =============================================================================
// Cursor
// =============================================================================

/**
 * Last fully processed block. Only moves forward.
 */
export interface CursorStore {
  load(): number | null;

  /** @throws CursorError CURSOR_REGRESSION when blockNumber is behind */
  advance(blockNumber: number): void;
}

// =============================================================================
// Watcher
// =============================================================================

export type EventOutcome = "confirmed" | "duplicate" | "synthesized";

export interface BatchResult {
  /** True when the safe head had not moved past the cursor */
  readonly idle: boolean;
  readonly fromBlock: number;
  readonly toBlock: number;
  readonly events: number;
  readonly confirmed: number;
  readonly duplicates: number;
  readonly synthesized: number;
}

export interface CommitmentSummary {
  readonly root: string;
  readonly leafCount: number;
  readonly committedAt: string;
  readonly anchoredRef: string | null;
}

export interface WatcherStatus {
  readonly running: boolean;
  readonly cursor: number | null;
  readonly lastPollAt: string | null;
  readonly lastCommitAt: string | null;
  readonly consecutiveFailures: number;
  readonly lastError: string | null;
  readonly lastBatch: BatchResult | null;
  readonly latestCommitment: CommitmentSummary | null;
}

// =============================================================================
// Errors
// =============================================================================

export type WatcherErrorCode = "POLL_FAILED" | "ALREADY_RUNNING";

export class WatcherError extends Error {
  public readonly code: WatcherErrorCode;
  constructor(code: WatcherErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "WatcherError";
    this.code = code;
  }
}

export type CursorErrorCode = "CURSOR_REGRESSION" | "CORRUPT_CURSOR";

export class CursorError extends Error {
  public readonly code: CursorErrorCode;
  constructor(code: CursorErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CursorError";
    this.code = code;
  }
}
