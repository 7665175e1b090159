/**
 * @resonance/anchor — Core types.
 */

// =============================================================================
// Registry
// =============================================================================

/**
 * Proof that a root was written to the external registry.
 */
export interface AnchorReceipt {
  /** Anchored Merkle root (64-char hex, no 0x) */
  readonly root: string;

  /** Registry transaction reference (tx hash) */
  readonly ref: string;

  /** Block the transaction was included in (decimal string) */
  readonly blockNumber: string;
}

/**
 * External Merkle root registry.
 */
export interface RegistryClient {
  /** Write a root. Resolves once the write is included. */
  updateRoot(root: string): Promise<AnchorReceipt>;

  /** Most recently registered root, or null when none was ever written. */
  latestRoot(): Promise<string | null>;
}

export interface EvmRegistryConfig {
  readonly rpcUrl: string;
  readonly chainId: number;
  readonly registryAddress: `0x${string}`;
  readonly privateKey: `0x${string}`;
  /** Transport and receipt timeout in ms (default: 30000) */
  readonly timeoutMs?: number;
}

// =============================================================================
// Publisher
// =============================================================================

/**
 * Durable record of the last successful anchor.
 */
export interface AnchorState {
  readonly lastRoot: string;
  readonly leafCount: number;
  readonly anchoredRef: string;
  readonly anchoredAt: string;
}

export interface AnchorStateStore {
  load(): AnchorState | null;
  save(state: AnchorState): void;
}

/**
 * - anchored: the root was submitted
 * - unchanged: equal to the last anchored root, nothing submitted
 * - stale: built from fewer leaves than the last anchored root
 */
export type AnchorOutcome =
  | { readonly kind: "anchored"; readonly receipt: AnchorReceipt }
  | { readonly kind: "unchanged"; readonly root: string }
  | { readonly kind: "stale"; readonly root: string; readonly leafCount: number };

export type AnchorActivity = "idle" | "anchoring" | "retrying" | "degraded";

export interface AnchorStatus {
  readonly enabled: boolean;
  readonly state: AnchorActivity;
  readonly lastAnchoredRoot: string | null;
  readonly lastAnchoredRef: string | null;
  readonly lastAnchoredAt: string | null;
  readonly pendingRoot: string | null;
  readonly lastError: string | null;
}

// =============================================================================
// Errors
// =============================================================================

export type AnchorErrorCode = "SUBMIT_FAILED" | "NOT_CONFIGURED" | "CORRUPT_STATE";

export class AnchorError extends Error {
  public readonly code: AnchorErrorCode;
  constructor(code: AnchorErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AnchorError";
    this.code = code;
  }
}
