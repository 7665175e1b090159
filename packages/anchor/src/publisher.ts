/**
 * Anchor Publisher — Writes Merkle roots to the external registry.
 *
 * Two entry points:
 * - anchor(commitment): awaited, single operation
 * - schedule(commitment): returns immediately; a background worker
 *   anchors the most recently scheduled commitment
 *
 * Rules:
 * - A root equal to the last anchored root is never resubmitted
 * - A commitment over fewer leaves than the last anchored one is skipped,
 *   so the registry never regresses to an older snapshot
 * - Anchors run one at a time
 * - Failures are retried with backoff; they never reach the ingestion path
 */

import pino from "pino";
import type { Logger } from "pino";
import type { MerkleCommitment } from "@resonance/types";
import { InMemoryAnchorStateStore } from "./anchor-state.js";
import { createCallPolicy, guardedCall, type CallPolicy } from "./resilience/guarded-call.js";
import type {
  AnchorActivity,
  AnchorOutcome,
  AnchorState,
  AnchorStateStore,
  AnchorStatus,
  RegistryClient,
} from "./types.js";
import { AnchorError } from "./types.js";

export interface AnchorPublisherOptions {
  /** Registry to write to. null disables anchoring. */
  readonly client: RegistryClient | null;
  readonly store?: AnchorStateStore;
  readonly policy?: CallPolicy;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

export class AnchorPublisher {
  private readonly client: RegistryClient | null;
  private readonly store: AnchorStateStore;
  private readonly policy: CallPolicy;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private state: AnchorState | null;
  private activity: AnchorActivity = "idle";
  private lastError: string | null = null;

  /** Serializes anchor() calls */
  private queue: Promise<unknown> = Promise.resolve();

  /** Latest-wins slot for schedule() */
  private pending: MerkleCommitment | null = null;
  private worker: Promise<void> | null = null;

  constructor(options: AnchorPublisherOptions) {
    this.client = options.client;
    this.store = options.store ?? new InMemoryAnchorStateStore();
    this.policy = options.policy ?? createCallPolicy();
    this.logger = options.logger ?? pino({ level: "silent" });
    this.now = options.now ?? (() => new Date());
    this.state = this.store.load();
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Awaited path
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Anchor one commitment.
   *
   * @throws AnchorError NOT_CONFIGURED when no registry client is set
   * @throws AnchorError SUBMIT_FAILED when the write fails after retries
   */
  anchor(commitment: MerkleCommitment): Promise<AnchorOutcome> {
    const run = this.queue.then(() => this.anchorNow(commitment));
    // Keep the queue alive past a failed anchor
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async anchorNow(commitment: MerkleCommitment): Promise<AnchorOutcome> {
    const client = this.client;
    if (client === null) {
      throw new AnchorError("NOT_CONFIGURED", "No registry client configured");
    }

    const { root, leafCount } = commitment;

    if (this.state !== null && root === this.state.lastRoot) {
      this.logger.debug({ root }, "Root already anchored");
      return { kind: "unchanged", root };
    }

    if (this.state !== null && leafCount < this.state.leafCount) {
      this.logger.warn(
        { root, leafCount, anchoredLeafCount: this.state.leafCount },
        "Skipping stale commitment",
      );
      return { kind: "stale", root, leafCount };
    }

    this.activity = "anchoring";

    try {
      const receipt = await guardedCall(
        "updateRoot",
        () => client.updateRoot(root),
        this.policy,
        (attempt, err, delayMs) => {
          this.activity = "retrying";
          this.lastError = errorMessage(err);
          this.logger.warn({ root, attempt, delayMs, err }, "Anchor attempt failed, retrying");
        },
      );

      const next: AnchorState = {
        lastRoot: root,
        leafCount,
        anchoredRef: receipt.ref,
        anchoredAt: this.now().toISOString(),
      };
      this.store.save(next);
      this.state = next;
      this.activity = "idle";
      this.lastError = null;

      this.logger.info(
        { root, leafCount, ref: receipt.ref, blockNumber: receipt.blockNumber },
        "Anchor submitted",
      );
      return { kind: "anchored", receipt };
    } catch (err: unknown) {
      this.activity = "degraded";
      this.lastError = errorMessage(err);
      this.logger.error({ root, err }, "Anchor failed");
      throw new AnchorError("SUBMIT_FAILED", `Failed to anchor root ${root}: ${this.lastError}`, {
        cause: err,
      });
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Decoupled path
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Queue a commitment for background anchoring and return at once.
   * A newer scheduled commitment replaces one that has not started yet.
   */
  schedule(commitment: MerkleCommitment): void {
    if (this.client === null) {
      this.logger.debug({ root: commitment.root }, "Anchoring disabled, not scheduling");
      return;
    }

    if (this.pending === null || commitment.leafCount >= this.pending.leafCount) {
      this.pending = commitment;
    }

    this.startWorker();
  }

  /**
   * Resolve once every scheduled commitment has been processed.
   */
  async drain(): Promise<void> {
    while (this.worker !== null) {
      await this.worker;
    }
  }

  private startWorker(): void {
    if (this.worker !== null) return;
    this.worker = this.runWorker().finally(() => {
      this.worker = null;
      // A schedule() that landed after the loop's last check
      if (this.pending !== null) this.startWorker();
    });
  }

  private async runWorker(): Promise<void> {
    while (this.pending !== null) {
      const next = this.pending;
      this.pending = null;
      try {
        await this.anchor(next);
      } catch (err: unknown) {
        // Already logged and reflected in status(); the next schedule retries
        this.logger.debug({ root: next.root, err }, "Scheduled anchor gave up");
      }
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  status(): AnchorStatus {
    return {
      enabled: this.enabled,
      state: this.activity,
      lastAnchoredRoot: this.state?.lastRoot ?? null,
      lastAnchoredRef: this.state?.anchoredRef ?? null,
      lastAnchoredAt: this.state?.anchoredAt ?? null,
      pendingRoot: this.pending?.root ?? null,
      lastError: this.lastError,
    };
  }

  /**
   * Registry reference for `root`, when it is the last anchored root.
   */
  anchoredRefFor(root: string): string | null {
    return this.state !== null && this.state.lastRoot === root ? this.state.anchoredRef : null;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
