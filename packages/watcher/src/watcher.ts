/**
 * Confirmation Watcher — Reconciles external confirmations with local
 * markers.
 *
 * One polling cycle:
 * 1. Read events from the block after the cursor up to the safe head
 * 2. For each event in order: resolve (or synthesize) the marker, store
 *    the record, link the confirmation
 * 3. Advance the cursor only after the whole batch succeeded
 *
 * On its own cadence the watcher commits the record set to a Merkle root
 * and hands it to the anchor publisher without waiting for the write.
 *
 * Every step of (2) is idempotent, so a batch replayed after a crash
 * produces no new blobs and no new transitions.
 */

import pino from "pino";
import type { Logger } from "pino";
import { createCallPolicy, guardedCall, type AnchorPublisher, type CallPolicy } from "@resonance/anchor";
import type { MarkerTable } from "@resonance/markers";
import { commit, proveInclusion, type MerkleProof } from "@resonance/proof";
import type { RecordStore } from "@resonance/record-store";
import { isConfirmationEvent } from "@resonance/types";
import type {
  ConfirmationEvent,
  MarkerPayload,
  MerkleCommitment,
} from "@resonance/types";
import type {
  BatchResult,
  CommitmentSummary,
  ConfirmationSource,
  CursorStore,
  EventOutcome,
  WatcherStatus,
} from "./types.js";
import { WatcherError } from "./types.js";

export interface ConfirmationWatcherOptions {
  readonly source: ConfirmationSource;
  readonly markers: MarkerTable;
  readonly records: RecordStore;
  readonly publisher: AnchorPublisher;
  readonly cursor: CursorStore;
  /** First block to read when no cursor is stored (default: current head) */
  readonly startBlock?: number;
  /** Blocks behind head treated as final (default: 0) */
  readonly confirmations?: number;
  /** Max blocks per batch (default: 2000) */
  readonly maxBlockSpan?: number;
  readonly pollIntervalMs?: number;
  readonly commitIntervalMs?: number;
  readonly policy?: CallPolicy;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

export interface RecordProof {
  readonly externalRef: string;
  readonly resonanceId: string;
  readonly commitment: CommitmentSummary;
  readonly proof: MerkleProof;
}

export class ConfirmationWatcher {
  private readonly source: ConfirmationSource;
  private readonly markers: MarkerTable;
  private readonly records: RecordStore;
  private readonly publisher: AnchorPublisher;
  private readonly cursor: CursorStore;
  private readonly startBlock: number | undefined;
  private readonly confirmations: number;
  private readonly maxBlockSpan: number;
  private readonly pollIntervalMs: number;
  private readonly commitIntervalMs: number;
  private readonly policy: CallPolicy;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private running = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;

  /** Serializes pollOnce() */
  private polling: Promise<unknown> = Promise.resolve();

  private latest: MerkleCommitment | null = null;
  private lastPollAt: string | null = null;
  private lastCommitAt: string | null = null;
  private lastCommitMs = 0;
  private consecutiveFailures = 0;
  private lastError: string | null = null;
  private lastBatch: BatchResult | null = null;

  constructor(options: ConfirmationWatcherOptions) {
    this.source = options.source;
    this.markers = options.markers;
    this.records = options.records;
    this.publisher = options.publisher;
    this.cursor = options.cursor;
    this.startBlock = options.startBlock;
    this.confirmations = options.confirmations ?? 0;
    this.maxBlockSpan = options.maxBlockSpan ?? 2000;
    this.pollIntervalMs = options.pollIntervalMs ?? 10_000;
    this.commitIntervalMs = options.commitIntervalMs ?? 60_000;
    this.policy = options.policy ?? createCallPolicy();
    this.logger = options.logger ?? pino({ level: "silent" });
    this.now = options.now ?? (() => new Date());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Polling
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run one polling cycle.
   *
   * @throws WatcherError POLL_FAILED when the source stays unreachable
   * @throws RecordStoreError when a record cannot be written; the cursor
   *   does not move
   */
  pollOnce(): Promise<BatchResult> {
    const run = this.polling
      .then(() => this.poll())
      .catch((err: unknown) => {
        this.consecutiveFailures++;
        this.lastError = err instanceof Error ? err.message : String(err);
        throw err;
      });
    this.polling = run.catch(() => undefined);
    return run;
  }

  private async poll(): Promise<BatchResult> {
    const head = await this.external("head", () => this.source.head());
    const safeHead = head - this.confirmations;

    let last = this.cursor.load();
    if (last === null) {
      last = this.startBlock !== undefined ? this.startBlock - 1 : safeHead;
      if (last >= 0) {
        this.cursor.advance(last);
      }
      this.logger.info({ cursor: last, head }, "Cursor initialized");
    }

    const fromBlock = Math.max(last + 1, 0);
    const toBlock = Math.min(safeHead, fromBlock + this.maxBlockSpan - 1);
    this.lastPollAt = this.now().toISOString();

    if (toBlock < fromBlock) {
      return this.finishPoll({
        idle: true,
        fromBlock,
        toBlock,
        events: 0,
        confirmed: 0,
        duplicates: 0,
        synthesized: 0,
      });
    }

    const events = await this.external("fetch", () => this.source.fetch(fromBlock, toBlock));

    events.forEach((event: unknown, index) => {
      if (!isConfirmationEvent(event)) {
        throw new WatcherError(
          "POLL_FAILED",
          `Source returned a malformed event at index ${index} of blocks ${fromBlock}-${toBlock}`,
        );
      }
    });

    let confirmed = 0;
    let duplicates = 0;
    let synthesized = 0;

    for (const event of events) {
      const outcome = this.processEvent(event);
      if (outcome === "confirmed") confirmed++;
      else if (outcome === "duplicate") duplicates++;
      else synthesized++;
    }

    this.cursor.advance(toBlock);

    const result = this.finishPoll({
      idle: false,
      fromBlock,
      toBlock,
      events: events.length,
      confirmed,
      duplicates,
      synthesized,
    });
    this.logger.info(result, "Batch processed");
    return result;
  }

  private finishPoll(result: BatchResult): BatchResult {
    this.consecutiveFailures = 0;
    this.lastError = null;
    this.lastBatch = result;
    return result;
  }

  /**
   * Resolve → put → link for a single confirmation.
   */
  private processEvent(event: ConfirmationEvent): EventOutcome {
    const resolution = this.markers.resolveForConfirmation(event);

    if (resolution.kind === "duplicate") {
      this.logger.debug(
        { externalRef: event.externalRef, markerId: resolution.marker.id },
        "Duplicate confirmation",
      );
      return "duplicate";
    }

    const eventPayload: MarkerPayload = {
      from: event.fromParty,
      to: event.toParty,
      value: event.value,
    };
    const markerId = resolution.kind === "unmatched" ? null : resolution.marker.id;

    // Skipped on replay: re-encrypting would change the blob digest
    if (!this.records.has(event.externalRef)) {
      this.records.put(
        event.externalRef,
        resolution.kind === "unmatched" ? eventPayload : resolution.marker.payload,
        {
          ...eventPayload,
          blockNumber: event.cursorPosition.blockNumber,
          logIndex: event.cursorPosition.logIndex,
          resolution: resolution.kind,
        },
      );
    }

    const link = this.markers.linkConfirmation(
      markerId,
      event.externalRef,
      eventPayload,
      event.transactionRef,
    );

    if (link.synthesized) {
      this.logger.info(
        { externalRef: event.externalRef, markerId: link.marker.id },
        "Synthesized marker for confirmation without local intent",
      );
      return "synthesized";
    }
    return link.changed ? "confirmed" : "duplicate";
  }

  private async external<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await guardedCall(label, fn, this.policy, (attempt, err, delayMs) => {
        this.logger.warn({ call: label, attempt, delayMs, err }, "Source call failed, retrying");
      });
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new WatcherError("POLL_FAILED", `Source ${label} failed: ${reason}`, { cause: err });
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Commit + anchor
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Commit the current record set and schedule anchoring when the root
   * differs from the last anchored root.
   *
   * @returns The new commitment, or null when no records exist
   */
  commitAndAnchor(): MerkleCommitment | null {
    const commitment = commit(this.records, this.now);
    this.lastCommitMs = Date.now();
    this.lastCommitAt = this.now().toISOString();

    if (commitment === null) {
      return null;
    }

    this.latest = commitment;

    if (commitment.root !== this.publisher.status().lastAnchoredRoot) {
      this.publisher.schedule(commitment);
    }

    this.logger.info(
      { root: commitment.root, leafCount: commitment.leafCount },
      "Commitment built",
    );
    return this.withAnchorRef(commitment);
  }

  /**
   * Latest commitment, with its registry reference once anchored.
   */
  latestCommitment(): MerkleCommitment | null {
    return this.latest === null ? null : this.withAnchorRef(this.latest);
  }

  /**
   * Inclusion proof of a stored record in the latest commitment.
   *
   * @returns null when there is no commitment or the record is not in it
   */
  proveRecord(externalRef: string): RecordProof | null {
    const commitment = this.latestCommitment();
    if (commitment === null) {
      return null;
    }

    const ref = this.records.refOf(externalRef);
    if (ref === undefined) {
      return null;
    }

    const proof = proveInclusion(commitment, ref.blobDigest);
    if (proof === null) {
      return null;
    }

    return {
      externalRef,
      resonanceId: ref.resonanceId,
      commitment: summarize(commitment),
      proof,
    };
  }

  private withAnchorRef(commitment: MerkleCommitment): MerkleCommitment {
    return { ...commitment, anchoredRef: this.publisher.anchoredRefFor(commitment.root) };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Loop control
  // ───────────────────────────────────────────────────────────────────────

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Start the polling loop.
   *
   * @throws WatcherError ALREADY_RUNNING
   */
  start(): void {
    if (this.running) {
      throw new WatcherError("ALREADY_RUNNING", "Watcher is already running");
    }
    this.running = true;
    this.logger.info(
      { pollIntervalMs: this.pollIntervalMs, commitIntervalMs: this.commitIntervalMs },
      "Watcher started",
    );
    this.loop = this.runLoop();
  }

  /**
   * Stop accepting new cycles and wait for the in-flight one to finish.
   */
  async stop(): Promise<void> {
    if (!this.running && this.loop === null) {
      return;
    }
    this.running = false;
    this.wake?.();
    if (this.loop !== null) {
      await this.loop;
      this.loop = null;
    }
    this.logger.info({ cursor: this.cursor.load() }, "Watcher stopped");
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (err: unknown) {
        this.logger.warn(
          { err, consecutiveFailures: this.consecutiveFailures },
          "Poll failed",
        );
      }

      if (this.running && Date.now() - this.lastCommitMs >= this.commitIntervalMs) {
        try {
          this.commitAndAnchor();
        } catch (err: unknown) {
          this.logger.error({ err }, "Commit failed");
        }
      }

      if (this.running) {
        await this.sleep(this.pollIntervalMs);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Status
  // ───────────────────────────────────────────────────────────────────────

  status(): WatcherStatus {
    const latest = this.latestCommitment();
    return {
      running: this.running,
      cursor: this.cursor.load(),
      lastPollAt: this.lastPollAt,
      lastCommitAt: this.lastCommitAt,
      consecutiveFailures: this.consecutiveFailures,
      lastError: this.lastError,
      lastBatch: this.lastBatch,
      latestCommitment: latest === null ? null : summarize(latest),
    };
  }
}

function summarize(commitment: MerkleCommitment): CommitmentSummary {
  return {
    root: commitment.root,
    leafCount: commitment.leafCount,
    committedAt: commitment.committedAt,
    anchoredRef: commitment.anchoredRef,
  };
}
