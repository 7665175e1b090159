/**
 * ReconcilerContext — Composition root for the domain packages.
 *
 * Route handlers delegate to this context; it owns every store under
 * DATA_DIR and wires the watcher, publisher and burn controller
 * together. External dependencies (key material, confirmation source,
 * registry client) are passed in, so tests can swap them for fakes.
 *
 * DATA_DIR layout:
 *   records/         encrypted blobs
 *   markers.jsonl    marker journal
 *   cursor.json      watcher cursor
 *   anchor.json      last anchored root
 *   supply.json      burn bookkeeping
 */

import { join } from "node:path";
import pino from "pino";
import type { Logger } from "pino";
import {
  AnchorPublisher,
  CircuitBreaker,
  DEFAULT_RETRY_CONFIG,
  EvmRegistryClient,
  FileAnchorStateStore,
  createCallPolicy,
  type CallPolicy,
  type RegistryClient,
} from "@resonance/anchor";
import { JsonlMarkerJournal, MarkerTable } from "@resonance/markers";
import { FileRecordStore, loadKeyring, type Keyring } from "@resonance/record-store";
import { BurnController, FileSupplyStateStore } from "@resonance/supply";
import {
  ConfirmationWatcher,
  EvmTransferSource,
  FileCursorStore,
  type ConfirmationSource,
} from "@resonance/watcher";
import type { AppConfig } from "../config.js";

/** Consecutive failed polls after which the node reports not ready */
export const DEGRADED_AFTER_FAILURES = 3;

export interface ReconcilerDeps {
  readonly keyring: Keyring;
  readonly source: ConfirmationSource;
  /** null disables anchoring */
  readonly registry: RegistryClient | null;
  readonly logger?: Logger;
  readonly now?: () => Date;
  /** Overrides the configured call policy (tests) */
  readonly policy?: () => CallPolicy;
}

export interface Readiness {
  readonly ready: boolean;
  readonly watcher: "ok" | "degraded";
  readonly store: "ok" | "down";
  readonly detail?: string;
}

export class ReconcilerContext {
  readonly records: FileRecordStore;
  readonly markers: MarkerTable;
  readonly publisher: AnchorPublisher;
  readonly watcher: ConfirmationWatcher;
  readonly supply: BurnController;
  readonly logger: Logger;

  constructor(config: AppConfig, deps: ReconcilerDeps) {
    const dataDir = config.DATA_DIR;
    const logger = deps.logger ?? pino({ level: "silent" });
    const now = deps.now ?? (() => new Date());
    const policy = deps.policy ?? (() => policyFromConfig(config, logger));

    this.logger = logger;

    this.records = new FileRecordStore({
      directory: join(dataDir, "records"),
      keyring: deps.keyring,
    });

    this.markers = new MarkerTable({
      journal: new JsonlMarkerJournal(join(dataDir, "markers.jsonl")),
      now,
    });

    this.publisher = new AnchorPublisher({
      client: deps.registry,
      store: new FileAnchorStateStore(join(dataDir, "anchor.json")),
      policy: policy(),
      logger: logger.child({ component: "anchor" }),
      now,
    });

    this.watcher = new ConfirmationWatcher({
      source: deps.source,
      markers: this.markers,
      records: this.records,
      publisher: this.publisher,
      cursor: new FileCursorStore(join(dataDir, "cursor.json"), now),
      ...(config.START_BLOCK !== undefined && { startBlock: config.START_BLOCK }),
      confirmations: config.CONFIRMATIONS,
      maxBlockSpan: config.MAX_BLOCK_SPAN,
      pollIntervalMs: config.POLL_INTERVAL_MS,
      commitIntervalMs: config.COMMIT_INTERVAL_MS,
      policy: policy(),
      logger: logger.child({ component: "watcher" }),
      now,
    });

    this.supply = new BurnController({
      totalSupply: config.TOTAL_SUPPLY,
      burnTarget: config.BURN_TARGET,
      store: new FileSupplyStateStore(join(dataDir, "supply.json")),
      logger: logger.child({ component: "supply" }),
      now,
    });

    logger.info(
      {
        dataDir,
        records: this.records.size(),
        markers: this.markers.counts(),
        anchoring: this.publisher.enabled,
      },
      "Reconciler context ready",
    );
  }

  /**
   * Build the production context: key file, EVM transfer feed and,
   * when enabled, the EVM root registry.
   *
   * @throws RecordStoreError KEY_UNAVAILABLE when the key file is unusable
   */
  static fromConfig(config: AppConfig, logger: Logger): ReconcilerContext {
    const keyring = loadKeyring(config.RECORD_KEY_FILE);

    const source = new EvmTransferSource({
      rpcUrl: config.RPC_URL,
      chainId: config.CHAIN_ID,
      tokenAddress: config.TOKEN_ADDRESS,
      timeoutMs: config.RPC_TIMEOUT_MS,
    });

    let registry: RegistryClient | null = null;
    if (
      config.ANCHOR_ENABLED &&
      config.REGISTRY_ADDRESS !== undefined &&
      config.ANCHOR_PRIVATE_KEY !== undefined
    ) {
      registry = new EvmRegistryClient({
        rpcUrl: config.RPC_URL,
        chainId: config.CHAIN_ID,
        registryAddress: config.REGISTRY_ADDRESS,
        privateKey: config.ANCHOR_PRIVATE_KEY,
        timeoutMs: config.RPC_TIMEOUT_MS,
      });
    } else {
      logger.warn("Anchoring disabled: commitments are built but not published");
    }

    return new ReconcilerContext(config, { keyring, source, registry, logger });
  }

  readiness(): Readiness {
    const failures = this.watcher.status().consecutiveFailures;
    const watcher = failures >= DEGRADED_AFTER_FAILURES ? "degraded" : "ok";

    let store: Readiness["store"] = "ok";
    let detail: string | undefined;
    try {
      this.records.size();
    } catch (err: unknown) {
      store = "down";
      detail = err instanceof Error ? err.message : String(err);
    }

    if (watcher === "degraded" && detail === undefined) {
      detail = `${failures} consecutive poll failures`;
    }

    return {
      ready: watcher === "ok" && store === "ok",
      watcher,
      store,
      ...(detail !== undefined && { detail }),
    };
  }

  /**
   * Stop polling after the in-flight batch, then let scheduled anchors finish.
   */
  async shutdown(): Promise<void> {
    await this.watcher.stop();
    await this.publisher.drain();
  }
}

/**
 * One policy per external endpoint: the source and the registry each
 * get their own breaker.
 */
function policyFromConfig(config: AppConfig, logger: Logger): CallPolicy {
  return createCallPolicy({
    retry: {
      maxAttempts: config.RETRY_MAX_ATTEMPTS,
      baseDelayMs: config.RETRY_BASE_DELAY_MS,
      maxDelayMs: config.RETRY_MAX_DELAY_MS,
      jitterMs: DEFAULT_RETRY_CONFIG.jitterMs,
    },
    breaker: new CircuitBreaker({
      failureThreshold: config.BREAKER_FAILURE_THRESHOLD,
      resetTimeoutMs: config.BREAKER_RESET_MS,
      onStateChange: (from, to, reason) => {
        logger.warn({ from, to, reason }, "Circuit breaker state change");
      },
    }),
    timeoutMs: config.RPC_TIMEOUT_MS,
  });
}
