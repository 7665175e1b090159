/**
 * Shared fixtures for watcher tests.
 */

import type { ConfirmationEvent } from "@resonance/types";
import {
  CircuitBreaker,
  createCallPolicy,
  type AnchorReceipt,
  type CallPolicy,
  type RegistryClient,
} from "@resonance/anchor";
import { parseKeyring } from "@resonance/record-store";
import type { ConfirmationSource } from "../src/types.js";

export const keyring = parseKeyring({
  encryptionKey: "11".repeat(32),
  hmacKey: "22".repeat(32),
});

export class FakeSource implements ConfirmationSource {
  headBlock = 10;
  events: ConfirmationEvent[] = [];
  headFailures = 0;
  readonly fetchCalls: Array<[number, number]> = [];

  async head(): Promise<number> {
    if (this.headFailures > 0) {
      this.headFailures--;
      throw new Error("fetch failed");
    }
    return this.headBlock;
  }

  async fetch(fromBlock: number, toBlock: number): Promise<readonly ConfirmationEvent[]> {
    this.fetchCalls.push([fromBlock, toBlock]);
    return this.events.filter(
      (e) =>
        e.cursorPosition.blockNumber >= fromBlock && e.cursorPosition.blockNumber <= toBlock,
    );
  }
}

export class FakeRegistry implements RegistryClient {
  readonly submitted: string[] = [];

  async updateRoot(root: string): Promise<AnchorReceipt> {
    this.submitted.push(root);
    return { root, ref: `0xtx${this.submitted.length}`, blockNumber: "1" };
  }

  async latestRoot(): Promise<string | null> {
    return this.submitted[this.submitted.length - 1] ?? null;
  }
}

export function transfer(
  externalRef: string,
  blockNumber: number,
  value = "10",
  logIndex = 0,
): ConfirmationEvent {
  return {
    externalRef,
    fromParty: "0x00000000000000000000000000000000000000aa",
    toParty: "0x00000000000000000000000000000000000000bb",
    value,
    cursorPosition: { blockNumber, logIndex },
  };
}

export function fastPolicy(maxAttempts = 3): CallPolicy {
  return createCallPolicy({
    retry: { maxAttempts, baseDelayMs: 1, maxDelayMs: 1, jitterMs: 0 },
    breaker: new CircuitBreaker({ failureThreshold: 100 }),
    timeoutMs: 1000,
    sleep: async () => {},
  });
}
