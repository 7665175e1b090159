/**
 * EVM Transfer Source — ERC-20 Transfer events as confirmations.
 *
 * Read-only: uses viem's public client. Each Transfer log becomes one
 * ConfirmationEvent keyed by `<transactionHash>:<logIndex>`, with the
 * transaction hash kept as transactionRef.
 */

import {
  createPublicClient,
  http,
  parseAbiItem,
  type Chain,
  type HttpTransport,
  type PublicClient,
} from "viem";
import { resolveChain } from "@resonance/anchor";
import type { ConfirmationEvent } from "@resonance/types";
import type { ConfirmationSource, EvmTransferSourceConfig } from "./types.js";

const ERC20_TRANSFER_EVENT = parseAbiItem(
  "event Transfer(address indexed from, address indexed to, uint256 value)",
);

export function compareEvents(a: ConfirmationEvent, b: ConfirmationEvent): number {
  return (
    a.cursorPosition.blockNumber - b.cursorPosition.blockNumber ||
    a.cursorPosition.logIndex - b.cursorPosition.logIndex
  );
}

export class EvmTransferSource implements ConfirmationSource {
  private readonly client: PublicClient<HttpTransport, Chain>;
  private readonly tokenAddress: `0x${string}`;

  constructor(config: EvmTransferSourceConfig) {
    this.tokenAddress = config.tokenAddress;
    this.client = createPublicClient({
      chain: resolveChain(config.chainId, config.rpcUrl),
      transport: http(config.rpcUrl, { timeout: config.timeoutMs ?? 30_000 }),
    });
  }

  async head(): Promise<number> {
    return Number(await this.client.getBlockNumber());
  }

  async fetch(fromBlock: number, toBlock: number): Promise<readonly ConfirmationEvent[]> {
    const logs = await this.client.getLogs({
      address: this.tokenAddress,
      event: ERC20_TRANSFER_EVENT,
      fromBlock: BigInt(fromBlock),
      toBlock: BigInt(toBlock),
    });

    const events: ConfirmationEvent[] = [];

    for (const log of logs) {
      const { from, to, value } = log.args;
      // Undecodable or still-pending logs carry no usable confirmation
      if (
        from === undefined ||
        to === undefined ||
        value === undefined ||
        log.transactionHash === null ||
        log.blockNumber === null ||
        log.logIndex === null
      ) {
        continue;
      }

      events.push({
        externalRef: `${log.transactionHash}:${log.logIndex}`,
        transactionRef: log.transactionHash,
        fromParty: from,
        toParty: to,
        value: value.toString(),
        cursorPosition: {
          blockNumber: Number(log.blockNumber),
          logIndex: log.logIndex,
        },
      });
    }

    return events.sort(compareEvents);
  }
}
