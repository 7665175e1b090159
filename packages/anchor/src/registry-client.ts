/**
 * EVM Merkle root registry client.
 *
 * The registry contract exposes:
 *   function updateRoot(bytes32 root)
 *   function latestRoot() view returns (bytes32)
 *   event RootUpdated(bytes32 root, uint256 timestamp)
 */

import {
  createPublicClient,
  createWalletClient,
  http,
  parseAbi,
  type Chain,
  type HttpTransport,
  type PublicClient,
  type WalletClient,
  type Account,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { resolveChain } from "./chains.js";
import type { AnchorReceipt, EvmRegistryConfig, RegistryClient } from "./types.js";
import { AnchorError } from "./types.js";

export const REGISTRY_ABI = parseAbi([
  "function updateRoot(bytes32 root)",
  "function latestRoot() view returns (bytes32)",
  "event RootUpdated(bytes32 root, uint256 timestamp)",
]);

const ZERO_ROOT = /^0x0{64}$/;

export class EvmRegistryClient implements RegistryClient {
  private readonly publicClient: PublicClient<HttpTransport, Chain>;
  private readonly walletClient: WalletClient<HttpTransport, Chain, Account>;
  private readonly address: `0x${string}`;
  private readonly timeoutMs: number;

  constructor(config: EvmRegistryConfig) {
    const chain = resolveChain(config.chainId, config.rpcUrl);
    this.timeoutMs = config.timeoutMs ?? 30_000;
    const transport = http(config.rpcUrl, { timeout: this.timeoutMs });

    this.address = config.registryAddress;
    this.publicClient = createPublicClient({ chain, transport });
    this.walletClient = createWalletClient({
      account: privateKeyToAccount(config.privateKey),
      chain,
      transport,
    });
  }

  async updateRoot(root: string): Promise<AnchorReceipt> {
    const hash = await this.walletClient.writeContract({
      address: this.address,
      abi: REGISTRY_ABI,
      functionName: "updateRoot",
      args: [`0x${root}`],
    });

    const receipt = await this.publicClient.waitForTransactionReceipt({
      hash,
      timeout: this.timeoutMs,
    });

    if (receipt.status !== "success") {
      throw new AnchorError(
        "SUBMIT_FAILED",
        `Registry transaction ${hash} reverted: execution reverted`,
      );
    }

    return {
      root,
      ref: hash,
      blockNumber: receipt.blockNumber.toString(),
    };
  }

  async latestRoot(): Promise<string | null> {
    const value = await this.publicClient.readContract({
      address: this.address,
      abi: REGISTRY_ABI,
      functionName: "latestRoot",
    });

    return ZERO_ROOT.test(value) ? null : value.slice(2).toLowerCase();
  }
}
