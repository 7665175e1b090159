/**
 * Chain id → viem Chain.
 *
 * Known ids map to viem's definitions; anything else gets a minimal
 * definition pointing at the configured RPC URL.
 */

import { defineChain, type Chain } from "viem";
import {
  arbitrum,
  base,
  mainnet,
  optimism,
  polygon,
  sepolia,
} from "viem/chains";

const VIEM_CHAINS: Readonly<Record<number, Chain>> = {
  1: mainnet,
  11155111: sepolia,
  8453: base,
  42161: arbitrum,
  10: optimism,
  137: polygon,
};

export function resolveChain(chainId: number, rpcUrl: string): Chain {
  return (
    VIEM_CHAINS[chainId] ??
    defineChain({
      id: chainId,
      name: `evm-${chainId}`,
      nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
      rpcUrls: { default: { http: [rpcUrl] } },
    })
  );
}
