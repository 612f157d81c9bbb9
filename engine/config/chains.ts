/**
 * Blockchain network configuration for the lending engine
 * 
 * Each chain carries its own LTV ceiling: pools created on a chain
 * may not exceed that chain's maxLtv. The bridge endpoint id is the
 * messenger's identifier for the chain (not the EVM chain id).
 */

import { LendingError } from '../utils/errors.js';

/**
 * Chain configuration
 */
export interface ChainConfig {
  /** EVM chain id */
  chainId: number;
  /** Human-readable name */
  name: string;
  /** Native token symbol */
  nativeToken: string;
  /** Wrapped native token symbol */
  wrappedNativeToken: string;
  /** Highest pool LTV allowed on this chain (WAD, 1e18 = 100%) */
  maxLtv: bigint;
  /** Messenger endpoint identifier */
  bridgeEndpointId: number;
  /** Block explorer URL */
  explorer: string;
}

/**
 * Chain IDs as constants
 */
export const CHAIN_IDS = {
  MAINNET: 1,
  OPTIMISM: 10,
  ARBITRUM: 42161,
  BASE: 8453,
} as const;

/**
 * Supported chains with full configuration
 */
export const CHAINS: Record<number, ChainConfig> = {
  [CHAIN_IDS.MAINNET]: {
    chainId: 1,
    name: 'Ethereum Mainnet',
    nativeToken: 'ETH',
    wrappedNativeToken: 'WETH',
    maxLtv: 850_000_000_000_000_000n,
    bridgeEndpointId: 30101,
    explorer: 'https://etherscan.io',
  },
  [CHAIN_IDS.OPTIMISM]: {
    chainId: 10,
    name: 'Optimism',
    nativeToken: 'ETH',
    wrappedNativeToken: 'WETH',
    maxLtv: 800_000_000_000_000_000n,
    bridgeEndpointId: 30111,
    explorer: 'https://optimistic.etherscan.io',
  },
  [CHAIN_IDS.ARBITRUM]: {
    chainId: 42161,
    name: 'Arbitrum One',
    nativeToken: 'ETH',
    wrappedNativeToken: 'WETH',
    maxLtv: 800_000_000_000_000_000n,
    bridgeEndpointId: 30110,
    explorer: 'https://arbiscan.io',
  },
  [CHAIN_IDS.BASE]: {
    chainId: 8453,
    name: 'Base',
    nativeToken: 'ETH',
    wrappedNativeToken: 'WETH',
    maxLtv: 800_000_000_000_000_000n,
    bridgeEndpointId: 30184,
    explorer: 'https://basescan.org',
  },
};

/**
 * Get chain config by ID
 * @throws LendingError UNSUPPORTED_CHAIN if chain is not supported
 */
export function getChainConfig(chainId: number): ChainConfig {
  const config = CHAINS[chainId];
  if (!config) {
    throw new LendingError('UNSUPPORTED_CHAIN', `Unsupported chain: ${chainId}`, { chainId });
  }
  return config;
}

/**
 * Check if a chain is supported
 */
export function isChainSupported(chainId: number): boolean {
  return chainId in CHAINS;
}
