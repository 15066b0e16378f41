/**
 * Network configuration for Ethereum mainnet
 */

import { getConfig } from './environment';
import { STABLECOINS, WETH } from './tokens';

export interface ReferencePoolConfig {
  address: string;
  feeTier: number;
}

export interface ChainConfig {
  chainId: number;
  name: string;
  baseSymbol: string;
  explorerUrl: string;
  explorerApiUrl: string;
  baseAsset: string; // Wrapped native token
  referenceStables: string[];
  referencePool: ReferencePoolConfig; // base/stable V3 pool used for historical pricing
  ethUsdFeed: string; // Chainlink aggregator
}

/**
 * Ethereum Mainnet Configuration
 */
export const ETHEREUM_MAINNET: ChainConfig = {
  chainId: 1,
  name: 'Ethereum Mainnet',
  explorerUrl: 'https://etherscan.io',
  explorerApiUrl: 'https://api.etherscan.io/v2/api',
  baseAsset: WETH.address,
  baseSymbol: WETH.symbol,
  referenceStables: STABLECOINS.map((token) => token.address),
  referencePool: {
    address: '0x88e6A0c2dDD26FEEb64F039a2c41296FcB3f5640', // WETH/USDC 0.05%
    feeTier: 500,
  },
  ethUsdFeed: '0x5f4eC3Df9cbd43714FE2740f5E3616155c5b8419',
};

/**
 * Get chain configuration based on network name
 */
export function getChainConfig(network: string = 'ethereum-mainnet'): ChainConfig {
  switch (network.toLowerCase()) {
    case 'ethereum-mainnet':
    case 'mainnet':
      return ETHEREUM_MAINNET;
    default:
      throw new Error(`Unknown network: ${network}`);
  }
}

/**
 * Get current chain configuration from environment
 */
export function getCurrentChain(): ChainConfig {
  return getChainConfig(getConfig().NETWORK);
}
