/**
 * Well-known Ethereum mainnet tokens
 */

import { TokenRef } from '../types/dex.types';

export interface KnownToken extends TokenRef {
  name: string;
}

export const WETH: KnownToken = {
  address: '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2',
  symbol: 'WETH',
  name: 'Wrapped Ether',
  decimals: 18,
};

export const USDC: KnownToken = {
  address: '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48',
  symbol: 'USDC',
  name: 'USD Coin',
  decimals: 6,
};

export const USDT: KnownToken = {
  address: '0xdAC17F958D2ee523a2206206994597C13D831ec7',
  symbol: 'USDT',
  name: 'Tether USD',
  decimals: 6,
};

export const DAI: KnownToken = {
  address: '0x6B175474E89094C44Da98b954EedeAC495271d0F',
  symbol: 'DAI',
  name: 'Dai Stablecoin',
  decimals: 18,
};

export const WBTC: KnownToken = {
  address: '0x2260FAC5E5542a773Aa44fBCfeDf7C193bc2C599',
  symbol: 'WBTC',
  name: 'Wrapped BTC',
  decimals: 8,
};

export const ALL_TOKENS: KnownToken[] = [WETH, USDC, USDT, DAI, WBTC];

export const STABLECOINS: KnownToken[] = [USDT, USDC, DAI];
