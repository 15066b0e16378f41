/**
 * DEX pool type definitions
 */

export enum PoolVersion {
  V2 = 'V2', // constant-product
  V3 = 'V3', // concentrated-liquidity
}

/**
 * How a pool's version was determined
 */
export type VersionSource = 'hint' | 'probe' | 'default';

export interface TokenRef {
  address: string;
  symbol: string;
  decimals: number;
}

export interface PoolMetadata {
  address: string; // lower-cased
  version: PoolVersion;
  token0: string; // lower-cased
  token1: string; // lower-cased
  decimals0: number;
  decimals1: number;
  symbol0: string;
  symbol1: string;
  feeTier: number | null; // V3 only, hundredths of a bip
  versionSource: VersionSource;
}
