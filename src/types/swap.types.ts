/**
 * Swap event and pricing type definitions
 */

import { PoolVersion } from './dex.types';

export interface RawLogEntry {
  blockNumber: number;
  transactionHash: string;
  logIndex: number;
  topics: string[];
  data: string;
  timestamp?: number; // Only when the transport supplies it
}

export interface V2Swap {
  version: PoolVersion.V2;
  amount0In: bigint;
  amount1In: bigint;
  amount0Out: bigint;
  amount1Out: bigint;
  sender: string;
  recipient: string;
}

export interface V3Swap {
  version: PoolVersion.V3;
  amount0: bigint; // signed, positive = into the pool
  amount1: bigint;
  sqrtPriceX96: bigint;
  liquidity: bigint;
  tick: number;
  sender: string;
  recipient: string;
}

export type DecodedSwap = V2Swap | V3Swap;

export type PriceMethod = 'swap-amounts' | 'sqrt-price' | 'amount-ratio';

export type PriceConfidence = 'high' | 'low';

export interface PriceQuote {
  price: number; // Units of the other pool token per one unit of the target
  method: PriceMethod;
  confidence: PriceConfidence;
}

export interface PricePoint {
  timestamp: number | null;
  blockNumber: number;
  transactionHash: string;
  logIndex: number;
  tokenPriceBase: number;
  tokenPriceRef: number | null;
  basePriceRef: number | null;
  method: PriceMethod;
  confidence: PriceConfidence;
  swap: DecodedSwap;
}

export type ReferencePriceSource = 'historical-pool' | 'live-feed' | 'fixed-fallback';

export interface ReferencePriceSample {
  bucket: number;
  priceMicro: bigint; // Reference-currency micro-units per one base asset
  source: ReferencePriceSource;
}

export type TradeDirection = 'buy' | 'sell' | 'ambiguous';

/**
 * Per-version reading of a swap relative to its quote token
 */
export interface TradeFlow {
  direction: TradeDirection;
  quoteAmountRaw: bigint; // Magnitude of the quote leg
  tokenAmountRaw: bigint; // Magnitude of the other leg
}

export interface TradeClassification {
  blockNumber: number;
  transactionHash: string;
  logIndex: number;
  direction: TradeDirection;
  baseAmountRaw: bigint;
  baseAmount: number;
  tokenAmountRaw: bigint;
  refAmountMicro: bigint | null;
  refSource: ReferencePriceSource | 'direct' | null;
  isLargeByBase: boolean;
  isLargeByRef: boolean;
  isLargePurchase: boolean;
  counterpartAddress: string;
}
