/**
 * Analysis run type definitions
 */

import { PoolMetadata, PoolVersion } from './dex.types';
import { PricePoint, TradeClassification, TradeDirection } from './swap.types';

export interface LargeTradeThresholds {
  baseRaw: bigint; // Base-asset smallest units
  refMicro: bigint; // Reference-currency micro-units
}

export type SkipReason =
  | 'decode-failed'
  | 'price-undetermined'
  | 'reference-price-unavailable'
  | 'unsupported-quote';

export type SkipCounts = Record<SkipReason, number>;

export type AnalysisStatus = 'ok' | 'no-events' | 'no-priceable-swaps' | 'transport-failed';

export type AnalyzerState = 'idle' | 'fetching' | 'decoding' | 'pricing' | 'classifying' | 'done';

export interface AnalysisRequest {
  token: string;
  pool: string;
  startBlock: number;
  endBlock: number;
  version?: PoolVersion;
  thresholds: LargeTradeThresholds;
  signal?: AbortSignal;
}

export interface ChunkStats {
  total: number;
  empty: number;
  failed: number;
}

export interface PriceExtreme {
  priceBase: number;
  priceRef: number | null;
  blockNumber: number;
  timestamp: number | null;
  transactionHash: string;
}

export interface LargePurchaseStats {
  count: number;
  totalBaseRaw: bigint;
  averageBaseRaw: bigint;
  largestBaseRaw: bigint;
  totalRefMicro: bigint;
  averageRefMicro: bigint;
  largestRefMicro: bigint;
  thresholdBaseRaw: bigint;
  thresholdRefMicro: bigint;
}

export interface VolumeStats {
  buyBaseRaw: bigint;
  sellBaseRaw: bigint;
  buyRefMicro: bigint;
  sellRefMicro: bigint;
  buySellRatio: number | null; // Base volume; null without sells
}

/**
 * A threshold-sized trade and the price move around it
 */
export interface HighImpactTrade {
  blockNumber: number;
  transactionHash: string;
  logIndex: number;
  direction: TradeDirection;
  baseAmountRaw: bigint;
  refAmountMicro: bigint | null;
  priceBefore: number | null;
  priceAfter: number;
  changePercent: number | null;
}

export interface PriceImpactStats {
  volatilityPercent: number | null; // Mean absolute change between consecutive points
  highImpactTrades: HighImpactTrade[];
  averageImpactPercent: number | null;
}

export interface SwapReference {
  blockNumber: number;
  transactionHash: string;
  logIndex: number;
  trader: string;
}

export interface TradingActivity {
  firstSwap: SwapReference | null;
  lastSwap: SwapReference | null;
  mostActiveTrader: { address: string; swapCount: number } | null;
}

export interface AnalysisSummary {
  token: string;
  pool: string;
  version: PoolVersion;
  startBlock: number;
  endBlock: number;
  status: AnalysisStatus;
  totalEvents: number;
  totalSwaps: number;
  lowest: PriceExtreme | null;
  highest: PriceExtreme | null;
  latest: PriceExtreme | null;
  changeFromLowPercent: number | null;
  changeFromHighPercent: number | null;
  buyCount: number;
  sellCount: number;
  ambiguousCount: number;
  uniqueTraders: number;
  volumeRefMicro: bigint;
  volume: VolumeStats;
  priceImpact: PriceImpactStats;
  activity: TradingActivity;
  largePurchases: LargePurchaseStats;
  skipped: SkipCounts;
  missingReferencePrice: number;
  fallbackPricedTrades: number;
}

export interface AnalysisResult {
  pool: PoolMetadata;
  status: AnalysisStatus;
  summary: AnalysisSummary;
  pricePoints: PricePoint[];
  trades: TradeClassification[]; // Buys only
  skipped: SkipCounts;
  chunks: ChunkStats;
}
