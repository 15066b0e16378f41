/**
 * Run summary aggregation
 */

import { formatMicroUsd, formatPercentage, formatTokenAmount, formatUSD } from '../utils/PriceFormatter';
import { BASE_DECIMALS } from '../../config/thresholds';
import { PoolMetadata } from '../../types/dex.types';
import {
  AnalysisStatus,
  AnalysisSummary,
  HighImpactTrade,
  LargePurchaseStats,
  LargeTradeThresholds,
  PriceExtreme,
  PriceImpactStats,
  SkipCounts,
  SwapReference,
  TradingActivity,
  VolumeStats,
} from '../../types/analysis.types';
import { PricePoint, TradeClassification } from '../../types/swap.types';

export interface SummaryInput {
  token: string;
  pool: PoolMetadata;
  startBlock: number;
  endBlock: number;
  status: AnalysisStatus;
  totalEvents: number;
  totalSwaps: number;
  pricePoints: PricePoint[];
  classifications: TradeClassification[];
  skipped: SkipCounts;
  missingReferencePrice: number;
  thresholds: LargeTradeThresholds;
}

export function emptySkipCounts(): SkipCounts {
  return {
    'decode-failed': 0,
    'price-undetermined': 0,
    'reference-price-unavailable': 0,
    'unsupported-quote': 0,
  };
}

function toExtreme(point: PricePoint): PriceExtreme {
  return {
    priceBase: point.tokenPriceBase,
    priceRef: point.tokenPriceRef,
    blockNumber: point.blockNumber,
    timestamp: point.timestamp,
    transactionHash: point.transactionHash,
  };
}

function percentChange(latest: PriceExtreme | null, reference: PriceExtreme | null): number | null {
  if (!latest || !reference || reference.priceBase === 0) return null;
  return ((latest.priceBase - reference.priceBase) / reference.priceBase) * 100;
}

function maxOf(values: bigint[]): bigint {
  return values.reduce((max, value) => (value > max ? value : max), 0n);
}

function sumOf(values: bigint[]): bigint {
  return values.reduce((total, value) => total + value, 0n);
}

function knownRef(trades: TradeClassification[]): bigint[] {
  return trades.flatMap((trade) => (trade.refAmountMicro === null ? [] : [trade.refAmountMicro]));
}

function largePurchaseStats(
  classifications: TradeClassification[],
  thresholds: LargeTradeThresholds
): LargePurchaseStats {
  const large = classifications.filter((trade) => trade.isLargePurchase);
  const baseAmounts = large.map((trade) => trade.baseAmountRaw);
  const refAmounts = knownRef(large);

  const totalBaseRaw = sumOf(baseAmounts);
  const totalRefMicro = sumOf(refAmounts);

  return {
    count: large.length,
    totalBaseRaw,
    averageBaseRaw: large.length > 0 ? totalBaseRaw / BigInt(large.length) : 0n,
    largestBaseRaw: maxOf(baseAmounts),
    totalRefMicro,
    averageRefMicro: refAmounts.length > 0 ? totalRefMicro / BigInt(refAmounts.length) : 0n,
    largestRefMicro: maxOf(refAmounts),
    thresholdBaseRaw: thresholds.baseRaw,
    thresholdRefMicro: thresholds.refMicro,
  };
}

function volumeStats(classifications: TradeClassification[]): VolumeStats {
  const buys = classifications.filter((trade) => trade.direction === 'buy');
  const sells = classifications.filter((trade) => trade.direction === 'sell');
  const buyBaseRaw = sumOf(buys.map((trade) => trade.baseAmountRaw));
  const sellBaseRaw = sumOf(sells.map((trade) => trade.baseAmountRaw));

  return {
    buyBaseRaw,
    sellBaseRaw,
    buyRefMicro: sumOf(knownRef(buys)),
    sellRefMicro: sumOf(knownRef(sells)),
    buySellRatio: sellBaseRaw > 0n ? Number(buyBaseRaw) / Number(sellBaseRaw) : null,
  };
}

function eventKey(event: { transactionHash: string; logIndex: number }): string {
  return `${event.transactionHash}:${event.logIndex}`;
}

function mean(values: number[]): number | null {
  return values.length > 0 ? values.reduce((total, value) => total + value, 0) / values.length : null;
}

/**
 * Trades at either threshold, with the prices of the point before and of their own point.
 * Trades that produced no price point are left out.
 */
function priceImpactStats(
  pricePoints: PricePoint[],
  classifications: TradeClassification[]
): PriceImpactStats {
  const moves: number[] = [];
  for (let i = 1; i < pricePoints.length; i++) {
    const previous = pricePoints[i - 1].tokenPriceBase;
    if (previous > 0) {
      moves.push(Math.abs(((pricePoints[i].tokenPriceBase - previous) / previous) * 100));
    }
  }

  const pointIndex = new Map(pricePoints.map((point, index) => [eventKey(point), index]));
  const highImpactTrades: HighImpactTrade[] = [];

  for (const trade of classifications) {
    if (!trade.isLargeByBase && !trade.isLargeByRef) continue;
    const index = pointIndex.get(eventKey(trade));
    if (index === undefined) continue;

    const priceAfter = pricePoints[index].tokenPriceBase;
    const priceBefore = index > 0 ? pricePoints[index - 1].tokenPriceBase : null;

    highImpactTrades.push({
      blockNumber: trade.blockNumber,
      transactionHash: trade.transactionHash,
      logIndex: trade.logIndex,
      direction: trade.direction,
      baseAmountRaw: trade.baseAmountRaw,
      refAmountMicro: trade.refAmountMicro,
      priceBefore,
      priceAfter,
      changePercent:
        priceBefore !== null && priceBefore > 0 ? ((priceAfter - priceBefore) / priceBefore) * 100 : null,
    });
  }

  return {
    volatilityPercent: mean(moves),
    highImpactTrades,
    averageImpactPercent: mean(
      highImpactTrades.flatMap((trade) => (trade.changePercent === null ? [] : [trade.changePercent]))
    ),
  };
}

function toSwapReference(trade: TradeClassification | undefined): SwapReference | null {
  if (!trade) return null;
  return {
    blockNumber: trade.blockNumber,
    transactionHash: trade.transactionHash,
    logIndex: trade.logIndex,
    trader: trade.counterpartAddress,
  };
}

/**
 * First and last swap in transport order; ties for most active go to the first seen
 */
function tradingActivity(classifications: TradeClassification[]): TradingActivity {
  const counts = new Map<string, number>();
  for (const trade of classifications) {
    counts.set(trade.counterpartAddress, (counts.get(trade.counterpartAddress) ?? 0) + 1);
  }

  let mostActiveTrader: TradingActivity['mostActiveTrader'] = null;
  for (const [address, swapCount] of counts) {
    if (!mostActiveTrader || swapCount > mostActiveTrader.swapCount) {
      mostActiveTrader = { address, swapCount };
    }
  }

  return {
    firstSwap: toSwapReference(classifications[0]),
    lastSwap: toSwapReference(classifications[classifications.length - 1]),
    mostActiveTrader,
  };
}

/**
 * Extremes use the base-asset price; the earliest point wins ties
 */
export function buildSummary(input: SummaryInput): AnalysisSummary {
  let lowest: PriceExtreme | null = null;
  let highest: PriceExtreme | null = null;

  for (const point of input.pricePoints) {
    if (!lowest || point.tokenPriceBase < lowest.priceBase) lowest = toExtreme(point);
    if (!highest || point.tokenPriceBase > highest.priceBase) highest = toExtreme(point);
  }

  const last = input.pricePoints[input.pricePoints.length - 1];
  const latest = last ? toExtreme(last) : null;

  const count = (direction: TradeClassification['direction']): number =>
    input.classifications.filter((trade) => trade.direction === direction).length;

  return {
    token: input.token.toLowerCase(),
    pool: input.pool.address,
    version: input.pool.version,
    startBlock: input.startBlock,
    endBlock: input.endBlock,
    status: input.status,
    totalEvents: input.totalEvents,
    totalSwaps: input.totalSwaps,
    lowest,
    highest,
    latest,
    changeFromLowPercent: percentChange(latest, lowest),
    changeFromHighPercent: percentChange(latest, highest),
    buyCount: count('buy'),
    sellCount: count('sell'),
    ambiguousCount: count('ambiguous'),
    uniqueTraders: new Set(input.classifications.map((trade) => trade.counterpartAddress)).size,
    volumeRefMicro: sumOf(knownRef(input.classifications)),
    volume: volumeStats(input.classifications),
    priceImpact: priceImpactStats(input.pricePoints, input.classifications),
    activity: tradingActivity(input.classifications),
    largePurchases: largePurchaseStats(input.classifications, input.thresholds),
    skipped: { ...input.skipped },
    missingReferencePrice: input.missingReferencePrice,
    fallbackPricedTrades: input.classifications.filter((trade) => trade.refSource === 'fixed-fallback')
      .length,
  };
}

function describeExtreme(label: string, extreme: PriceExtreme | null, baseSymbol: string): string {
  if (!extreme) return `${label}: n/a`;
  const ref = extreme.priceRef === null ? '' : ` (${formatUSD(extreme.priceRef, 8)})`;
  return `${label}: ${extreme.priceBase.toPrecision(6)} ${baseSymbol}${ref} at block ${extreme.blockNumber}`;
}

/**
 * Human-readable report lines for a summary
 */
export function describeSummary(summary: AnalysisSummary, pool: PoolMetadata, baseSymbol = 'WETH'): string[] {
  const large = summary.largePurchases;
  const volume = summary.volume;
  const impact = summary.priceImpact;
  const active = summary.activity.mostActiveTrader;
  const skipped = Object.entries(summary.skipped)
    .map(([reason, count]) => `${reason}=${count}`)
    .join(', ');

  const lines = [
    `${pool.symbol0}/${pool.symbol1} ${summary.version} pool ${summary.pool}`,
    `Blocks ${summary.startBlock}-${summary.endBlock}: ${summary.totalEvents} events, ${summary.totalSwaps} swaps, status ${summary.status}`,
    describeExtreme('Low', summary.lowest, baseSymbol),
    describeExtreme('High', summary.highest, baseSymbol),
    describeExtreme('Latest', summary.latest, baseSymbol),
  ];

  if (summary.changeFromLowPercent !== null && summary.changeFromHighPercent !== null) {
    lines.push(
      `Change: ${formatPercentage(summary.changeFromLowPercent)} from low, ${formatPercentage(summary.changeFromHighPercent)} from high`
    );
  }

  lines.push(
    `Trades: ${summary.buyCount} buys, ${summary.sellCount} sells, ${summary.ambiguousCount} ambiguous, ${summary.uniqueTraders} traders, volume ${formatMicroUsd(summary.volumeRefMicro)}`,
    `Volume: buys ${formatTokenAmount(volume.buyBaseRaw, BASE_DECIMALS)} ${baseSymbol} / ${formatMicroUsd(volume.buyRefMicro)}, sells ${formatTokenAmount(volume.sellBaseRaw, BASE_DECIMALS)} ${baseSymbol} / ${formatMicroUsd(volume.sellRefMicro)}, ratio ${volume.buySellRatio === null ? 'n/a' : volume.buySellRatio.toFixed(2)}`,
    `Price impact: volatility ${impact.volatilityPercent === null ? 'n/a' : formatPercentage(impact.volatilityPercent)}, ${impact.highImpactTrades.length} high-impact trades`,
    `Most active: ${active ? `${active.address} (${active.swapCount} swaps)` : 'n/a'}`,
    `Large purchases: ${large.count} (>= ${formatTokenAmount(large.thresholdBaseRaw, BASE_DECIMALS)} ${baseSymbol} or ${formatMicroUsd(large.thresholdRefMicro)}), total ${formatTokenAmount(large.totalBaseRaw, BASE_DECIMALS)} ${baseSymbol} / ${formatMicroUsd(large.totalRefMicro)}`,
    `Skipped: ${skipped}`,
    `Reference price: ${summary.missingReferencePrice} points without, ${summary.fallbackPricedTrades} trades at fallback price`
  );

  return lines;
}
