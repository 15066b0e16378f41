/**
 * Large purchase classification of decoded swaps
 */

import { getSwapHandler } from '../swaps/SwapHandlerFactory';
import { rescale, pow10, toDecimal } from '../utils/PriceFormatter';
import { PoolMetadata } from '../../types/dex.types';
import { LargeTradeThresholds } from '../../types/analysis.types';
import { DecodedSwap, ReferencePriceSample, TradeClassification } from '../../types/swap.types';

const REFERENCE_DECIMALS = 6;

export interface ReferencePriceProvider {
  referencePriceAt(blockNumber: number): Promise<ReferencePriceSample | null>;
}

export interface TradeClassifierOptions {
  baseAsset: string;
  baseDecimals: number;
  referenceStables: string[];
}

export interface QuoteToken {
  address: string;
  decimals: number;
  kind: 'base' | 'stable';
}

export interface SwapEventRef {
  blockNumber: number;
  transactionHash: string;
  logIndex: number;
}

/**
 * Thresholds are fixed for the lifetime of a classifier; build one per run
 */
export class TradeClassifier {
  private baseAsset: string;
  private stables: Set<string>;

  constructor(
    private oracle: ReferencePriceProvider,
    private thresholds: LargeTradeThresholds,
    private options: TradeClassifierOptions
  ) {
    this.baseAsset = options.baseAsset.toLowerCase();
    this.stables = new Set(options.referenceStables.map((address) => address.toLowerCase()));
  }

  /**
   * Base asset when the pool holds it, else a reference stablecoin
   */
  quoteTokenFor(pool: PoolMetadata): QuoteToken | null {
    const sides = [
      { address: pool.token0, decimals: pool.decimals0 },
      { address: pool.token1, decimals: pool.decimals1 },
    ];

    const base = sides.find((side) => side.address === this.baseAsset);
    if (base) {
      return { ...base, kind: 'base' };
    }

    const stable = sides.find((side) => this.stables.has(side.address));
    return stable ? { ...stable, kind: 'stable' } : null;
  }

  async classify(
    swap: DecodedSwap,
    pool: PoolMetadata,
    event: SwapEventRef
  ): Promise<TradeClassification | null> {
    const quote = this.quoteTokenFor(pool);
    if (!quote) return null;

    const flow = getSwapHandler(swap.version).flow(swap, pool, quote.address);
    if (!flow) return null;

    const sample = await this.oracle.referencePriceAt(event.blockNumber);

    let baseAmountRaw: bigint;
    let refAmountMicro: bigint | null;
    let refSource: TradeClassification['refSource'];

    if (quote.kind === 'base') {
      baseAmountRaw = flow.quoteAmountRaw;
      refAmountMicro = sample
        ? (baseAmountRaw * sample.priceMicro) / pow10(this.options.baseDecimals)
        : null;
      refSource = sample ? sample.source : null;
    } else {
      refAmountMicro = rescale(flow.quoteAmountRaw, quote.decimals, REFERENCE_DECIMALS);
      refSource = 'direct';
      baseAmountRaw = sample
        ? (refAmountMicro * pow10(this.options.baseDecimals)) / sample.priceMicro
        : 0n;
    }

    const isLargeByBase = baseAmountRaw >= this.thresholds.baseRaw;
    const isLargeByRef = refAmountMicro !== null && refAmountMicro >= this.thresholds.refMicro;

    return {
      blockNumber: event.blockNumber,
      transactionHash: event.transactionHash,
      logIndex: event.logIndex,
      direction: flow.direction,
      baseAmountRaw,
      baseAmount: toDecimal(baseAmountRaw, this.options.baseDecimals),
      tokenAmountRaw: flow.tokenAmountRaw,
      refAmountMicro,
      refSource,
      isLargeByBase,
      isLargeByRef,
      isLargePurchase: flow.direction === 'buy' && (isLargeByBase || isLargeByRef),
      counterpartAddress: swap.recipient,
    };
  }
}

export default TradeClassifier;
