'use strict';

import { logger, logReferencePrice } from '../utils/Logger';
import { parseErrorMessage } from '../utils/ErrorHandler';
import { rescale, sqrtPriceToMicro } from '../utils/PriceFormatter';
import { ContractReader } from '../blockchain/ContractReader';
import { PoolMetadataResolver } from '../pools/PoolMetadataResolver';
import { AnalysisCache } from '../cache/AnalysisCache';
import { PoolVersion } from '../../types/dex.types';
import { ReferencePriceSample, ReferencePriceSource } from '../../types/swap.types';

const ABI = {
  slot0:
    'function slot0() view returns (uint160 sqrtPriceX96, int24 tick, uint16 observationIndex, uint16 observationCardinality, uint16 observationCardinalityNext, uint8 feeProtocol, bool unlocked)',
  latestRoundData:
    'function latestRoundData() view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)',
  decimals: 'function decimals() view returns (uint8)',
};

const REFERENCE_DECIMALS = 6;

export interface ReferencePriceOracleOptions {
  baseAsset: string;
  referencePool: string; // base/stable V3 pool
  ethUsdFeed: string | null;
  fallbackPriceMicro: bigint; // 0 disables the fixed tier
  bucketSize: number;
  timeoutMs: number;
  historicalTimeoutMs: number;
}

export interface OracleStats {
  cacheHits: number;
  resolved: Record<ReferencePriceSource, number>;
  tierFailures: Record<ReferencePriceSource, number>;
  unavailable: number;
}

class ReferencePriceUnavailable extends Error {
  constructor(public readonly blockNumber: number) {
    super(`No reference price for block ${blockNumber}`);
  }
}

/**
 * Base asset price in reference-currency micro-units, resolved through
 * historical pool state, then a live feed, then a fixed fallback
 */
export class ReferencePriceOracle {
  private stats: OracleStats = {
    cacheHits: 0,
    resolved: { 'historical-pool': 0, 'live-feed': 0, 'fixed-fallback': 0 },
    tierFailures: { 'historical-pool': 0, 'live-feed': 0, 'fixed-fallback': 0 },
    unavailable: 0,
  };

  private baseAsset: string;

  constructor(
    private reader: ContractReader,
    private resolver: PoolMetadataResolver,
    private cache: AnalysisCache,
    private options: ReferencePriceOracleOptions
  ) {
    if (options.bucketSize < 1) {
      throw new Error('Oracle bucket size must be at least 1');
    }
    this.baseAsset = options.baseAsset.toLowerCase();
  }

  bucketOf(blockNumber: number): number {
    return Math.floor(blockNumber / this.options.bucketSize);
  }

  async referencePriceAt(blockNumber: number): Promise<ReferencePriceSample | null> {
    const bucket = this.bucketOf(blockNumber);

    if (this.cache.referencePrices.has(bucket)) {
      this.stats.cacheHits++;
    }

    try {
      return await this.cache.referencePrices.getOrCreate(bucket, () =>
        this.resolveTiers(blockNumber, bucket)
      );
    } catch (error) {
      if (error instanceof ReferencePriceUnavailable) {
        return null;
      }
      throw error;
    }
  }

  async priceMicroAt(blockNumber: number): Promise<bigint | null> {
    const sample = await this.referencePriceAt(blockNumber);
    return sample ? sample.priceMicro : null;
  }

  getStats(): OracleStats {
    return {
      cacheHits: this.stats.cacheHits,
      resolved: { ...this.stats.resolved },
      tierFailures: { ...this.stats.tierFailures },
      unavailable: this.stats.unavailable,
    };
  }

  private async resolveTiers(blockNumber: number, bucket: number): Promise<ReferencePriceSample> {
    const tiers: Array<[ReferencePriceSource, () => Promise<bigint | null>]> = [
      ['historical-pool', () => this.fromHistoricalPool(blockNumber)],
      ['live-feed', () => this.fromLiveFeed()],
      ['fixed-fallback', () => this.fromFallback()],
    ];

    for (const [source, tier] of tiers) {
      let priceMicro: bigint | null = null;
      try {
        priceMicro = await tier();
      } catch (error) {
        logger.debug(`Reference price tier ${source} failed`, {
          blockNumber,
          error: parseErrorMessage(error),
        });
      }

      if (priceMicro !== null && priceMicro > 0n) {
        const sample: ReferencePriceSample = { bucket, priceMicro, source };
        this.stats.resolved[source]++;
        logReferencePrice(sample, blockNumber);
        return sample;
      }
      this.stats.tierFailures[source]++;
    }

    this.stats.unavailable++;
    logger.warn(`Reference price unavailable for block ${blockNumber}`);
    throw new ReferencePriceUnavailable(blockNumber);
  }

  private async fromHistoricalPool(blockNumber: number): Promise<bigint | null> {
    const pool = await this.resolver.resolve(this.options.referencePool, PoolVersion.V3);

    if (pool.token0 !== this.baseAsset && pool.token1 !== this.baseAsset) {
      return null;
    }

    const [sqrtPriceX96] = await this.reader.read(pool.address, ABI.slot0, [], {
      blockTag: blockNumber,
      timeoutMs: this.options.historicalTimeoutMs,
    });

    return sqrtPriceToMicro(
      BigInt(sqrtPriceX96),
      pool.decimals0,
      pool.decimals1,
      pool.token0 === this.baseAsset
    );
  }

  /**
   * Current feed answer, not historical
   */
  private async fromLiveFeed(): Promise<bigint | null> {
    const feed = this.options.ethUsdFeed;
    if (!feed) return null;

    const options = { timeoutMs: this.options.timeoutMs };
    const [[decimals], round] = await Promise.all([
      this.reader.read(feed, ABI.decimals, [], options),
      this.reader.read(feed, ABI.latestRoundData, [], options),
    ]);

    const answer = BigInt(round[1]);
    if (answer <= 0n) return null;

    return rescale(answer, Number(decimals), REFERENCE_DECIMALS);
  }

  private async fromFallback(): Promise<bigint | null> {
    return this.options.fallbackPriceMicro > 0n ? this.options.fallbackPriceMicro : null;
  }
}

export default ReferencePriceOracle;
