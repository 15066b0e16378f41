'use strict';

import { logger } from '../utils/Logger';
import { parseErrorMessage } from '../utils/ErrorHandler';
import { MetadataUnavailableError } from '../utils/AnalysisErrors';
import { ContractReader } from '../blockchain/ContractReader';
import { TokenInfo } from '../blockchain/TokenInfo';
import { AnalysisCache } from '../cache/AnalysisCache';
import { PoolMetadata, PoolVersion, VersionSource } from '../../types/dex.types';

const POOL_ABI = {
  token0: 'function token0() view returns (address)',
  token1: 'function token1() view returns (address)',
  fee: 'function fee() view returns (uint24)',
  tickSpacing: 'function tickSpacing() view returns (int24)',
  getReserves:
    'function getReserves() view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)',
};

interface VersionProbe {
  version: PoolVersion;
  feeTier: number | null;
  source: VersionSource;
}

/**
 * Resolves and memoizes pool version, tokens and decimals
 */
export class PoolMetadataResolver {
  constructor(
    private reader: ContractReader,
    private tokens: TokenInfo,
    private cache: AnalysisCache,
    private timeoutMs?: number
  ) {}

  async resolve(poolAddress: string, versionHint?: PoolVersion): Promise<PoolMetadata> {
    const address = poolAddress.toLowerCase();
    return this.cache.pools.getOrCreate(address, () => this.load(address, versionHint));
  }

  private async load(address: string, versionHint?: PoolVersion): Promise<PoolMetadata> {
    let token0: string;
    let token1: string;

    try {
      const [result0, result1] = await Promise.all([
        this.reader.read(address, POOL_ABI.token0, [], { timeoutMs: this.timeoutMs }),
        this.reader.read(address, POOL_ABI.token1, [], { timeoutMs: this.timeoutMs }),
      ]);
      token0 = String(result0[0]).toLowerCase();
      token1 = String(result1[0]).toLowerCase();
    } catch (error) {
      throw new MetadataUnavailableError(address, error);
    }

    const probe = versionHint
      ? await this.fromHint(address, versionHint)
      : await this.probeVersion(address);

    const [meta0, meta1] = await Promise.all([
      this.tokens.getMetadata(token0),
      this.tokens.getMetadata(token1),
    ]);

    const metadata: PoolMetadata = {
      address,
      version: probe.version,
      token0,
      token1,
      decimals0: meta0.decimals,
      decimals1: meta1.decimals,
      symbol0: meta0.symbol,
      symbol1: meta1.symbol,
      feeTier: probe.feeTier,
      versionSource: probe.source,
    };

    logger.info(`Resolved ${metadata.version} pool ${metadata.symbol0}/${metadata.symbol1}`, {
      pool: address,
      versionSource: probe.source,
      feeTier: probe.feeTier,
    });

    return Object.freeze(metadata);
  }

  private async fromHint(address: string, version: PoolVersion): Promise<VersionProbe> {
    if (version === PoolVersion.V2) {
      return { version, feeTier: null, source: 'hint' };
    }
    return { version, feeTier: await this.readFee(address), source: 'hint' };
  }

  /**
   * fee() and tickSpacing() exist only on V3; getReserves() only on V2
   */
  private async probeVersion(address: string): Promise<VersionProbe> {
    try {
      const [[fee]] = await Promise.all([
        this.reader.read(address, POOL_ABI.fee, [], { timeoutMs: this.timeoutMs }),
        this.reader.read(address, POOL_ABI.tickSpacing, [], { timeoutMs: this.timeoutMs }),
      ]);
      return { version: PoolVersion.V3, feeTier: Number(fee), source: 'probe' };
    } catch (error) {
      logger.debug(`V3 probe failed for ${address}`, { error: parseErrorMessage(error) });
    }

    try {
      await this.reader.read(address, POOL_ABI.getReserves, [], { timeoutMs: this.timeoutMs });
      return { version: PoolVersion.V2, feeTier: null, source: 'probe' };
    } catch (error) {
      logger.debug(`V2 probe failed for ${address}`, { error: parseErrorMessage(error) });
    }

    logger.warn(`Could not determine version of pool ${address}, assuming V2`);
    return { version: PoolVersion.V2, feeTier: null, source: 'default' };
  }

  private async readFee(address: string): Promise<number | null> {
    try {
      const [fee] = await this.reader.read(address, POOL_ABI.fee, [], { timeoutMs: this.timeoutMs });
      return Number(fee);
    } catch (error) {
      logger.debug(`fee() unavailable for ${address}`, { error: parseErrorMessage(error) });
      return null;
    }
  }
}

export default PoolMetadataResolver;
