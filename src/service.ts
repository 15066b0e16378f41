import { parseUnits } from 'ethers';
import { APIServer } from './api/server';
import { statusController } from './api/routes/status';
import { logger, logServiceStart } from './services/utils/Logger';
import { parseErrorMessage } from './services/utils/ErrorHandler';
import { NodeTransport } from './services/blockchain/NodeTransport';
import { ExplorerTransport } from './services/blockchain/ExplorerTransport';
import { ContractReader } from './services/blockchain/ContractReader';
import { TokenInfo } from './services/blockchain/TokenInfo';
import { AnalysisCache } from './services/cache/AnalysisCache';
import { PoolMetadataResolver } from './services/pools/PoolMetadataResolver';
import { ReferencePriceOracle } from './services/pricing/ReferencePriceOracle';
import { SwapAnalyzer } from './services/analysis/SwapAnalyzer';
import { BatchRunner, BatchOutcome } from './services/analysis/BatchRunner';
import { AnalysisRun } from './database/models/AnalysisRun';
import { EnvironmentConfig, getConfig } from './config/environment';
import { ChainConfig, getCurrentChain } from './config/chains';
import { BASE_DECIMALS, REFERENCE_DECIMALS, thresholdsFromConfig } from './config/thresholds';
import { AnalysisJob } from './config/jobs';
import { ChainTransport } from './types/transport.types';
import { LargeTradeThresholds } from './types/analysis.types';

export interface ServiceOptions {
  config?: EnvironmentConfig;
  chain?: ChainConfig;
  transport?: ChainTransport;
  persist?: boolean;
}

export function createTransport(config: EnvironmentConfig, chain: ChainConfig): ChainTransport {
  if (config.DATA_SOURCE === 'explorer') {
    return new ExplorerTransport({
      apiKey: config.ETHERSCAN_API_KEY,
      chainId: chain.chainId,
      baseUrl: chain.explorerApiUrl,
      timeoutMs: config.RPC_TIMEOUT_MS,
      requestsPerSecond: config.EXPLORER_REQUESTS_PER_SECOND,
    });
  }

  logger.info(`Using node transport ${NodeTransport.maskUrl(config.RPC_URL)}`);
  return new NodeTransport(config.RPC_URL, { timeoutMs: config.RPC_TIMEOUT_MS });
}

/**
 * Wires transports, caches and analyzers for a process
 */
export class AnalysisService {
  readonly config: EnvironmentConfig;
  readonly chain: ChainConfig;
  readonly transport: ChainTransport;
  readonly cache = new AnalysisCache();
  readonly resolver: PoolMetadataResolver;
  readonly oracle: ReferencePriceOracle;
  private apiServer: APIServer | null = null;
  private persist: boolean;

  constructor(options: ServiceOptions = {}) {
    this.config = options.config ?? getConfig();
    this.chain = options.chain ?? getCurrentChain();
    this.transport = options.transport ?? createTransport(this.config, this.chain);
    this.persist = options.persist ?? false;

    const reader = new ContractReader(this.transport);
    const tokens = new TokenInfo(reader, this.config.RPC_TIMEOUT_MS);

    this.resolver = new PoolMetadataResolver(reader, tokens, this.cache, this.config.RPC_TIMEOUT_MS);
    this.oracle = new ReferencePriceOracle(reader, this.resolver, this.cache, {
      baseAsset: this.chain.baseAsset,
      referencePool: this.chain.referencePool.address,
      ethUsdFeed: this.chain.ethUsdFeed,
      fallbackPriceMicro: parseUnits(this.config.FALLBACK_ETH_PRICE_USD, REFERENCE_DECIMALS),
      bucketSize: this.config.ORACLE_BUCKET_SIZE,
      timeoutMs: this.config.RPC_TIMEOUT_MS,
      historicalTimeoutMs: this.config.HISTORICAL_CALL_TIMEOUT_MS,
    });

    logServiceStart('AnalysisService', {
      network: this.chain.name,
      dataSource: this.transport.name,
      chunkSize: this.config.LOG_CHUNK_SIZE,
      bucketSize: this.config.ORACLE_BUCKET_SIZE,
    });
  }

  createAnalyzer(): SwapAnalyzer {
    return new SwapAnalyzer(
      { transport: this.transport, resolver: this.resolver, oracle: this.oracle },
      {
        chunkSize: this.config.LOG_CHUNK_SIZE,
        classifier: {
          baseAsset: this.chain.baseAsset,
          baseDecimals: BASE_DECIMALS,
          referenceStables: this.chain.referenceStables,
        },
      }
    );
  }

  createBatchRunner(): BatchRunner {
    return new BatchRunner(() => this.createAnalyzer(), this.transport, {
      concurrency: this.config.BATCH_CONCURRENCY,
      defaultWindow: this.config.DEFAULT_BLOCK_WINDOW,
      baseThreshold: this.config.BIG_BUY_BASE_THRESHOLD,
      refThresholdUsd: this.config.BIG_BUY_REF_THRESHOLD_USD,
    });
  }

  /**
   * Run jobs and, when persisting, store each successful result
   */
  async runJobs(jobs: AnalysisJob[], signal?: AbortSignal): Promise<BatchOutcome[]> {
    const outcomes = await this.createBatchRunner().run(jobs, signal);

    if (this.persist) {
      for (const outcome of outcomes) {
        if (outcome.ok) {
          await AnalysisRun.save(outcome.result);
        }
      }
    }

    return outcomes;
  }

  async startApi(port: number = this.config.API_PORT): Promise<void> {
    let thresholds: LargeTradeThresholds | null = null;
    try {
      thresholds = thresholdsFromConfig(this.config);
    } catch (error) {
      logger.warn(`Default thresholds unavailable: ${parseErrorMessage(error)}`);
    }

    statusController.register({
      cache: this.cache,
      oracleStats: () => this.oracle.getStats(),
      dataSource: this.transport.name,
      thresholds,
    });

    this.apiServer = new APIServer({ port });
    await this.apiServer.start();
  }

  async stop(): Promise<void> {
    if (this.apiServer) {
      await this.apiServer.stop();
      this.apiServer = null;
    }
    if (this.transport.destroy) {
      this.transport.destroy();
    }
    logger.info('AnalysisService stopped');
  }
}

export default AnalysisService;
