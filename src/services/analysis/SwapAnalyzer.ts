/**
 * Chunked swap analysis over a block range for one (token, pool) pair
 */

import EventEmitter from 'events';
import { logger, logChunkProcessed, logLargePurchase, logServiceError } from '../utils/Logger';
import { parseErrorMessage } from '../utils/ErrorHandler';
import { AnalysisCancelledError, InvalidRangeError } from '../utils/AnalysisErrors';
import { PoolMetadataResolver } from '../pools/PoolMetadataResolver';
import { getSwapHandler, SwapHandler } from '../swaps/SwapHandlerFactory';
import { ReferencePriceProvider, TradeClassifier, TradeClassifierOptions, QuoteToken } from './TradeClassifier';
import { buildSummary, emptySkipCounts } from './SummaryBuilder';
import { PoolMetadata } from '../../types/dex.types';
import { BlockSource, LogTransport } from '../../types/transport.types';
import {
  AnalysisRequest,
  AnalysisResult,
  AnalysisStatus,
  AnalyzerState,
  ChunkStats,
  SkipCounts,
} from '../../types/analysis.types';
import {
  DecodedSwap,
  PricePoint,
  RawLogEntry,
  ReferencePriceSample,
  TradeClassification,
} from '../../types/swap.types';

const MICRO = 1_000_000;

export interface SwapAnalyzerOptions {
  chunkSize: number;
  classifier: TradeClassifierOptions;
}

export interface SwapAnalyzerDeps {
  transport: LogTransport & BlockSource;
  resolver: PoolMetadataResolver;
  oracle: ReferencePriceProvider;
}

export interface ChunkEvent {
  pool: string;
  fromBlock: number;
  toBlock: number;
  events: number;
  failed: boolean;
}

interface DecodedEntry {
  log: RawLogEntry;
  swap: DecodedSwap;
}

/**
 * Mutable state of a single run; nothing survives between runs
 */
interface RunState {
  token: string;
  pool: PoolMetadata;
  handler: SwapHandler;
  quote: QuoteToken | null;
  oracle: ReferencePriceProvider;
  classifier: TradeClassifier;
  timestamps: Map<number, Promise<number | null>>;
  pricePoints: PricePoint[];
  classifications: TradeClassification[];
  skipped: SkipCounts;
  missingReferencePrice: number; // Points kept without a reference price
  chunks: ChunkStats;
  totalEvents: number;
  totalSwaps: number;
}

/**
 * Per-run memo over the oracle, null results included
 */
function memoizeOracle(oracle: ReferencePriceProvider): ReferencePriceProvider {
  const samples = new Map<number, Promise<ReferencePriceSample | null>>();
  return {
    referencePriceAt(blockNumber: number) {
      let sample = samples.get(blockNumber);
      if (!sample) {
        sample = oracle.referencePriceAt(blockNumber);
        samples.set(blockNumber, sample);
      }
      return sample;
    },
  };
}

/**
 * Emits 'state' (AnalyzerState), 'chunk' (ChunkEvent) and
 * 'largePurchase' (TradeClassification)
 */
export class SwapAnalyzer extends EventEmitter {
  private state: AnalyzerState = 'idle';

  constructor(private deps: SwapAnalyzerDeps, private options: SwapAnalyzerOptions) {
    super();
    if (options.chunkSize < 1) {
      throw new Error('Chunk size must be at least 1');
    }
  }

  getState(): AnalyzerState {
    return this.state;
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    const { startBlock, endBlock } = request;
    if (
      !Number.isInteger(startBlock) ||
      !Number.isInteger(endBlock) ||
      startBlock < 0 ||
      startBlock > endBlock
    ) {
      throw new InvalidRangeError(startBlock, endBlock);
    }

    const pool = await this.deps.resolver.resolve(request.pool, request.version);
    const oracle = memoizeOracle(this.deps.oracle);
    const classifier = new TradeClassifier(oracle, request.thresholds, this.options.classifier);

    const run: RunState = {
      token: request.token.toLowerCase(),
      pool,
      handler: getSwapHandler(pool.version),
      quote: classifier.quoteTokenFor(pool),
      oracle,
      classifier,
      timestamps: new Map(),
      pricePoints: [],
      classifications: [],
      skipped: emptySkipCounts(),
      missingReferencePrice: 0,
      chunks: { total: 0, empty: 0, failed: 0 },
      totalEvents: 0,
      totalSwaps: 0,
    };

    if (!run.quote) {
      logger.warn(`Pool ${pool.address} holds neither the base asset nor a reference stablecoin`);
    }

    logger.info(`Analyzing ${pool.symbol0}/${pool.symbol1} swaps`, {
      pool: pool.address,
      version: pool.version,
      startBlock,
      endBlock,
    });

    let lastCompletedBlock: number | null = null;

    try {
      for (let fromBlock = startBlock; fromBlock <= endBlock; fromBlock += this.options.chunkSize) {
        if (request.signal?.aborted) {
          throw new AnalysisCancelledError(lastCompletedBlock);
        }

        const toBlock = Math.min(endBlock, fromBlock + this.options.chunkSize - 1);
        await this.processChunk(run, fromBlock, toBlock);
        lastCompletedBlock = toBlock;
        this.setState('idle');
      }
    } catch (error) {
      this.setState('idle');
      throw error;
    }

    this.setState('done');

    const status = this.resolveStatus(run);
    const summary = buildSummary({
      token: run.token,
      pool,
      startBlock,
      endBlock,
      status,
      totalEvents: run.totalEvents,
      totalSwaps: run.totalSwaps,
      pricePoints: run.pricePoints,
      classifications: run.classifications,
      skipped: run.skipped,
      missingReferencePrice: run.missingReferencePrice,
      thresholds: request.thresholds,
    });

    logger.info(`Analysis finished with status ${status}`, {
      pool: pool.address,
      events: run.totalEvents,
      pricePoints: run.pricePoints.length,
      largePurchases: summary.largePurchases.count,
      skipped: run.skipped,
      missingReferencePrice: run.missingReferencePrice,
    });

    return {
      pool,
      status,
      summary,
      pricePoints: run.pricePoints,
      trades: run.classifications.filter((trade) => trade.direction === 'buy'),
      skipped: { ...run.skipped },
      chunks: { ...run.chunks },
    };
  }

  private async processChunk(run: RunState, fromBlock: number, toBlock: number): Promise<void> {
    const started = Date.now();
    run.chunks.total++;

    this.setState('fetching');
    let logs: RawLogEntry[];
    try {
      logs = await this.deps.transport.getLogs({
        address: run.pool.address,
        fromBlock,
        toBlock,
        topics: [run.handler.swapTopic],
      });
    } catch (error) {
      run.chunks.failed++;
      logServiceError('SwapAnalyzer', error, { fromBlock, toBlock, pool: run.pool.address });
      this.emitChunk({ pool: run.pool.address, fromBlock, toBlock, events: 0, failed: true });
      return;
    }

    run.totalEvents += logs.length;
    if (logs.length === 0) {
      run.chunks.empty++;
    }

    this.setState('decoding');
    const decoded: DecodedEntry[] = [];
    for (const log of logs) {
      const swap = run.handler.decode(log);
      if (swap) {
        decoded.push({ log, swap });
      } else {
        run.skipped['decode-failed']++;
      }
    }
    run.totalSwaps += decoded.length;

    this.setState('pricing');
    for (const entry of decoded) {
      const point = await this.pricePoint(run, entry);
      if (point) {
        run.pricePoints.push(point);
      }
    }

    // Classified whether or not a price point was built
    this.setState('classifying');
    if (run.quote) {
      for (const entry of decoded) {
        await this.classifyEntry(run, entry);
      }
    }

    logChunkProcessed(run.pool.address, fromBlock, toBlock, logs.length, Date.now() - started);
    this.emitChunk({ pool: run.pool.address, fromBlock, toBlock, events: logs.length, failed: false });
  }

  private async pricePoint(run: RunState, { log, swap }: DecodedEntry): Promise<PricePoint | null> {
    if (!run.quote) {
      run.skipped['unsupported-quote']++;
      return null;
    }

    const quote = run.handler.price(swap, run.pool, run.token);
    if (!quote) {
      run.skipped['price-undetermined']++;
      return null;
    }

    const sample = await run.oracle.referencePriceAt(log.blockNumber);
    const basePriceRef = sample ? Number(sample.priceMicro) / MICRO : null;

    let tokenPriceBase: number;
    let tokenPriceRef: number | null;

    if (run.quote.kind === 'base') {
      tokenPriceBase = quote.price;
      tokenPriceRef = basePriceRef === null ? null : quote.price * basePriceRef;
      if (basePriceRef === null) {
        run.missingReferencePrice++;
      }
    } else {
      // Stable-quoted: the pool price is already in the reference currency
      if (basePriceRef === null) {
        run.skipped['reference-price-unavailable']++;
        return null;
      }
      tokenPriceRef = quote.price;
      tokenPriceBase = quote.price / basePriceRef;
    }

    return {
      timestamp: await this.timestampOf(run, log),
      blockNumber: log.blockNumber,
      transactionHash: log.transactionHash,
      logIndex: log.logIndex,
      tokenPriceBase,
      tokenPriceRef,
      basePriceRef,
      method: quote.method,
      confidence: quote.confidence,
      swap,
    };
  }

  private async classifyEntry(run: RunState, { log, swap }: DecodedEntry): Promise<void> {
    const trade = await run.classifier.classify(swap, run.pool, {
      blockNumber: log.blockNumber,
      transactionHash: log.transactionHash,
      logIndex: log.logIndex,
    });
    if (!trade) return;

    run.classifications.push(trade);

    if (trade.refSource === 'fixed-fallback') {
      logger.warn(`Trade ${trade.transactionHash}:${trade.logIndex} valued at the fixed fallback reference price`, {
        pool: run.pool.address,
        blockNumber: trade.blockNumber,
      });
    }

    if (trade.isLargePurchase) {
      logLargePurchase(trade, { token: run.token, pool: run.pool.address });
      this.emit('largePurchase', trade);
    }
  }

  private timestampOf(run: RunState, log: RawLogEntry): Promise<number | null> {
    if (log.timestamp !== undefined) {
      return Promise.resolve(log.timestamp);
    }

    let pending = run.timestamps.get(log.blockNumber);
    if (!pending) {
      pending = this.deps.transport.getBlockTimestamp(log.blockNumber).catch((error: unknown) => {
        logger.debug(`Timestamp unavailable for block ${log.blockNumber}`, {
          error: parseErrorMessage(error),
        });
        return null;
      });
      run.timestamps.set(log.blockNumber, pending);
    }
    return pending;
  }

  private resolveStatus(run: RunState): AnalysisStatus {
    if (run.chunks.total > 0 && run.chunks.failed === run.chunks.total) {
      return 'transport-failed';
    }
    if (run.totalEvents === 0) {
      return 'no-events';
    }
    if (run.pricePoints.length === 0) {
      return 'no-priceable-swaps';
    }
    return 'ok';
  }

  private setState(state: AnalyzerState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit('state', state);
  }

  private emitChunk(event: ChunkEvent): void {
    this.emit('chunk', event);
  }
}

export default SwapAnalyzer;
