/**
 * Chunked swap analysis tests
 */

import { SwapAnalyzer } from '../../src/services/analysis/SwapAnalyzer';
import { ReferencePriceProvider } from '../../src/services/analysis/TradeClassifier';
import { ContractReader } from '../../src/services/blockchain/ContractReader';
import { TokenInfo } from '../../src/services/blockchain/TokenInfo';
import { AnalysisCache } from '../../src/services/cache/AnalysisCache';
import { PoolMetadataResolver } from '../../src/services/pools/PoolMetadataResolver';
import { SWAP_TOPICS } from '../../src/services/swaps/SwapDecoder';
import { AnalysisCancelledError, InvalidRangeError } from '../../src/services/utils/AnalysisErrors';
import { logger } from '../../src/services/utils/Logger';
import { PoolVersion } from '../../src/types/dex.types';
import { AnalysisRequest, AnalyzerState, SkipCounts } from '../../src/types/analysis.types';
import { ReferencePriceSample, TradeClassification } from '../../src/types/swap.types';
import { BASE_TIMESTAMP, FakeTransport } from '../helpers/FakeTransport';
import {
  ONE,
  OTHER_TOKEN,
  THRESHOLDS,
  TOKEN,
  USDC,
  V2_POOL,
  WETH,
  mockPool,
  v2SwapLog,
} from '../helpers/fixtures';

function skippedTotal(skipped: SkipCounts): number {
  return Object.values(skipped).reduce((total, count) => total + count, 0);
}

const SAMPLE: ReferencePriceSample = {
  bucket: 0,
  priceMicro: 2_500_000_000n,
  source: 'historical-pool',
};

// 0.1 WETH in, 50 TKN out
const BUY = { amount1In: ONE / 10n, amount0Out: 50n * ONE };
// 100 TKN in, 0.1 WETH out
const SELL = { amount0In: 100n * ONE, amount1Out: ONE / 10n };

describe('SwapAnalyzer', () => {
  let transport: FakeTransport;
  let resolver: PoolMetadataResolver;
  let oracle: jest.Mocked<ReferencePriceProvider>;
  let analyzer: SwapAnalyzer;

  function request(overrides: Partial<AnalysisRequest> = {}): AnalysisRequest {
    return {
      token: TOKEN,
      pool: V2_POOL,
      version: PoolVersion.V2,
      startBlock: 100,
      endBlock: 299,
      thresholds: THRESHOLDS,
      ...overrides,
    };
  }

  function useSample(sample: ReferencePriceSample | null): void {
    oracle.referencePriceAt.mockImplementation(async () => sample);
  }

  beforeEach(() => {
    transport = new FakeTransport();
    mockPool(transport, V2_POOL, TOKEN, WETH);

    const reader = new ContractReader(transport);
    resolver = new PoolMetadataResolver(reader, new TokenInfo(reader), new AnalysisCache());
    oracle = { referencePriceAt: jest.fn() };
    useSample(SAMPLE);

    analyzer = new SwapAnalyzer(
      { transport, resolver, oracle },
      {
        chunkSize: 100,
        classifier: { baseAsset: WETH, baseDecimals: 18, referenceStables: [USDC] },
      }
    );
  });

  describe('a mixed range', () => {
    beforeEach(() => {
      const malformed = v2SwapLog({ blockNumber: 150, logIndex: 1 }, BUY);
      transport.logs = [
        v2SwapLog({ blockNumber: 110 }, BUY),
        { ...malformed, data: malformed.data.slice(0, 66) },
        v2SwapLog({ blockNumber: 210 }, SELL),
        v2SwapLog({ blockNumber: 250 }, { amount0In: ONE }),
        v2SwapLog({ blockNumber: 400 }, BUY),
      ];
    });

    it('should walk the range in chunks', async () => {
      await analyzer.analyze(request());

      expect(transport.logQueries).toEqual([
        { address: V2_POOL, fromBlock: 100, toBlock: 199, topics: [SWAP_TOPICS[PoolVersion.V2]] },
        { address: V2_POOL, fromBlock: 200, toBlock: 299, topics: [SWAP_TOPICS[PoolVersion.V2]] },
      ]);
    });

    it('should count events, swaps and skips', async () => {
      const result = await analyzer.analyze(request());

      expect(result.status).toBe('ok');
      expect(result.summary.totalEvents).toBe(4);
      expect(result.summary.totalSwaps).toBe(3);
      expect(result.skipped).toEqual({
        'decode-failed': 1,
        'price-undetermined': 1,
        'reference-price-unavailable': 0,
        'unsupported-quote': 0,
      });
      expect(result.chunks).toEqual({ total: 2, empty: 0, failed: 0 });
      expect(result.pricePoints.length + skippedTotal(result.skipped)).toBe(result.summary.totalEvents);
    });

    it('should record price points in both currencies', async () => {
      const result = await analyzer.analyze(request());
      const [first, second] = result.pricePoints;

      expect(result.pricePoints).toHaveLength(2);
      expect(first.blockNumber).toBe(110);
      expect(first.tokenPriceBase).toBeCloseTo(0.002, 12);
      expect(first.tokenPriceRef).toBeCloseTo(5, 9);
      expect(first.basePriceRef).toBe(2500);
      expect(first.timestamp).toBe(BASE_TIMESTAMP + 110 * 12);
      expect(second.tokenPriceBase).toBeCloseTo(0.001, 12);
    });

    it('should return buys only and flag large purchases', async () => {
      const large: TradeClassification[] = [];
      analyzer.on('largePurchase', (trade: TradeClassification) => large.push(trade));

      const result = await analyzer.analyze(request());

      expect(result.trades).toHaveLength(1);
      expect(result.trades[0].direction).toBe('buy');
      expect(result.summary.buyCount).toBe(1);
      expect(result.summary.sellCount).toBe(1);
      expect(result.summary.ambiguousCount).toBe(1);
      expect(result.summary.largePurchases.count).toBe(1);
      expect(large.map((trade) => trade.blockNumber)).toEqual([110]);
    });

    it('should ask the oracle once per block', async () => {
      await analyzer.analyze(request());

      expect(oracle.referencePriceAt.mock.calls.map(([block]) => block)).toEqual([110, 210, 250]);
    });

    it('should emit state transitions and chunk progress', async () => {
      const states: AnalyzerState[] = [];
      const chunks: number[] = [];
      analyzer.on('state', (state: AnalyzerState) => states.push(state));
      analyzer.on('chunk', (chunk: { fromBlock: number }) => chunks.push(chunk.fromBlock));

      await analyzer.analyze(request());

      expect(states).toEqual([
        'fetching', 'decoding', 'pricing', 'classifying', 'idle',
        'fetching', 'decoding', 'pricing', 'classifying', 'idle',
        'done',
      ]);
      expect(chunks).toEqual([100, 200]);
      expect(analyzer.getState()).toBe('done');
    });

    it('should keep base-quoted points without a reference price', async () => {
      useSample(null);

      const result = await analyzer.analyze(request());

      expect(result.pricePoints).toHaveLength(2);
      expect(result.pricePoints[0].tokenPriceRef).toBeNull();
      expect(result.skipped['reference-price-unavailable']).toBe(0);
      expect(result.summary.missingReferencePrice).toBe(2);
      expect(result.trades[0].refAmountMicro).toBeNull();
      expect(result.trades[0].isLargePurchase).toBe(true);
    });

    it('should account for every swap once when reference prices are missing', async () => {
      useSample(null);
      transport.logs = [v2SwapLog({ blockNumber: 110 }, BUY), v2SwapLog({ blockNumber: 120 }, BUY)];

      const result = await analyzer.analyze(request());

      expect(result.summary.totalSwaps).toBe(2);
      expect(result.pricePoints).toHaveLength(2);
      expect(skippedTotal(result.skipped)).toBe(0);
      expect(result.summary.missingReferencePrice).toBe(2);
    });

    it('should carry on past a failed chunk', async () => {
      transport.failingChunks.add(200);

      const result = await analyzer.analyze(request());

      expect(result.status).toBe('ok');
      expect(result.chunks).toEqual({ total: 2, empty: 0, failed: 1 });
      expect(result.pricePoints).toHaveLength(1);
    });
  });

  describe('run status', () => {
    it('should report no-events for an empty range, the same way twice', async () => {
      const first = await analyzer.analyze(request());
      const second = await analyzer.analyze(request());

      expect(first.status).toBe('no-events');
      expect(first.chunks.empty).toBe(2);
      expect(second.summary).toEqual(first.summary);
    });

    it('should report no-priceable-swaps when nothing can be priced', async () => {
      transport.logs = [v2SwapLog({ blockNumber: 120 }, { amount0In: ONE })];

      const result = await analyzer.analyze(request());

      expect(result.status).toBe('no-priceable-swaps');
      expect(result.summary.lowest).toBeNull();
    });

    it('should report transport-failed when every chunk fails', async () => {
      transport.failAllLogs = true;

      const result = await analyzer.analyze(request());

      expect(result.status).toBe('transport-failed');
      expect(result.chunks.failed).toBe(2);
    });
  });

  describe('quote tokens', () => {
    it('should convert stable-quoted prices into the base asset', async () => {
      mockPool(transport, V2_POOL, TOKEN, USDC);
      // 10 USDC in, 4 TKN out
      transport.logs = [v2SwapLog({ blockNumber: 120 }, { amount1In: 10_000_000n, amount0Out: 4n * ONE })];

      const result = await analyzer.analyze(request());
      const [pricePoint] = result.pricePoints;

      expect(pricePoint.tokenPriceRef).toBe(2.5);
      expect(pricePoint.tokenPriceBase).toBeCloseTo(0.001, 12);
      expect(result.trades[0].refSource).toBe('direct');
    });

    it('should drop the price point but still classify stable-quoted swaps without a reference price', async () => {
      mockPool(transport, V2_POOL, TOKEN, USDC);
      useSample(null);
      // 5000 USDC in, 4 TKN out
      transport.logs = [v2SwapLog({ blockNumber: 120 }, { amount1In: 5_000_000_000n, amount0Out: 4n * ONE })];

      const result = await analyzer.analyze(request());

      expect(result.status).toBe('no-priceable-swaps');
      expect(result.pricePoints).toEqual([]);
      expect(result.skipped['reference-price-unavailable']).toBe(1);
      expect(result.trades).toHaveLength(1);
      expect(result.trades[0]).toMatchObject({
        direction: 'buy',
        refSource: 'direct',
        refAmountMicro: 5_000_000_000n,
        baseAmountRaw: 0n,
        isLargeByBase: false,
        isLargeByRef: true,
        isLargePurchase: true,
      });
      expect(result.summary.largePurchases.count).toBe(1);
    });

    it('should skip pools without a supported quote token', async () => {
      mockPool(transport, V2_POOL, TOKEN, OTHER_TOKEN);
      transport.logs = [v2SwapLog({ blockNumber: 120 }, BUY), v2SwapLog({ blockNumber: 130 }, SELL)];

      const result = await analyzer.analyze(request());

      expect(result.skipped['unsupported-quote']).toBe(2);
      expect(result.trades).toEqual([]);
      expect(oracle.referencePriceAt).not.toHaveBeenCalled();
    });
  });

  describe('fallback reference prices', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should warn for and count every trade valued at the fallback price', async () => {
      const warn = jest.spyOn(logger, 'warn');
      useSample({ bucket: 0, priceMicro: 3_500_000_000n, source: 'fixed-fallback' });
      transport.logs = [
        v2SwapLog({ blockNumber: 110, transactionHash: '0xaa' }, BUY),
        v2SwapLog({ blockNumber: 111, transactionHash: '0xbb' }, SELL),
      ];

      const result = await analyzer.analyze(request());

      expect(result.summary.fallbackPricedTrades).toBe(2);
      expect(warn).toHaveBeenCalledWith('Trade 0xaa:0 valued at the fixed fallback reference price', {
        pool: V2_POOL,
        blockNumber: 110,
      });
      expect(warn).toHaveBeenCalledWith('Trade 0xbb:0 valued at the fixed fallback reference price', {
        pool: V2_POOL,
        blockNumber: 111,
      });
    });
  });

  describe('timestamps', () => {
    it('should fetch each block timestamp once', async () => {
      transport.logs = [
        v2SwapLog({ blockNumber: 120, logIndex: 0 }, BUY),
        v2SwapLog({ blockNumber: 120, logIndex: 1 }, BUY),
      ];

      const result = await analyzer.analyze(request());

      expect(result.pricePoints.map((p) => p.timestamp)).toEqual([
        BASE_TIMESTAMP + 1440,
        BASE_TIMESTAMP + 1440,
      ]);
      expect(transport.timestampRequests).toEqual([120]);
    });

    it('should prefer a timestamp carried by the log', async () => {
      transport.logs = [{ ...v2SwapLog({ blockNumber: 120 }, BUY), timestamp: 42 }];

      const result = await analyzer.analyze(request());

      expect(result.pricePoints[0].timestamp).toBe(42);
      expect(transport.timestampRequests).toEqual([]);
    });

    it('should leave the timestamp null when the block cannot be read', async () => {
      transport.failTimestamps = true;
      transport.logs = [v2SwapLog({ blockNumber: 120 }, BUY)];

      const result = await analyzer.analyze(request());

      expect(result.status).toBe('ok');
      expect(result.pricePoints[0].timestamp).toBeNull();
    });
  });

  describe('cancellation and validation', () => {
    it('should not fetch anything when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const run = analyzer.analyze(request({ signal: controller.signal }));

      await expect(run).rejects.toBeInstanceOf(AnalysisCancelledError);
      await expect(run).rejects.toMatchObject({ lastCompletedBlock: null });
      expect(transport.logQueries).toEqual([]);
    });

    it('should stop between chunks and report the last completed block', async () => {
      const controller = new AbortController();
      analyzer.on('chunk', () => controller.abort());

      await expect(analyzer.analyze(request({ signal: controller.signal }))).rejects.toMatchObject({
        code: 'ANALYSIS_CANCELLED',
        lastCompletedBlock: 199,
      });
      expect(transport.logQueries).toHaveLength(1);
      expect(analyzer.getState()).toBe('idle');
    });

    it('should reject an inverted range before touching the chain', async () => {
      await expect(analyzer.analyze(request({ startBlock: 300, endBlock: 200 }))).rejects.toBeInstanceOf(
        InvalidRangeError
      );
      expect(transport.calls).toEqual([]);
    });

    it('should reject chunk sizes below one', () => {
      expect(
        () =>
          new SwapAnalyzer(
            { transport, resolver, oracle },
            { chunkSize: 0, classifier: { baseAsset: WETH, baseDecimals: 18, referenceStables: [] } }
          )
      ).toThrow('Chunk size must be at least 1');
    });
  });
});
