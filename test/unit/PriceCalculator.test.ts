/**
 * Token price derivation tests
 */

import { calculateTokenPrice, priceV3Swap } from '../../src/services/pricing/PriceCalculator';
import { Q96 } from '../../src/services/utils/PriceFormatter';
import { PoolVersion } from '../../src/types/dex.types';
import { V2Swap, V3Swap } from '../../src/types/swap.types';
import { OTHER_TOKEN, ROUTER, TOKEN, TRADER, USDC, WETH, ONE, tknWethPool } from '../helpers/fixtures';

function v2Swap(amounts: Partial<Pick<V2Swap, 'amount0In' | 'amount1In' | 'amount0Out' | 'amount1Out'>>): V2Swap {
  return {
    version: PoolVersion.V2,
    amount0In: 0n,
    amount1In: 0n,
    amount0Out: 0n,
    amount1Out: 0n,
    sender: ROUTER,
    recipient: TRADER,
    ...amounts,
  };
}

function v3Swap(amount0: bigint, amount1: bigint, sqrtPriceX96: bigint): V3Swap {
  return {
    version: PoolVersion.V3,
    amount0,
    amount1,
    sqrtPriceX96,
    liquidity: 10n ** 20n,
    tick: 0,
    sender: ROUTER,
    recipient: TRADER,
  };
}

describe('PriceCalculator', () => {
  describe('V2 swaps', () => {
    const pool = tknWethPool();
    // 0.1 WETH in, 50 TKN out
    const buy = v2Swap({ amount1In: ONE / 10n, amount0Out: 50n * ONE });

    it('should price the token from the legs of the swap', () => {
      const quote = calculateTokenPrice(buy, pool, TOKEN);

      expect(quote?.price).toBeCloseTo(0.002, 12);
      expect(quote?.method).toBe('swap-amounts');
      expect(quote?.confidence).toBe('high');
    });

    it('should price the other side as the inverse', () => {
      expect(calculateTokenPrice(buy, pool, WETH)?.price).toBeCloseTo(500, 9);
    });

    it('should adjust for differing decimals', () => {
      const usdcPool = tknWethPool({ token1: USDC, decimals1: 6, symbol1: 'USDC' });
      // 10 USDC in, 4 TKN out
      const swap = v2Swap({ amount1In: 10_000_000n, amount0Out: 4n * ONE });

      expect(calculateTokenPrice(swap, usdcPool, TOKEN)?.price).toBe(2.5);
    });

    it('should accept mixed-case token addresses', () => {
      expect(
        calculateTokenPrice(buy, pool, '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2')?.price
      ).toBeCloseTo(500, 9);
    });

    it('should return null when no leg pair is complete', () => {
      expect(calculateTokenPrice(v2Swap({ amount0In: ONE }), pool, TOKEN)).toBeNull();
    });

    it('should return null for a token outside the pool', () => {
      expect(calculateTokenPrice(buy, pool, OTHER_TOKEN)).toBeNull();
    });
  });

  describe('V3 swaps', () => {
    // USDC (6) / WETH (18) at 2500 USDC per WETH
    const usdcWeth = tknWethPool({
      version: PoolVersion.V3,
      token0: USDC,
      token1: WETH,
      decimals0: 6,
      decimals1: 18,
      symbol0: 'USDC',
      symbol1: 'WETH',
    });
    const sqrtPrice = 20_000n * Q96;

    it('should price from sqrtPriceX96', () => {
      const quote = calculateTokenPrice(v3Swap(1n, -1n, sqrtPrice), usdcWeth, WETH);

      expect(quote?.price).toBeCloseTo(2500, 6);
      expect(quote?.method).toBe('sqrt-price');
    });

    it('should give reciprocal prices for the two pool tokens', () => {
      const swap = v3Swap(1n, -1n, sqrtPrice);
      const weth = calculateTokenPrice(swap, usdcWeth, WETH);
      const usdc = calculateTokenPrice(swap, usdcWeth, USDC);

      expect(usdc?.price).toBeCloseTo(0.0004, 12);
      expect((weth?.price ?? 0) * (usdc?.price ?? 0)).toBeCloseTo(1, 9);
    });

    describe('sqrtPriceX96 round trip', () => {
      function isqrt(value: bigint): bigint {
        if (value < 2n) return value;
        let x = value;
        let y = (x + 1n) / 2n;
        while (y < x) {
          x = y;
          y = (x + value / x) / 2n;
        }
        return x;
      }

      // Encodes a token0 price in token1 units, given as num/den
      function encode(num: bigint, den: bigint, decimals0: number, decimals1: number): bigint {
        return isqrt((num * 10n ** BigInt(decimals1) * Q96 * Q96) / (den * 10n ** BigInt(decimals0)));
      }

      const prices: Array<[bigint, bigint]> = [
        [1n, 8000n],
        [1n, 1n],
        [2500n, 1n],
        [314159n, 10n],
      ];

      it.each([
        [18, 18],
        [6, 18],
        [18, 6],
        [8, 18],
      ])('should recover prices for decimals %i/%i', (decimals0, decimals1) => {
        const pool = tknWethPool({ version: PoolVersion.V3, decimals0, decimals1 });

        for (const [num, den] of prices) {
          const expected = Number(num) / Number(den);
          const swap = v3Swap(1n, -1n, encode(num, den, decimals0, decimals1));

          const token0 = priceV3Swap(swap, pool, true);
          const token1 = priceV3Swap(swap, pool, false);

          expect(token0?.method).toBe('sqrt-price');
          expect(Math.abs((token0?.price ?? 0) - expected) / expected).toBeLessThanOrEqual(1e-9);
          expect(Math.abs((token1?.price ?? 0) - 1 / expected) * expected).toBeLessThanOrEqual(1e-9);
        }
      });
    });

    it('should fall back to the amount ratio above the sanity ceiling', () => {
      const pool = tknWethPool({ version: PoolVersion.V3 });
      // 1 TKN out for 3 WETH in; sqrt price implies 4e10 WETH per TKN
      const swap = v3Swap(-ONE, 3n * ONE, 200_000n * Q96);

      expect(priceV3Swap(swap, pool, true)).toEqual({
        price: 3,
        method: 'amount-ratio',
        confidence: 'low',
      });
    });

    it('should fall back when the sqrt price is zero', () => {
      const pool = tknWethPool({ version: PoolVersion.V3 });

      expect(priceV3Swap(v3Swap(2n * ONE, -ONE, 0n), pool, false)?.price).toBe(2);
    });

    it('should return null when both legs share a sign', () => {
      const pool = tknWethPool({ version: PoolVersion.V3 });

      expect(priceV3Swap(v3Swap(ONE, ONE, 0n), pool, true)).toBeNull();
      expect(priceV3Swap(v3Swap(0n, -ONE, 0n), pool, true)).toBeNull();
    });
  });
});
