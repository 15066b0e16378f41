/**
 * Token unit prices from decoded swaps
 */

import { toDecimal, sqrtPriceToRatio } from '../utils/PriceFormatter';
import { PoolMetadata, PoolVersion } from '../../types/dex.types';
import { DecodedSwap, PriceQuote, V2Swap, V3Swap } from '../../types/swap.types';

/** Pool prices above this are treated as corrupt */
export const MAX_SANE_PRICE = 1e10;

function isUsablePrice(price: number): boolean {
  return Number.isFinite(price) && price > 0;
}

/**
 * Decimal-adjusted amountOther / amountTarget, null unless both are positive
 */
function amountRatio(
  targetAmount: bigint,
  targetDecimals: number,
  otherAmount: bigint,
  otherDecimals: number
): number | null {
  if (targetAmount <= 0n || otherAmount <= 0n) return null;

  const price = toDecimal(otherAmount, otherDecimals) / toDecimal(targetAmount, targetDecimals);
  return isUsablePrice(price) ? price : null;
}

function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

export function priceV2Swap(
  swap: V2Swap,
  pool: PoolMetadata,
  targetIsToken0: boolean
): PriceQuote | null {
  const { decimals0, decimals1 } = pool;

  const price = targetIsToken0
    ? amountRatio(swap.amount0In, decimals0, swap.amount1Out, decimals1) ??
      amountRatio(swap.amount0Out, decimals0, swap.amount1In, decimals1)
    : amountRatio(swap.amount1In, decimals1, swap.amount0Out, decimals0) ??
      amountRatio(swap.amount1Out, decimals1, swap.amount0In, decimals0);

  return price === null ? null : { price, method: 'swap-amounts', confidence: 'high' };
}

export function priceV3Swap(
  swap: V3Swap,
  pool: PoolMetadata,
  targetIsToken0: boolean
): PriceQuote | null {
  const { decimals0, decimals1 } = pool;

  if (swap.sqrtPriceX96 > 0n) {
    const ratio = sqrtPriceToRatio(swap.sqrtPriceX96, decimals0, decimals1);
    const price = targetIsToken0 ? ratio : 1 / ratio;

    if (isUsablePrice(price) && price <= MAX_SANE_PRICE) {
      return { price, method: 'sqrt-price', confidence: 'high' };
    }
  }

  // Fallback needs one leg in and one leg out
  const { amount0, amount1 } = swap;
  if (amount0 === 0n || amount1 === 0n || (amount0 > 0n) === (amount1 > 0n)) {
    return null;
  }

  const price = targetIsToken0
    ? amountRatio(abs(amount0), decimals0, abs(amount1), decimals1)
    : amountRatio(abs(amount1), decimals1, abs(amount0), decimals0);

  return price === null ? null : { price, method: 'amount-ratio', confidence: 'low' };
}

/**
 * Price of one unit of `token` in the pool's other token
 */
export function calculateTokenPrice(
  swap: DecodedSwap,
  pool: PoolMetadata,
  token: string
): PriceQuote | null {
  const target = token.toLowerCase();
  if (target !== pool.token0 && target !== pool.token1) {
    return null;
  }

  const targetIsToken0 = target === pool.token0;

  return swap.version === PoolVersion.V2
    ? priceV2Swap(swap, pool, targetIsToken0)
    : priceV3Swap(swap, pool, targetIsToken0);
}
