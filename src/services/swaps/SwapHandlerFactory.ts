/**
 * Per-version swap handling: decoding, pricing and trade flow
 */

import { decodeSwap, SWAP_TOPICS } from './SwapDecoder';
import { priceV2Swap, priceV3Swap } from '../pricing/PriceCalculator';
import { PoolMetadata, PoolVersion } from '../../types/dex.types';
import {
  DecodedSwap,
  PriceQuote,
  RawLogEntry,
  TradeDirection,
  TradeFlow,
} from '../../types/swap.types';

export interface SwapHandler {
  readonly version: PoolVersion;
  readonly swapTopic: string;
  decode(log: RawLogEntry): DecodedSwap | null;
  price(swap: DecodedSwap, pool: PoolMetadata, token: string): PriceQuote | null;
  /**
   * Direction and leg sizes relative to the quote token
   */
  flow(swap: DecodedSwap, pool: PoolMetadata, quoteToken: string): TradeFlow | null;
}

/**
 * Whether `token` is token0 of the pool; null when it is not a pool token
 */
function tokenSide(pool: PoolMetadata, token: string): boolean | null {
  const normalized = token.toLowerCase();
  if (normalized === pool.token0) return true;
  if (normalized === pool.token1) return false;
  return null;
}

function netAmount(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a;
}

const v2Handler: SwapHandler = {
  version: PoolVersion.V2,
  swapTopic: SWAP_TOPICS[PoolVersion.V2],

  decode: (log) => decodeSwap(log, PoolVersion.V2),

  price(swap, pool, token) {
    const isToken0 = tokenSide(pool, token);
    if (swap.version !== PoolVersion.V2 || isToken0 === null) return null;
    return priceV2Swap(swap, pool, isToken0);
  },

  flow(swap, pool, quoteToken) {
    const quoteIsToken0 = tokenSide(pool, quoteToken);
    if (swap.version !== PoolVersion.V2 || quoteIsToken0 === null) return null;

    const quoteIn = quoteIsToken0 ? swap.amount0In : swap.amount1In;
    const quoteOut = quoteIsToken0 ? swap.amount0Out : swap.amount1Out;
    const otherIn = quoteIsToken0 ? swap.amount1In : swap.amount0In;
    const otherOut = quoteIsToken0 ? swap.amount1Out : swap.amount0Out;

    const buyPattern = quoteIn > 0n && otherOut > 0n;
    const sellPattern = otherIn > 0n && quoteOut > 0n;

    if (buyPattern && !sellPattern) {
      return { direction: 'buy', quoteAmountRaw: quoteIn, tokenAmountRaw: otherOut };
    }
    if (sellPattern && !buyPattern) {
      return { direction: 'sell', quoteAmountRaw: quoteOut, tokenAmountRaw: otherIn };
    }
    return {
      direction: 'ambiguous',
      quoteAmountRaw: netAmount(quoteIn, quoteOut),
      tokenAmountRaw: netAmount(otherIn, otherOut),
    };
  },
};

const v3Handler: SwapHandler = {
  version: PoolVersion.V3,
  swapTopic: SWAP_TOPICS[PoolVersion.V3],

  decode: (log) => decodeSwap(log, PoolVersion.V3),

  price(swap, pool, token) {
    const isToken0 = tokenSide(pool, token);
    if (swap.version !== PoolVersion.V3 || isToken0 === null) return null;
    return priceV3Swap(swap, pool, isToken0);
  },

  flow(swap, pool, quoteToken) {
    const quoteIsToken0 = tokenSide(pool, quoteToken);
    if (swap.version !== PoolVersion.V3 || quoteIsToken0 === null) return null;

    // Positive amounts flow into the pool
    const quote = quoteIsToken0 ? swap.amount0 : swap.amount1;
    const other = quoteIsToken0 ? swap.amount1 : swap.amount0;

    let direction: TradeDirection = 'ambiguous';
    if (quote > 0n && other < 0n) direction = 'buy';
    else if (quote < 0n && other > 0n) direction = 'sell';

    return {
      direction,
      quoteAmountRaw: quote < 0n ? -quote : quote,
      tokenAmountRaw: other < 0n ? -other : other,
    };
  },
};

const HANDLERS: Record<PoolVersion, SwapHandler> = {
  [PoolVersion.V2]: v2Handler,
  [PoolVersion.V3]: v3Handler,
};

export function getSwapHandler(version: PoolVersion): SwapHandler {
  return HANDLERS[version];
}
