/**
 * Addresses, pools and swap logs shared by unit tests
 */

import { AbiCoder, zeroPadValue } from 'ethers';
import { SWAP_TOPICS } from '../../src/services/swaps/SwapDecoder';
import { PoolMetadata, PoolVersion } from '../../src/types/dex.types';
import { RawLogEntry } from '../../src/types/swap.types';
import { LargeTradeThresholds } from '../../src/types/analysis.types';
import { FakeTransport } from './FakeTransport';

export const WETH = '0xc02aaa39b223fe8d0a0e5c4f27ead9083c756cc2';
export const USDC = '0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48';
export const REFERENCE_POOL = '0x88e6a0c2ddd26feeb64f039a2c41296fcb3f5640';
export const TOKEN = '0x1111111111111111111111111111111111111111';
export const OTHER_TOKEN = '0x4444444444444444444444444444444444444444';
export const V2_POOL = '0x2222222222222222222222222222222222222222';
export const V3_POOL = '0x3333333333333333333333333333333333333333';
export const ROUTER = '0x5555555555555555555555555555555555555555';
export const TRADER = '0x6666666666666666666666666666666666666666';

export const ONE = 10n ** 18n;

export const POOL_ABI = {
  token0: 'function token0() view returns (address)',
  token1: 'function token1() view returns (address)',
  fee: 'function fee() view returns (uint24)',
  tickSpacing: 'function tickSpacing() view returns (int24)',
  getReserves: 'function getReserves() view returns (uint112, uint112, uint32)',
  slot0:
    'function slot0() view returns (uint160, int24, uint16, uint16, uint16, uint8, bool)',
};

export const ERC20_ABI = {
  decimals: 'function decimals() view returns (uint8)',
  symbol: 'function symbol() view returns (string)',
};

export const FEED_ABI = {
  decimals: 'function decimals() view returns (uint8)',
  latestRoundData: 'function latestRoundData() view returns (uint80, int256, uint256, uint256, uint80)',
};

/** 0.1 base asset, 1000 USD */
export const THRESHOLDS: LargeTradeThresholds = {
  baseRaw: ONE / 10n,
  refMicro: 1_000_000_000n,
};

export function tknWethPool(overrides: Partial<PoolMetadata> = {}): PoolMetadata {
  return {
    address: V2_POOL,
    version: PoolVersion.V2,
    token0: TOKEN,
    token1: WETH,
    decimals0: 18,
    decimals1: 18,
    symbol0: 'TKN',
    symbol1: 'WETH',
    feeTier: null,
    versionSource: 'hint',
    ...overrides,
  };
}

/**
 * Pool tokens plus the unknown token's decimals and symbol
 */
export function mockPool(
  transport: FakeTransport,
  pool: string,
  token0: string,
  token1: string,
  decimals: number = 18
): void {
  transport.mockCall(pool, POOL_ABI.token0, [token0]);
  transport.mockCall(pool, POOL_ABI.token1, [token1]);
  transport.mockCall(TOKEN, ERC20_ABI.decimals, [decimals]);
  transport.mockCall(TOKEN, ERC20_ABI.symbol, ['TKN']);
}

interface LogPosition {
  blockNumber: number;
  logIndex?: number;
  transactionHash?: string;
  sender?: string;
  recipient?: string;
}

function position(pos: LogPosition, version: PoolVersion): Omit<RawLogEntry, 'data'> {
  const sender = pos.sender ?? ROUTER;
  const recipient = pos.recipient ?? TRADER;
  return {
    blockNumber: pos.blockNumber,
    logIndex: pos.logIndex ?? 0,
    transactionHash:
      pos.transactionHash ??
      '0x' + (pos.blockNumber.toString(16) + (pos.logIndex ?? 0).toString(16)).padStart(64, '0'),
    topics: [SWAP_TOPICS[version], zeroPadValue(sender, 32), zeroPadValue(recipient, 32)],
  };
}

export function v2SwapLog(
  pos: LogPosition,
  amounts: { amount0In?: bigint; amount1In?: bigint; amount0Out?: bigint; amount1Out?: bigint }
): RawLogEntry {
  return {
    ...position(pos, PoolVersion.V2),
    data: AbiCoder.defaultAbiCoder().encode(
      ['uint256', 'uint256', 'uint256', 'uint256'],
      [amounts.amount0In ?? 0n, amounts.amount1In ?? 0n, amounts.amount0Out ?? 0n, amounts.amount1Out ?? 0n]
    ),
  };
}

export function v3SwapLog(
  pos: LogPosition,
  swap: { amount0: bigint; amount1: bigint; sqrtPriceX96: bigint; liquidity?: bigint; tick?: number }
): RawLogEntry {
  return {
    ...position(pos, PoolVersion.V3),
    data: AbiCoder.defaultAbiCoder().encode(
      ['int256', 'int256', 'uint160', 'uint128', 'int24'],
      [swap.amount0, swap.amount1, swap.sqrtPriceX96, swap.liquidity ?? 10n ** 20n, swap.tick ?? 0]
    ),
  };
}
