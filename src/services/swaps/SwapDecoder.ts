/**
 * Swap event log decoding for V2 and V3 pools
 */

import { id, dataSlice, toBigInt, fromTwos } from 'ethers';
import { PoolVersion } from '../../types/dex.types';
import { DecodedSwap, RawLogEntry, V2Swap, V3Swap } from '../../types/swap.types';
import { logger } from '../utils/Logger';
import { parseErrorMessage } from '../utils/ErrorHandler';

export const SWAP_SIGNATURES: Record<PoolVersion, string> = {
  [PoolVersion.V2]: 'Swap(address,uint256,uint256,uint256,uint256,address)',
  [PoolVersion.V3]: 'Swap(address,address,int256,int256,uint160,uint128,int24)',
};

export const SWAP_TOPICS: Record<PoolVersion, string> = {
  [PoolVersion.V2]: id(SWAP_SIGNATURES[PoolVersion.V2]),
  [PoolVersion.V3]: id(SWAP_SIGNATURES[PoolVersion.V3]),
};

const HEX_DATA = /^0x([0-9a-fA-F]{2})*$/;
const TOPIC = /^0x[0-9a-fA-F]{64}$/;
const WORD_BYTES = 32;

/**
 * First `count` 32-byte words of the payload, or null when it is too short
 */
function readWords(data: string, count: number): bigint[] | null {
  if (!HEX_DATA.test(data) || (data.length - 2) / 2 < count * WORD_BYTES) {
    return null;
  }

  const words: bigint[] = [];
  for (let i = 0; i < count; i++) {
    words.push(toBigInt(dataSlice(data, i * WORD_BYTES, (i + 1) * WORD_BYTES)));
  }
  return words;
}

/**
 * Indexed address topic; the address is the low 20 bytes
 */
function topicAddress(topic: string | undefined): string | null {
  if (topic === undefined || !TOPIC.test(topic)) {
    return null;
  }
  return dataSlice(topic, 12).toLowerCase();
}

function hasSwapTopic(log: RawLogEntry, version: PoolVersion): boolean {
  const topic0 = log.topics[0];
  return topic0 !== undefined && topic0.toLowerCase() === SWAP_TOPICS[version];
}

export function decodeV2Swap(log: RawLogEntry): V2Swap | null {
  if (!hasSwapTopic(log, PoolVersion.V2)) return null;

  const sender = topicAddress(log.topics[1]);
  const recipient = topicAddress(log.topics[2]);
  const words = readWords(log.data, 4);
  if (!sender || !recipient || !words) return null;

  const [amount0In, amount1In, amount0Out, amount1Out] = words;
  return {
    version: PoolVersion.V2,
    amount0In,
    amount1In,
    amount0Out,
    amount1Out,
    sender,
    recipient,
  };
}

export function decodeV3Swap(log: RawLogEntry): V3Swap | null {
  if (!hasSwapTopic(log, PoolVersion.V3)) return null;

  const sender = topicAddress(log.topics[1]);
  const recipient = topicAddress(log.topics[2]);
  const words = readWords(log.data, 5);
  if (!sender || !recipient || !words) return null;

  const [rawAmount0, rawAmount1, rawSqrtPrice, rawLiquidity, rawTick] = words;
  return {
    version: PoolVersion.V3,
    amount0: fromTwos(rawAmount0, 256),
    amount1: fromTwos(rawAmount1, 256),
    sqrtPriceX96: BigInt.asUintN(160, rawSqrtPrice),
    liquidity: BigInt.asUintN(128, rawLiquidity),
    tick: Number(fromTwos(BigInt.asUintN(24, rawTick), 24)),
    sender,
    recipient,
  };
}

/**
 * Decode a raw swap log for the given pool version. Never throws; malformed
 * input yields null.
 */
export function decodeSwap(log: RawLogEntry, version: PoolVersion): DecodedSwap | null {
  try {
    return version === PoolVersion.V2 ? decodeV2Swap(log) : decodeV3Swap(log);
  } catch (error) {
    logger.debug(`Undecodable ${version} swap log`, {
      txHash: log.transactionHash,
      logIndex: log.logIndex,
      error: parseErrorMessage(error),
    });
    return null;
  }
}
