/**
 * Large purchase threshold parsing
 */

import { parseUnits } from 'ethers';
import { LargeTradeThresholds } from '../types/analysis.types';
import { EnvironmentConfig } from './environment';

/** Reference currency amounts are fixed-point with six decimals */
export const REFERENCE_DECIMALS = 6;

export const BASE_DECIMALS = 18;

/**
 * Convert decimal strings (e.g. "0.1" ETH, "1000" USD) into raw thresholds
 */
export function parseThresholds(baseAmount: string, refAmountUsd: string): LargeTradeThresholds {
  const baseRaw = parseUnits(baseAmount, BASE_DECIMALS);
  const refMicro = parseUnits(refAmountUsd, REFERENCE_DECIMALS);

  if (baseRaw < 0n || refMicro < 0n) {
    throw new Error('Large purchase thresholds must not be negative');
  }

  return { baseRaw, refMicro };
}

export function thresholdsFromConfig(
  config: Pick<EnvironmentConfig, 'BIG_BUY_BASE_THRESHOLD' | 'BIG_BUY_REF_THRESHOLD_USD'>,
  refOverrideUsd?: string
): LargeTradeThresholds {
  const refAmountUsd = refOverrideUsd ?? config.BIG_BUY_REF_THRESHOLD_USD;
  if (!refAmountUsd) {
    throw new Error('BIG_BUY_REF_THRESHOLD_USD must be set for every analysis run');
  }

  return parseThresholds(config.BIG_BUY_BASE_THRESHOLD, refAmountUsd);
}
