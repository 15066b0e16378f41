/**
 * Price and amount formatting utilities
 */

import { formatUnits } from 'ethers';

export const Q96 = 2n ** 96n;
export const Q192 = Q96 * Q96;

const MICRO = 10n ** 6n;

export function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

/**
 * Raw integer amount to a float in whole units
 */
export function toDecimal(amount: bigint, decimals: number): number {
  return parseFloat(formatUnits(amount, decimals));
}

/**
 * Format token amount with proper decimals
 */
export function formatTokenAmount(
  amount: bigint,
  decimals: number,
  maxDecimals: number = 6
): string {
  const num = toDecimal(amount, decimals);

  if (num === 0) return '0';

  // For small numbers, show more decimals
  if (Math.abs(num) < 0.01) {
    return num.toFixed(Math.min(decimals, 8));
  }

  return num.toFixed(Math.min(maxDecimals, decimals));
}

/**
 * Format reference micro-units as USD
 */
export function formatMicroUsd(amountMicro: bigint, decimals: number = 2): string {
  return `$${toDecimal(amountMicro, 6).toFixed(decimals)}`;
}

export function formatUSD(amount: number, decimals: number = 2): string {
  return `$${amount.toFixed(decimals)}`;
}

export function formatPercentage(value: number, decimals: number = 2): string {
  return `${value.toFixed(decimals)}%`;
}

/**
 * Price of token0 in token1 units from a V3 sqrtPriceX96
 */
export function sqrtPriceToRatio(
  sqrtPriceX96: bigint,
  decimals0: number,
  decimals1: number
): number {
  const sqrtPrice = Number(sqrtPriceX96) / Number(Q96);
  return sqrtPrice * sqrtPrice * Math.pow(10, decimals0 - decimals1);
}

/**
 * Exact price of one whole target token in the other pool token, as
 * six-decimal fixed point. Null when the pool price is zero.
 */
export function sqrtPriceToMicro(
  sqrtPriceX96: bigint,
  decimals0: number,
  decimals1: number,
  targetIsToken0: boolean
): bigint | null {
  const squared = sqrtPriceX96 * sqrtPriceX96;
  if (squared === 0n) return null;

  const scale0 = pow10(decimals0);
  const scale1 = pow10(decimals1);

  if (targetIsToken0) {
    return (squared * scale0 * MICRO) / (Q192 * scale1);
  }
  return (Q192 * scale1 * MICRO) / (squared * scale0);
}

/**
 * Change a raw amount's fixed-point precision, truncating
 */
export function rescale(amount: bigint, fromDecimals: number, toDecimals: number): bigint {
  if (fromDecimals === toDecimals) return amount;
  if (fromDecimals > toDecimals) return amount / pow10(fromDecimals - toDecimals);
  return amount * pow10(toDecimals - fromDecimals);
}

/**
 * JSON.stringify replacer writing bigints as decimal strings
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function toJson(value: unknown, space?: number): string {
  return JSON.stringify(value, bigintReplacer, space);
}
