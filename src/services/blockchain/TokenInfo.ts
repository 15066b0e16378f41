'use strict';

import { logger } from '../utils/Logger';
import { parseErrorMessage } from '../utils/ErrorHandler';
import { ContractReader } from './ContractReader';
import { ALL_TOKENS } from '../../config/tokens';
import { TokenRef } from '../../types/dex.types';

const ERC20 = {
  decimals: 'function decimals() view returns (uint8)',
  symbol: 'function symbol() view returns (string)',
};

export const DEFAULT_DECIMALS = 18;
export const UNKNOWN_SYMBOL = 'UNKNOWN';

/**
 * Token information fetcher with caching
 */
export class TokenInfo {
  private cache: Map<string, TokenRef> = new Map();

  // Known token decimals for Ethereum mainnet
  private static readonly KNOWN: Map<string, TokenRef> = new Map(
    ALL_TOKENS.map((token) => [token.address.toLowerCase(), token])
  );

  constructor(private reader: ContractReader, private timeoutMs?: number) {}

  /**
   * Get token decimals; unreadable decimals default to 18
   */
  async getDecimals(tokenAddress: string): Promise<number> {
    const normalized = tokenAddress.toLowerCase();

    const known = TokenInfo.KNOWN.get(normalized) ?? this.cache.get(normalized);
    if (known) {
      return known.decimals;
    }

    try {
      const [decimals] = await this.reader.read(normalized, ERC20.decimals, [], {
        timeoutMs: this.timeoutMs,
      });
      return Number(decimals);
    } catch (error) {
      logger.warn(`Failed to fetch decimals for ${tokenAddress}, defaulting to ${DEFAULT_DECIMALS}`, {
        error: parseErrorMessage(error),
      });
      return DEFAULT_DECIMALS;
    }
  }

  async getSymbol(tokenAddress: string): Promise<string> {
    const normalized = tokenAddress.toLowerCase();

    const known = TokenInfo.KNOWN.get(normalized) ?? this.cache.get(normalized);
    if (known) {
      return known.symbol;
    }

    try {
      const [symbol] = await this.reader.read(normalized, ERC20.symbol, [], {
        timeoutMs: this.timeoutMs,
      });
      return typeof symbol === 'string' && symbol ? symbol : UNKNOWN_SYMBOL;
    } catch (error) {
      logger.debug(`Failed to fetch symbol for ${tokenAddress}`, {
        error: parseErrorMessage(error),
      });
      return UNKNOWN_SYMBOL;
    }
  }

  /**
   * Get token metadata with caching
   */
  async getMetadata(tokenAddress: string): Promise<TokenRef> {
    const normalized = tokenAddress.toLowerCase();

    const cached = this.cache.get(normalized);
    if (cached) {
      return cached;
    }

    const [decimals, symbol] = await Promise.all([
      this.getDecimals(normalized),
      this.getSymbol(normalized),
    ]);

    const metadata: TokenRef = { address: normalized, decimals, symbol };
    this.cache.set(normalized, metadata);

    return metadata;
  }
}

export default TokenInfo;
