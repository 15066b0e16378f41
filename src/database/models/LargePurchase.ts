'use strict';

import sqlite from '../sqlite';

/**
 * Large purchase queries
 */
export interface LargePurchaseRow {
  id: number;
  run_id: string;
  token: string;
  pool: string;
  block_number: number;
  tx_hash: string;
  log_index: number;
  buyer: string;
  base_amount_raw: string;
  base_amount: number;
  token_amount_raw: string;
  ref_amount_micro: string | null;
  ref_source: string | null;
  by_base: number;
  by_ref: number;
  created_at: number;
}

export interface LargePurchaseStats {
  count: number;
  totalBaseRaw: bigint;
  totalRefMicro: bigint;
  largestBaseRaw: bigint;
  uniqueBuyers: number;
}

export interface LargePurchaseQuery {
  token?: string;
  runId?: string;
  limit?: number;
}

export class LargePurchase {
  private static readonly TABLE = 'large_purchases';

  public static async findByRun(runId: string): Promise<LargePurchaseRow[]> {
    return sqlite
      .prepare<LargePurchaseRow>(`
        SELECT * FROM ${this.TABLE}
        WHERE run_id = ?
        ORDER BY block_number ASC, log_index ASC
      `)
      .all(runId);
  }

  /**
   * Latest purchases of a token across runs
   */
  public static async findByToken(token: string, limit: number = 100): Promise<LargePurchaseRow[]> {
    return sqlite
      .prepare<LargePurchaseRow>(`
        SELECT * FROM ${this.TABLE}
        WHERE token = ?
        ORDER BY block_number DESC, log_index DESC
        LIMIT ?
      `)
      .all(token.toLowerCase(), limit);
  }

  public static async find(query: LargePurchaseQuery = {}): Promise<LargePurchaseRow[]> {
    if (query.runId) {
      const rows = await this.findByRun(query.runId);
      return rows.slice(0, query.limit ?? rows.length);
    }
    if (query.token) {
      return this.findByToken(query.token, query.limit);
    }

    return sqlite
      .prepare<LargePurchaseRow>(`
        SELECT * FROM ${this.TABLE}
        ORDER BY created_at DESC, block_number DESC
        LIMIT ?
      `)
      .all(query.limit ?? 100);
  }

  /**
   * Totals are summed as bigints; amounts are stored as decimal strings
   */
  public static async getStats(token?: string): Promise<LargePurchaseStats> {
    const rows = token
      ? sqlite
          .prepare<Pick<LargePurchaseRow, 'base_amount_raw' | 'ref_amount_micro' | 'buyer'>>(`
            SELECT base_amount_raw, ref_amount_micro, buyer FROM ${this.TABLE} WHERE token = ?
          `)
          .all(token.toLowerCase())
      : sqlite
          .prepare<Pick<LargePurchaseRow, 'base_amount_raw' | 'ref_amount_micro' | 'buyer'>>(`
            SELECT base_amount_raw, ref_amount_micro, buyer FROM ${this.TABLE}
          `)
          .all();

    let totalBaseRaw = 0n;
    let totalRefMicro = 0n;
    let largestBaseRaw = 0n;
    const buyers = new Set<string>();

    for (const row of rows) {
      const base = BigInt(row.base_amount_raw);
      totalBaseRaw += base;
      if (base > largestBaseRaw) largestBaseRaw = base;
      if (row.ref_amount_micro !== null) totalRefMicro += BigInt(row.ref_amount_micro);
      buyers.add(row.buyer);
    }

    return {
      count: rows.length,
      totalBaseRaw,
      totalRefMicro,
      largestBaseRaw,
      uniqueBuyers: buyers.size,
    };
  }
}

export default LargePurchase;
