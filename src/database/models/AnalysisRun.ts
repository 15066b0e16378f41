'use strict';

import { randomUUID } from 'crypto';
import sqlite from '../sqlite';
import { logger } from '../../services/utils/Logger';
import { toJson } from '../../services/utils/PriceFormatter';
import { AnalysisResult, AnalysisStatus } from '../../types/analysis.types';

/**
 * Analysis run model
 * Persists run summaries with their price points and large purchases
 */
export interface AnalysisRunRow {
  id: string;
  token: string;
  pool: string;
  version: string;
  symbol0: string;
  symbol1: string;
  start_block: number;
  end_block: number;
  status: AnalysisStatus;
  total_events: number;
  total_swaps: number;
  price_point_count: number;
  large_purchase_count: number;
  summary: string; // JSON, bigints as strings
  created_at: number;
}

export interface PricePointRow {
  block_number: number;
  tx_hash: string;
  log_index: number;
  timestamp: number | null;
  price_base: number;
  price_ref: number | null;
  base_price_ref: number | null;
  method: string;
  confidence: string;
}

export interface AnalysisRunStats {
  runs: number;
  byStatus: Record<string, number>;
  pricePoints: number;
  largePurchases: number;
}

export class AnalysisRun {
  private static readonly TABLE = 'analysis_runs';

  /**
   * Store a finished run in a single transaction; returns the run id
   */
  public static async save(result: AnalysisResult): Promise<string> {
    const id = randomUUID();
    const now = Date.now();
    const { summary, pool } = result;
    const largePurchases = result.trades.filter((trade) => trade.isLargePurchase);

    try {
      const insertRun = sqlite.prepare(`
        INSERT INTO ${this.TABLE} (
          id, token, pool, version, symbol0, symbol1, start_block, end_block, status,
          total_events, total_swaps, price_point_count, large_purchase_count, summary, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);

      const insertPoint = sqlite.prepare(`
        INSERT INTO price_points (
          run_id, block_number, tx_hash, log_index, timestamp,
          price_base, price_ref, base_price_ref, method, confidence
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);

      const insertPurchase = sqlite.prepare(`
        INSERT INTO large_purchases (
          run_id, token, pool, block_number, tx_hash, log_index, buyer,
          base_amount_raw, base_amount, token_amount_raw, ref_amount_micro, ref_source,
          by_base, by_ref, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);

      sqlite.transaction(() => {
        insertRun.run(
          id,
          summary.token,
          pool.address,
          pool.version,
          pool.symbol0,
          pool.symbol1,
          summary.startBlock,
          summary.endBlock,
          result.status,
          summary.totalEvents,
          summary.totalSwaps,
          result.pricePoints.length,
          largePurchases.length,
          toJson(summary),
          now
        );

        for (const point of result.pricePoints) {
          insertPoint.run(
            id,
            point.blockNumber,
            point.transactionHash,
            point.logIndex,
            point.timestamp,
            point.tokenPriceBase,
            point.tokenPriceRef,
            point.basePriceRef,
            point.method,
            point.confidence
          );
        }

        for (const trade of largePurchases) {
          insertPurchase.run(
            id,
            summary.token,
            pool.address,
            trade.blockNumber,
            trade.transactionHash,
            trade.logIndex,
            trade.counterpartAddress,
            trade.baseAmountRaw.toString(),
            trade.baseAmount,
            trade.tokenAmountRaw.toString(),
            trade.refAmountMicro === null ? null : trade.refAmountMicro.toString(),
            trade.refSource,
            trade.isLargeByBase ? 1 : 0,
            trade.isLargeByRef ? 1 : 0,
            now
          );
        }
      });

      logger.info(`Saved analysis run ${id}`, {
        pool: pool.address,
        pricePoints: result.pricePoints.length,
        largePurchases: largePurchases.length,
      });

      return id;
    } catch (error) {
      logger.error(`Failed to save analysis run: ${error}`);
      throw new Error(`Analysis run save failed: ${error}`);
    }
  }

  /**
   * Find run by ID
   */
  public static async findById(id: string): Promise<AnalysisRunRow | null> {
    const row = sqlite
      .prepare<AnalysisRunRow>(`SELECT * FROM ${this.TABLE} WHERE id = ?`)
      .get(id);
    return row ?? null;
  }

  /**
   * Most recent runs, optionally for one token
   */
  public static async findRecent(
    options: { token?: string; limit?: number } = {}
  ): Promise<AnalysisRunRow[]> {
    const limit = options.limit ?? 20;

    if (options.token) {
      return sqlite
        .prepare<AnalysisRunRow>(`
          SELECT * FROM ${this.TABLE}
          WHERE token = ?
          ORDER BY created_at DESC
          LIMIT ?
        `)
        .all(options.token.toLowerCase(), limit);
    }

    return sqlite
      .prepare<AnalysisRunRow>(`
        SELECT * FROM ${this.TABLE}
        ORDER BY created_at DESC
        LIMIT ?
      `)
      .all(limit);
  }

  /**
   * Price points of a run in block order
   */
  public static async getPricePoints(runId: string): Promise<PricePointRow[]> {
    return sqlite
      .prepare<PricePointRow>(`
        SELECT block_number, tx_hash, log_index, timestamp, price_base, price_ref,
               base_price_ref, method, confidence
        FROM price_points
        WHERE run_id = ?
        ORDER BY block_number ASC, log_index ASC
      `)
      .all(runId);
  }

  /**
   * Get run statistics
   */
  public static async getStats(): Promise<AnalysisRunStats> {
    const statusRows = sqlite
      .prepare<{ status: string; count: number }>(`
        SELECT status, COUNT(*) as count FROM ${this.TABLE} GROUP BY status
      `)
      .all();

    const byStatus: Record<string, number> = {};
    let runs = 0;
    for (const row of statusRows) {
      byStatus[row.status] = row.count;
      runs += row.count;
    }

    const points = sqlite.prepare<{ count: number }>('SELECT COUNT(*) as count FROM price_points').get();
    const purchases = sqlite
      .prepare<{ count: number }>('SELECT COUNT(*) as count FROM large_purchases')
      .get();

    return {
      runs,
      byStatus,
      pricePoints: points?.count ?? 0,
      largePurchases: purchases?.count ?? 0,
    };
  }
}

export default AnalysisRun;
