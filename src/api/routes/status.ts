import { Router, Request, Response, NextFunction } from 'express';
import { logger } from '../../services/utils/Logger';
import { AnalysisCache, CacheStats } from '../../services/cache/AnalysisCache';
import { OracleStats } from '../../services/pricing/ReferencePriceOracle';
import { AnalysisRun, AnalysisRunStats } from '../../database/models/AnalysisRun';
import sqlite from '../../database/sqlite';
import { LargeTradeThresholds } from '../../types/analysis.types';

export interface StatusSources {
  cache: AnalysisCache;
  oracleStats: () => OracleStats;
  thresholds: LargeTradeThresholds | null;
  dataSource: string;
}

export interface StatusReport {
  uptimeSeconds: number;
  memoryMb: number;
  dataSource: string | null;
  cache: CacheStats | null;
  oracle: OracleStats | null;
  thresholds: LargeTradeThresholds | null;
  database: { path: string; open: boolean };
  runs: AnalysisRunStats | null;
  timestamp: string;
}

class StatusController {
  private sources: StatusSources | null = null;
  private startedAt = Date.now();

  /**
   * Wire the running process's caches and thresholds
   */
  register(sources: StatusSources): void {
    this.sources = sources;
  }

  /**
   * GET /api/status
   * Process, cache and storage statistics
   */
  async getStatus(_req: Request, res: Response): Promise<void> {
    try {
      const report = await this.buildReport();
      res.status(200).json({ success: true, data: report });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to get status: ${errorMessage}`);
      res.status(500).json({
        success: false,
        error: errorMessage,
      });
    }
  }

  async buildReport(): Promise<StatusReport> {
    const sources = this.sources;

    return {
      uptimeSeconds: Math.round((Date.now() - this.startedAt) / 1000),
      memoryMb: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
      dataSource: sources ? sources.dataSource : null,
      cache: sources ? sources.cache.stats() : null,
      oracle: sources ? sources.oracleStats() : null,
      thresholds: sources ? sources.thresholds : null,
      database: sqlite.getStats(),
      runs: sqlite.isOpen() ? await AnalysisRun.getStats() : null,
      timestamp: new Date().toISOString(),
    };
  }
}

// Create a singleton instance
const statusController = new StatusController();

const router = Router();

/**
 * GET /api/status
 */
router.get('/', (req: Request, res: Response, next: NextFunction) => {
  statusController.getStatus(req, res).catch(next);
});

export default router;
export { statusController };
