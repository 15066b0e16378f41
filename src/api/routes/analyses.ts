import { Router, Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { logger } from '../../services/utils/Logger';
import { AnalysisRun, AnalysisRunRow } from '../../database/models/AnalysisRun';

interface AnalysesQuery {
  token?: string;
  limit: number;
}

const querySchema = Joi.object<AnalysesQuery>({
  token: Joi.string().pattern(/^0x[0-9a-fA-F]{40}$/),
  limit: Joi.number().integer().min(1).max(500).default(20),
});

/**
 * Stored summary JSON is returned parsed
 */
function present(row: AnalysisRunRow): Omit<AnalysisRunRow, 'summary'> & { summary: unknown } {
  const summary: unknown = JSON.parse(row.summary);
  return { ...row, summary };
}

class AnalysesController {
  /**
   * GET /api/analyses
   * Recent runs, optionally filtered by token
   */
  async list(req: Request, res: Response): Promise<void> {
    const { error, value } = querySchema.validate(req.query);
    if (error) {
      res.status(400).json({ success: false, error: error.message });
      return;
    }

    try {
      const runs = await AnalysisRun.findRecent({ token: value.token, limit: value.limit });
      res.status(200).json({
        success: true,
        data: {
          count: runs.length,
          runs: runs.map(present),
          timestamp: new Date().toISOString(),
        },
      });
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Failed to list analyses: ${errorMessage}`);
      res.status(500).json({ success: false, error: errorMessage });
    }
  }

  /**
   * GET /api/analyses/:id
   * One run with its price points
   */
  async getById(req: Request, res: Response): Promise<void> {
    try {
      const run = await AnalysisRun.findById(req.params.id);

      if (!run) {
        res.status(404).json({
          success: false,
          error: 'Analysis not found',
        });
        return;
      }

      const pricePoints = await AnalysisRun.getPricePoints(run.id);
      res.status(200).json({
        success: true,
        data: { ...present(run), pricePoints },
      });
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Failed to get analysis ${req.params.id}: ${errorMessage}`);
      res.status(500).json({ success: false, error: errorMessage });
    }
  }
}

const controller = new AnalysesController();

const router = Router();

router.get('/', (req: Request, res: Response, next: NextFunction) => {
  controller.list(req, res).catch(next);
});

router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
  controller.getById(req, res).catch(next);
});

export default router;
