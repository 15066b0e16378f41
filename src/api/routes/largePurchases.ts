import { Router, Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { logger } from '../../services/utils/Logger';
import { LargePurchase } from '../../database/models/LargePurchase';

interface LargePurchasesQuery {
  token?: string;
  runId?: string;
  limit: number;
}

const querySchema = Joi.object<LargePurchasesQuery>({
  token: Joi.string().pattern(/^0x[0-9a-fA-F]{40}$/),
  runId: Joi.string().guid(),
  limit: Joi.number().integer().min(1).max(1000).default(100),
});

/**
 * GET /api/large-purchases
 * Stored large purchases, by token or run
 */
async function listLargePurchases(req: Request, res: Response): Promise<void> {
  const { error, value } = querySchema.validate(req.query);
  if (error) {
    res.status(400).json({ success: false, error: error.message });
    return;
  }

  try {
    const purchases = await LargePurchase.find(value);
    const stats = value.token ? await LargePurchase.getStats(value.token) : undefined;

    res.status(200).json({
      success: true,
      data: {
        count: purchases.length,
        purchases,
        stats,
        timestamp: new Date().toISOString(),
      },
    });
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : String(err);
    logger.error(`Failed to get large purchases: ${errorMessage}`);
    res.status(500).json({ success: false, error: errorMessage });
  }
}

const router = Router();

router.get('/', (req: Request, res: Response, next: NextFunction) => {
  listLargePurchases(req, res).catch(next);
});

export default router;
