import { Router, Request, Response } from 'express';
import { query, validationResult } from 'express-validator';
import { TrendingStore } from '../services/trendingStore';
import { toSummary } from '../utils/present';

export const DEFAULT_TRENDING_LIMIT = 10;
export const MAX_TRENDING_LIMIT = 50;

export default function createTrendingRouter(trending: TrendingStore): Router {
  const router = Router();

  router.get(
    '/',
    [
      query('limit')
        .optional()
        .isInt({ min: 1, max: MAX_TRENDING_LIMIT })
        .withMessage(`limit must be an integer between 1 and ${MAX_TRENDING_LIMIT}`),
    ],
    (req: Request, res: Response) => {
      const errors = validationResult(req);
      if (!errors.isEmpty()) {
        return res.status(400).json({ error: errors.array()[0].msg });
      }
      const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : DEFAULT_TRENDING_LIMIT;
      const items = trending.list(limit).map(entry => ({
        ...toSummary(entry.result),
        seen_count: entry.seenCount,
        last_seen_at: new Date(entry.lastSeenAt).toISOString(),
        score: Math.round(entry.score * 1000) / 1000,
      }));
      res.status(200).json({ count: items.length, items });
    }
  );

  return router;
}
