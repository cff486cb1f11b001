import { Router, Request, Response } from 'express';
import { query, validationResult } from 'express-validator';
import { ResultCache } from '../services/resultCache';
import { toSummary } from '../utils/present';

export const DEFAULT_HISTORY_LIMIT = 50;
export const MAX_HISTORY_LIMIT = 200;

export default function createHistoryRouter(cache: ResultCache): Router {
  const router = Router();

  router.get(
    '/',
    [
      query('limit')
        .optional()
        .isInt({ min: 1, max: MAX_HISTORY_LIMIT })
        .withMessage(`limit must be an integer between 1 and ${MAX_HISTORY_LIMIT}`),
    ],
    (req: Request, res: Response) => {
      const errors = validationResult(req);
      if (!errors.isEmpty()) {
        return res.status(400).json({ error: errors.array()[0].msg });
      }
      const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : DEFAULT_HISTORY_LIMIT;
      const items = cache.recent(limit).map(entry => ({
        ...toSummary(entry.result),
        created_at: entry.result.createdAt,
      }));
      res.status(200).json({ total: cache.live().length, items });
    }
  );

  return router;
}
