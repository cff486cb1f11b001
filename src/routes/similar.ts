import { Router, Request, Response } from 'express';
import { query, validationResult } from 'express-validator';
import { DEFAULT_SIMILARITY_THRESHOLD, findSimilar } from '../services/claimSimilarity';
import { ResultCache } from '../services/resultCache';
import { toSummary } from '../utils/present';

/** Past checks whose claim text resembles the query; nothing is re-checked. */
export default function createSimilarRouter(cache: ResultCache): Router {
  const router = Router();

  router.get(
    '/',
    [
      query('claim')
        .isString()
        .withMessage('claim query parameter is required')
        .bail()
        .trim()
        .notEmpty()
        .withMessage('claim query parameter is required'),
      query('threshold')
        .optional()
        .isFloat({ min: 0, max: 1 })
        .withMessage('threshold must be a number between 0 and 1'),
    ],
    (req: Request, res: Response) => {
      const errors = validationResult(req);
      if (!errors.isEmpty()) {
        return res.status(400).json({ error: errors.array()[0].msg });
      }
      const claim = typeof req.query.claim === 'string' ? req.query.claim : '';
      const threshold =
        typeof req.query.threshold === 'string' ? parseFloat(req.query.threshold) : DEFAULT_SIMILARITY_THRESHOLD;
      const matches = findSimilar(claim, cache.live(), entry => entry.normalizedText, { threshold }).map(match => ({
        ...toSummary(match.item.result),
        created_at: match.item.result.createdAt,
        similarity_score: match.score,
      }));
      res.status(200).json({ query: claim, threshold, matches });
    }
  );

  return router;
}
