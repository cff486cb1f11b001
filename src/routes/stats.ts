import { Router, Request, Response } from 'express';
import { ResultCache } from '../services/resultCache';
import { TrendingStore } from '../services/trendingStore';

export default function createStatsRouter(cache: ResultCache, trending: TrendingStore, sources: readonly string[]): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    res.status(200).json({
      cache: cache.stats(),
      trending: { entries: trending.size },
      sources: [...sources],
    });
  });

  return router;
}
