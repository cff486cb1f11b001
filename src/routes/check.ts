import { Router, Request, Response, NextFunction } from 'express';
import { body, query, validationResult } from 'express-validator';
import pLimit from 'p-limit';
import { ClaimChecker, ProgressEvent } from '../interfaces/pipeline';
import { toFailureSummary } from '../services/pipeline';
import { PipelineCancelled } from '../utils/errors';
import { toCheckResponse, toEventPayload } from '../utils/present';

export const MAX_BATCH_SIZE = 10;
const BATCH_CONCURRENCY = 3;

/** Aborts the returned signal when the client disconnects before the response is finished. */
function disconnectSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort(new PipelineCancelled());
    }
  });
  return controller.signal;
}

/** `skip_cache` as sent in a JSON body or a query string. */
function skipCacheFlag(value: unknown): boolean {
  return value === true || value === 'true' || value === '1' || value === 1;
}

export default function createCheckRouter(checker: ClaimChecker): Router {
  const router = Router();

  router.post(
    '/',
    [
      body('claim').isString().withMessage('claim must be a string'),
      body('skip_cache').optional().isBoolean().withMessage('skip_cache must be a boolean'),
    ],
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
          return res.status(400).json({ error: errors.array()[0].msg });
        }
        const claim: string = req.body.claim;
        const outcome = await checker.run(claim, {
          signal: disconnectSignal(res),
          skipCache: skipCacheFlag(req.body.skip_cache),
        });
        res.status(200).json(toCheckResponse(outcome));
      } catch (error) {
        next(error);
      }
    }
  );

  router.get(
    '/stream',
    [
      query('claim').isString().withMessage('claim query parameter is required'),
      query('skip_cache').optional().isBoolean().withMessage('skip_cache must be a boolean'),
    ],
    async (req: Request, res: Response, next: NextFunction) => {
      const errors = validationResult(req);
      if (!errors.isEmpty()) {
        return res.status(400).json({ error: errors.array()[0].msg });
      }
      const claim = typeof req.query.claim === 'string' ? req.query.claim : '';
      const signal = disconnectSignal(res);

      // Headers go out with the first event so a rejected claim can still get a JSON 400
      const onEvent = (event: ProgressEvent) => {
        if (!res.headersSent) {
          res.status(200);
          res.set({ 'Content-Type': 'text/event-stream', 'Cache-Control': 'no-cache', Connection: 'keep-alive' });
          res.flushHeaders();
        }
        res.write(`event: state\ndata: ${JSON.stringify(toEventPayload(event))}\n\n`);
      };

      try {
        await checker.run(claim, { signal, onEvent, skipCache: skipCacheFlag(req.query.skip_cache) });
        res.end();
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        if (res.headersSent) {
          // The Failed event has already been written
          res.end();
          return;
        }
        next(error);
      }
    }
  );

  router.post(
    '/batch',
    [
      body('claims')
        .isArray({ min: 1, max: MAX_BATCH_SIZE })
        .withMessage(`claims must be an array of 1 to ${MAX_BATCH_SIZE} strings`),
      body('claims.*').isString().withMessage('every claim must be a string'),
      body('skip_cache').optional().isBoolean().withMessage('skip_cache must be a boolean'),
    ],
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
          return res.status(400).json({ error: errors.array()[0].msg });
        }
        const claims: string[] = req.body.claims;
        const signal = disconnectSignal(res);
        const skipCache = skipCacheFlag(req.body.skip_cache);
        const limit = pLimit(BATCH_CONCURRENCY);

        const results = await Promise.all(
          claims.map(claim =>
            limit(async () => {
              try {
                const outcome = await checker.run(claim, { signal, skipCache });
                return { claim, status: 'ok' as const, result: toCheckResponse(outcome) };
              } catch (err) {
                return { claim, status: 'error' as const, error: toFailureSummary(err) };
              }
            })
          )
        );
        if (signal.aborted) {
          return;
        }
        res.status(200).json({ count: results.length, results });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
