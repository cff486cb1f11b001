import { Request, Response, NextFunction } from 'express';
import { CheckError, isFatalRunFailure, PipelineCancelled, ValidationError } from '../utils/errors';
import { logError } from '../utils/logger';

export default function errorHandler(err: Error, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }
  if (err instanceof ValidationError) {
    return res.status(400).json({ error: err.message });
  }
  // body-parser rejects malformed JSON with a SyntaxError
  if (err instanceof SyntaxError) {
    return res.status(400).json({ error: 'Request body must be valid JSON' });
  }
  if (isFatalRunFailure(err)) {
    return res.status(502).json({ error: err.message, kind: err.kind, stage: err.stage });
  }
  if (err instanceof PipelineCancelled) {
    return res.status(499).json({ error: err.message });
  }

  logError(`Unhandled error on ${req.method} ${req.path}`, err instanceof CheckError ? { kind: err.kind, error: err } : err);
  res.status(500).json({
    error: 'An unexpected error occurred. Please try again later.',
  });
}
