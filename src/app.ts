import express, { Express } from 'express';
import cors from 'cors';
import createCheckRouter from './routes/check';
import createHistoryRouter from './routes/history';
import createSimilarRouter from './routes/similar';
import createStatsRouter from './routes/stats';
import createTrendingRouter from './routes/trending';
import errorHandler from './middleware/errorHandler';
import { Services } from './services';

export interface AppOptions {
  corsOrigins?: string[] | '*';
}

export function createApp(services: Services, opts: AppOptions = {}): Express {
  const app: Express = express();

  // Middleware
  app.use(cors({ origin: opts.corsOrigins ?? '*' }));
  app.use(express.json({ limit: '100kb' }));

  // Routes
  app.get('/health', (req, res) => res.status(200).json({ status: 'OK', message: 'Server is running' }));
  app.use('/check', createCheckRouter(services.pipeline));
  app.use('/trending', createTrendingRouter(services.trending));
  app.use('/history', createHistoryRouter(services.cache));
  app.use('/similar', createSimilarRouter(services.cache));
  app.use('/stats', createStatsRouter(services.cache, services.trending, services.pipeline.sourceIds));

  // Error handling
  app.use(errorHandler);

  return app;
}
