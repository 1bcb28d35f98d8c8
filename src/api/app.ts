import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import cors from 'cors';

import type { RecommendationService } from '../mastra/workflows/recommendation-pipeline.js';
import { createRecommendRouter } from './routes/recommend.js';
import { createQaRouter } from './routes/qa.js';

export function createApp(service: RecommendationService): express.Express {
  const app = express();

  // ---------------------
  // Middleware
  // ---------------------
  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  // ---------------------
  // Health check
  // ---------------------
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  // ---------------------
  // Routes
  // ---------------------
  app.use('/api/recommend', createRecommendRouter(service));
  app.use('/api/qa', createQaRouter(service));

  // ---------------------
  // Global error handler
  // ---------------------
  // Must have 4 params for Express to treat it as an error-handling middleware.
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
