import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';

import { ValidationError } from '../../errors.js';
import { TopNSchema, UserRequestSchema } from '../../types/index.js';
import type { RecommendationService } from '../../mastra/workflows/recommendation-pipeline.js';

const RecommendBodySchema = z.object({
  request: UserRequestSchema,
  topN: TopNSchema,
});

/**
 * POST /api/recommend
 *
 * Body: { request: UserRequest, topN?: number }
 * Runs the full pipeline and returns the RecommendationSet. Upstream failures
 * are reported inside the set's `errors`, not as HTTP errors.
 */
export function createRecommendRouter(service: RecommendationService): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const parsed = RecommendBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid recommendation request',
        details: parsed.error.flatten().fieldErrors,
      });
      return;
    }

    const { request, topN } = parsed.data;
    try {
      console.log(`[recommend] ${request.city} ${request.startDate} → ${request.endDate}: "${request.intent}" (top ${topN})`);
      const set = await service.produceRecommendations(request, topN);
      res.json(set);
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({ error: error.message, details: error.issues });
        return;
      }
      next(error);
    }
  });

  return router;
}
