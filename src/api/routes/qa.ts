import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';

import { ValidationError } from '../../errors.js';
import { ConversationMessageSchema, RecommendationSetSchema } from '../../types/index.js';
import type { RecommendationService } from '../../mastra/workflows/recommendation-pipeline.js';

const QaBodySchema = z.object({
  recommendations: RecommendationSetSchema,
  conversationHistory: z.array(ConversationMessageSchema).default([]),
  question: z.string(),
});

/**
 * POST /api/qa
 *
 * Body: { recommendations, conversationHistory, question }
 * The client owns the conversation; it sends the full history each turn and
 * keeps `updatedHistory` for the next one.
 */
export function createQaRouter(service: RecommendationService): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const parsed = QaBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid question payload',
        details: parsed.error.flatten().fieldErrors,
      });
      return;
    }

    const { recommendations, conversationHistory, question } = parsed.data;
    try {
      const turn = await service.answerQuestion(recommendations, conversationHistory, question);
      res.json({ answer: turn.answer, updatedHistory: turn.conversation });
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
