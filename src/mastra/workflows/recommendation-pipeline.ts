import { createWorkflow } from '@mastra/core/workflows';

import { ValidationError } from '../../errors.js';
import {
  DEFAULT_TOP_N,
  PipelineInputSchema,
  RecommendationSetSchema,
  TopNSchema,
  UserRequestSchema,
  type ConversationState,
  type RecommendationSet,
  type UserRequest,
  type UserRequestInput,
} from '../../types/index.js';
import type { CatalogSource, ForecastSource, Judge, WebSearchSource } from '../../types/collaborators.js';
import { createCollectEventsStep, createCollectForecastStep, mergeCollected } from './steps/collect.step.js';
import { scoreStage } from './steps/scoring.step.js';
import { rankStage } from './steps/ranking.step.js';
import { enrichStage } from './steps/enrichment.step.js';
import { answerQuestion, type QaTurn } from './steps/qa.step.js';

export interface RecommendationServiceDeps {
  catalog: CatalogSource;
  forecast: ForecastSource;
  judge: Judge;
  /** Optional web search for sparse descriptions. */
  search?: WebSearchSource;
  /** Clock used for the forecast horizon. */
  now?: () => Date;
}

export function parseUserRequest(input: unknown): UserRequest {
  const parsed = UserRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid request',
      parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)),
    );
  }
  return Object.freeze(parsed.data);
}

export function parseTopN(input: unknown): number {
  const parsed = TopNSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid topN', parsed.error.issues.map((i) => i.message));
  }
  return parsed.data;
}

/**
 * Collect (catalog and forecast in parallel) → score → rank → enrich.
 * Collaborators are closed over, so each service builds its own workflow.
 */
export function createRecommendationWorkflow(deps: RecommendationServiceDeps) {
  const collectEventsStep = createCollectEventsStep(deps.catalog);
  const collectForecastStep = createCollectForecastStep(deps.forecast);

  return createWorkflow({
    id: 'recommendation-pipeline',
    inputSchema: PipelineInputSchema,
    outputSchema: RecommendationSetSchema,
  })
    .parallel([collectEventsStep, collectForecastStep])

    .map(async ({ inputData, getInitData }) => mergeCollected(inputData, getInitData()))

    .map(async ({ inputData }) => scoreStage(deps.judge, inputData))

    .map(async ({ inputData }) => rankStage(inputData))

    .map(async ({ inputData }) => enrichStage(deps.search, inputData))

    .commit();
}

/**
 * The two operations exposed to any presentation layer. Collaborators are
 * injected; the service holds no per-search state.
 */
export class RecommendationService {
  private readonly deps: RecommendationServiceDeps;
  private readonly workflow: ReturnType<typeof createRecommendationWorkflow>;

  constructor(deps: RecommendationServiceDeps) {
    this.deps = deps;
    this.workflow = createRecommendationWorkflow(deps);
  }

  /**
   * Only a ValidationError is expected to be thrown; collection and scoring
   * failures are absorbed and listed in `errors`.
   */
  async produceRecommendations(input: UserRequestInput, topN: number = DEFAULT_TOP_N): Promise<RecommendationSet> {
    const request = parseUserRequest(input);
    const limit = parseTopN(topN);
    const now = this.deps.now?.() ?? new Date();

    const run = await this.workflow.createRun();
    const result = await run.start({ inputData: { request, topN: limit, now: now.toISOString() } });
    if (result.status !== 'success') {
      console.error(`[pipeline] ❌ Run ${run.runId} ended with status ${result.status}`);
      throw new Error(`Recommendation pipeline did not complete (${result.status})`);
    }

    const set = RecommendationSetSchema.parse(result.result);
    console.log(`[pipeline] ✅ ${set.recommendations.length} picks from ${set.totalFound} events, ${set.errors.length} issues`);
    return Object.freeze(set);
  }

  async answerQuestion(set: RecommendationSet, conversation: ConversationState, question: string): Promise<QaTurn> {
    return answerQuestion(this.deps.judge, set, conversation, question);
  }
}
