import { createStep } from '@mastra/core/workflows';

import { PipelineInputSchema, type PipelineIssue } from '../../../types/index.js';
import type { CatalogSource, ForecastSource } from '../../../types/collaborators.js';
import { COLLECT_EVENTS_TOOL_ID, EventsOutcomeSchema, createCollectEventsTool } from '../../tools/collect-events.js';
import { COLLECT_FORECAST_TOOL_ID, ForecastOutcomeSchema, createCollectForecastTool } from '../../tools/collect-forecast.js';
import { selectCandidates } from '../../agents/prompts/scoring.prompt.js';
import type { CollectedState } from '../utils/pipeline-state.js';

export const createCollectEventsStep = (catalog: CatalogSource) => createStep(createCollectEventsTool(catalog));
export const createCollectForecastStep = (source: ForecastSource) => createStep(createCollectForecastTool(source));

/**
 * Mapper: joins the parallel collection results, keyed by step id.
 * Used as the `.map()` callback after `.parallel([collectEventsStep, collectForecastStep])`.
 * A catalog failure leaves no candidates; a forecast failure only drops weather.
 */
export function mergeCollected(outcomes: Record<string, unknown>, initData: unknown): CollectedState {
  const { request, topN } = PipelineInputSchema.parse(initData);
  const events = EventsOutcomeSchema.parse(outcomes[COLLECT_EVENTS_TOOL_ID]);
  const weather = ForecastOutcomeSchema.parse(outcomes[COLLECT_FORECAST_TOOL_ID]);

  const errors: PipelineIssue[] = [];
  if (events.error !== undefined) errors.push({ stage: 'catalog', message: events.error });
  if (weather.error !== undefined) errors.push({ stage: 'forecast', message: weather.error });

  if (events.error !== undefined) {
    return { request, topN, candidates: [], forecasts: weather.forecasts, totalFound: 0, errors };
  }

  return {
    request,
    topN,
    candidates: selectCandidates(events.events),
    forecasts: weather.forecasts,
    totalFound: events.events.length,
    errors,
  };
}
