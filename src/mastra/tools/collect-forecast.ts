import { createTool } from '@mastra/core/tools';
import { z } from 'zod';

import { errorMessage } from '../../errors.js';
import { ForecastRecordSchema, PipelineInputSchema, type ForecastMap, type ForecastRecord, type UserRequest } from '../../types/index.js';
import type { DateRange, ForecastSource } from '../../types/collaborators.js';
import { normalizeForecastDay } from './utils/forecast-mapper.js';
import { trimToHorizon } from './utils/date-range.js';
import { FORECAST_HORIZON_DAYS } from './fetch-forecast.js';

export const COLLECT_FORECAST_TOOL_ID = 'collect-forecast';

export const ForecastOutcomeSchema = z.object({
  forecasts: z.record(ForecastRecordSchema),
  error: z.string().optional(),
});

export type ForecastOutcome = z.infer<typeof ForecastOutcomeSchema>;

/**
 * Forecasts for the request's dates, trimmed to the provider's horizon.
 * A range entirely outside the horizon yields an empty map without a call.
 */
export async function collectForecasts(
  source: ForecastSource,
  city: string,
  range: DateRange,
  now: Date = new Date(),
): Promise<ForecastMap> {
  const trimmed = trimToHorizon(range, FORECAST_HORIZON_DAYS, now);
  if (!trimmed) {
    console.log(`[pipeline:collect] ${range.start} → ${range.end} is beyond the forecast horizon, skipping weather`);
    return {};
  }

  const days = await source.fetchDaily(city, trimmed);
  const forecasts: Record<string, ForecastRecord> = {};
  for (const day of days) {
    if (day.date < trimmed.start || day.date > trimmed.end) continue;
    forecasts[day.date] = normalizeForecastDay(day);
  }
  return forecasts;
}

/** A forecast failure comes back in `error`; the pipeline carries on without weather. */
export async function collectForecast(source: ForecastSource, request: UserRequest, now: Date): Promise<ForecastOutcome> {
  try {
    const forecasts = await collectForecasts(source, request.city, { start: request.startDate, end: request.endDate }, now);
    console.log(`[pipeline:collect] ✅ Weather for ${Object.keys(forecasts).length} days`);
    return { forecasts };
  } catch (err) {
    const error = errorMessage(err);
    console.warn(`[pipeline:collect] ⚠️ Forecast failed, continuing without weather: ${error}`);
    return { forecasts: {}, error };
  }
}

export function createCollectForecastTool(source: ForecastSource) {
  return createTool({
    id: COLLECT_FORECAST_TOOL_ID,
    description:
      'Fetches daily forecasts for the requested city over the part of the date range inside the forecast horizon. A provider failure is reported in `error` alongside an empty map.',
    inputSchema: PipelineInputSchema,
    outputSchema: ForecastOutcomeSchema,
    execute: async (inputData) => collectForecast(source, inputData.request, new Date(inputData.now)),
  });
}
