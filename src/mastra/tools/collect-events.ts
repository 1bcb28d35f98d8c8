import { createTool } from '@mastra/core/tools';
import { z } from 'zod';

import { errorMessage } from '../../errors.js';
import { EventRecordSchema, PipelineInputSchema, type UserRequest } from '../../types/index.js';
import type { CatalogQuery, CatalogSource } from '../../types/collaborators.js';
import type { TicketmasterEvent } from './utils/ticketmaster-types.js';
import { normalizeEvent } from './utils/ticketmaster-mapper.js';
import { MAX_CATALOG_ITEMS, MAX_CATALOG_PAGES } from '../workflows/utils/constants.js';

export const COLLECT_EVENTS_TOOL_ID = 'collect-events';

export interface PaginationCaps {
  maxPages: number;
  maxItems: number;
}

export const EventsOutcomeSchema = z.object({
  events: z.array(EventRecordSchema),
  error: z.string().optional(),
});

export type EventsOutcome = z.infer<typeof EventsOutcomeSchema>;

export function toCatalogQuery(request: UserRequest): CatalogQuery {
  return {
    city: request.city,
    regionCode: request.regionCode,
    countryCode: request.countryCode,
    range: { start: request.startDate, end: request.endDate },
    budgetMax: request.budgetMax,
  };
}

/**
 * Page through the catalog until it runs dry, reports no further pages, or a
 * safety cap is hit. All raw items are accumulated before normalization.
 */
export async function fetchAllEvents(
  catalog: CatalogSource,
  query: CatalogQuery,
  caps: PaginationCaps = { maxPages: MAX_CATALOG_PAGES, maxItems: MAX_CATALOG_ITEMS },
): Promise<TicketmasterEvent[]> {
  const all: TicketmasterEvent[] = [];

  for (let page = 0; page < caps.maxPages; page++) {
    const { events, totalPages } = await catalog.fetchPage(query, page);
    if (events.length === 0) break;
    all.push(...events);

    if (page + 1 >= totalPages) break;
    if (all.length >= caps.maxItems || (page + 1) * catalog.pageSize >= caps.maxItems) break;
  }

  return all.slice(0, caps.maxItems);
}

/** Normalized events for the request; a catalog failure comes back in `error`. */
export async function collectEvents(catalog: CatalogSource, request: UserRequest): Promise<EventsOutcome> {
  const startTime = Date.now();
  console.log(`[pipeline:collect] 📡 Fetching events for ${request.city} (${request.startDate} → ${request.endDate})`);
  try {
    const events = (await fetchAllEvents(catalog, toCatalogQuery(request))).map(normalizeEvent);
    console.log(`[pipeline:collect] ✅ ${events.length} events in ${Date.now() - startTime}ms`);
    return { events };
  } catch (err) {
    const error = errorMessage(err);
    console.error(`[pipeline:collect] ❌ Catalog failed: ${error}`);
    return { events: [], error };
  }
}

export function createCollectEventsTool(catalog: CatalogSource) {
  return createTool({
    id: COLLECT_EVENTS_TOOL_ID,
    description:
      'Pages through the event catalog for the requested city and date range and returns normalized events. A catalog failure is reported in `error` alongside an empty event list.',
    inputSchema: PipelineInputSchema,
    outputSchema: EventsOutcomeSchema,
    execute: async (inputData) => collectEvents(catalog, inputData.request),
  });
}
