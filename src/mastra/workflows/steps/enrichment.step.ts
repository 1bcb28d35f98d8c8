import { errorMessage } from '../../../errors.js';
import type { PipelineIssue, RecommendationSet, ScoredEvent, SearchSnippet, UserRequest } from '../../../types/index.js';
import type { WebSearchSource } from '../../../types/collaborators.js';
import { SNIPPETS_PER_EVENT, SPARSE_DESCRIPTION_CHARS } from '../utils/constants.js';
import type { RankedState } from '../utils/pipeline-state.js';

export interface EnrichmentResult {
  enrichment: Record<string, SearchSnippet[]>;
  issues: PipelineIssue[];
}

export function isSparse(event: ScoredEvent['event']): boolean {
  return event.description.trim().length < SPARSE_DESCRIPTION_CHARS;
}

export function buildSearchQuery(event: ScoredEvent['event'], request: UserRequest): string {
  return [event.name, event.venue.name, event.venue.city || request.city, event.date]
    .filter(Boolean)
    .join(' ');
}

/**
 * Look up ranked events with thin descriptions on the web, once per ranked set.
 * Lookups run sequentially; a failed lookup adds an issue and no snippets.
 */
export async function enrichSparseEvents(
  search: WebSearchSource,
  request: UserRequest,
  recommendations: readonly ScoredEvent[],
): Promise<EnrichmentResult> {
  const result: EnrichmentResult = { enrichment: {}, issues: [] };
  const sparse = recommendations.filter((r) => isSparse(r.event));
  if (sparse.length === 0) return result;

  console.log(`[pipeline:enrich] 🔎 Looking up ${sparse.length} sparse events`);
  for (const { event } of sparse) {
    try {
      const snippets = await search.search(buildSearchQuery(event, request), SNIPPETS_PER_EVENT);
      if (snippets.length > 0) result.enrichment[event.id] = snippets.slice(0, SNIPPETS_PER_EVENT);
    } catch (err) {
      const message = `Lookup for "${event.name}" failed: ${errorMessage(err)}`;
      console.warn(`[pipeline:enrich] ⚠️ ${message}`);
      result.issues.push({ stage: 'enrichment', message });
    }
  }
  return result;
}

/** Mapper: the last stage of the recommendation workflow. Without a search source nothing is looked up. */
export async function enrichStage(search: WebSearchSource | undefined, state: RankedState): Promise<RecommendationSet> {
  const { request, recommendations, totalFound, errors } = state;
  if (!search) return { request, recommendations, totalFound, errors, enrichment: {} };

  const enriched = await enrichSparseEvents(search, request, recommendations);
  return {
    request,
    recommendations,
    totalFound,
    errors: [...errors, ...enriched.issues],
    enrichment: enriched.enrichment,
  };
}
