/**
 * Builds the grounding block handed to the Q&A judge on every turn.
 *
 * The block is a pure function of the RecommendationSet: it is rebuilt for
 * each question rather than cached, and never reflects conversation history.
 */

import type { PipelineIssue, RecommendationSet, ScoredEvent, SearchSnippet } from '../../../types/index.js';
import {
  formatDayType,
  formatPrice,
  formatVenueType,
  formatWeather,
} from '../../agents/prompts/scoring.prompt.js';

export const GROUNDING_HEADER = '--- RECOMMENDATIONS ---';
export const GROUNDING_FOOTER = '--- END RECOMMENDATIONS ---';

function formatEntry(rank: number, scored: ScoredEvent, snippets: readonly SearchSnippet[]): string {
  const e = scored.event;
  const lines = [
    `#${rank} ${e.name} [Score: ${scored.score}/100]`,
    `  Date   : ${e.date} (${formatDayType(e)}) @ ${e.time}`,
    `  Venue  : ${e.venue.name || 'unknown'} (${formatVenueType(e)})`,
    `  Genre  : ${e.category || 'unknown'} / ${e.genre || 'unknown'}`,
    `  Price  : ${formatPrice(e)}`,
    `  Weather: ${formatWeather(scored.weather)}`,
    `  Tickets: ${e.ticketUrl || 'unknown'}`,
    `  Why recommended: ${scored.reason}`,
  ];
  if (snippets.length > 0) {
    lines.push('  Web notes:');
    for (const s of snippets) {
      lines.push(`    - ${s.title}: ${s.snippet} (${s.url})`);
    }
  }
  return lines.join('\n');
}

function formatIssue(issue: PipelineIssue): string {
  return `- ${issue.stage}: ${issue.message}`;
}

export function buildGroundingBlock(set: RecommendationSet): string {
  const { request, recommendations } = set;
  const sections: string[] = [
    `Top ${recommendations.length} recommended events for the user `
      + `(City: ${request.city}, Dates: ${request.startDate} to ${request.endDate})`,
    `Looking for: "${request.intent}"`,
  ];

  if (recommendations.length === 0) {
    sections.push('No events were recommended for this search.');
  } else {
    recommendations.forEach((scored, i) => {
      sections.push(formatEntry(i + 1, scored, set.enrichment[scored.event.id] ?? []));
    });
  }

  if (set.errors.length > 0) {
    sections.push(`Data caveats:\n${set.errors.map(formatIssue).join('\n')}`);
  }

  return `${GROUNDING_HEADER}\n${sections.join('\n\n')}\n${GROUNDING_FOOTER}`;
}
