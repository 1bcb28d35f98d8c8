import type { EventRecord, ForecastMap, ForecastRecord, UserRequest } from '../../../types/index.js';

/** Candidates beyond this are dropped (first N in collection order), never sampled. */
export const MAX_SCORING_CANDIDATES = 50;

export const MAX_PROMPT_DESCRIPTION_CHARS = 300;

export const SCORING_AGENT_SYSTEM_PROMPT = `You are an expert live-event recommendation judge.
Your primary job is to semantically match what the user is looking for against each event's name and description.

Score each event from 0 to 100 using this priority order:
1. SEMANTIC MATCH (most important): does the event name and description align with what the user asked for?
   Read the description carefully: an event called "Jazz Night" whose description is about a rock band should score low for a jazz request.
2. PRACTICAL FIT: does the price fit the budget? Is the venue type (indoor/outdoor) appropriate for the weather and the user's venue preference?
3. TIMING: weekend events score slightly higher for leisure requests.

Give a one-sentence "reason" explaining specifically how the event matches or mismatches the request.
Respond with ONLY a valid JSON array of objects with the keys "id", "score" and "reason". No prose, no markdown, no code fences.`;

export function selectCandidates(events: readonly EventRecord[]): EventRecord[] {
  return events.slice(0, MAX_SCORING_CANDIDATES);
}

export function formatPrice(event: EventRecord): string {
  const { min, max } = event.price;
  if (!min && !max) return 'unknown';
  return min === max ? `$${min.toFixed(0)}` : `$${min.toFixed(0)}-$${max.toFixed(0)}`;
}

export function formatWeather(weather: ForecastRecord | undefined): string {
  if (!weather) return 'no forecast';
  return `${weather.description}, ${weather.tempMinF.toFixed(0)}-${weather.tempMaxF.toFixed(0)}F, `
    + `rain ${weather.precipitationChance.toFixed(0)}%, outdoor ok: ${weather.isSuitableOutdoor ? 'yes' : 'no'}`;
}

export function formatDayType(event: EventRecord): string {
  return event.isWeekend ? 'Weekend' : 'Weekday';
}

export function formatVenueType(event: EventRecord): string {
  return event.isOutdoor ? 'Outdoor' : 'Indoor';
}

function truncate(text: string, max: number): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  return clean.length > max ? `${clean.slice(0, max)}…` : clean;
}

function formatCandidate(event: EventRecord, weather: ForecastRecord | undefined): string {
  const description = event.description.trim()
    ? truncate(event.description, MAX_PROMPT_DESCRIPTION_CHARS)
    : 'No description available';
  return [
    `ID: ${event.id}`,
    `Name: ${event.name}`,
    `Description: ${description}`,
    `Date: ${event.date} (${formatDayType(event)}) @ ${event.time}`,
    `Venue: ${event.venue.name || 'unknown'} (${formatVenueType(event)})`,
    `Category: ${event.category || 'unknown'} / ${event.genre || 'unknown'}`,
    `Price: ${formatPrice(event)}`,
    `Weather: ${formatWeather(weather)}`,
  ].join('\n');
}

/**
 * Build the user-turn prompt for the scoring judge.
 * `candidates` should already be capped by `selectCandidates`.
 */
export function buildScoringPrompt(
  request: UserRequest,
  candidates: readonly EventRecord[],
  forecasts: ForecastMap,
): string {
  const budget = request.budgetMax !== undefined ? `$${request.budgetMax}` : 'No limit';
  const preferences = [request.venuePreference, request.vibeNotes].filter(Boolean).join('; ') || 'No preference';
  const blocks = candidates.map((e) => formatCandidate(e, forecasts[e.date]));

  return `User is looking for: "${request.intent}"
Budget max: ${budget}
Date range: ${request.startDate} to ${request.endDate}
Venue / vibe preference: ${preferences}

Score each of the following ${candidates.length} events on how well it matches what the user described.
Pay close attention to the Description field of each event.

${blocks.join('\n\n---\n\n')}

Respond with ONLY this JSON array, one entry per event:
[{"id": "...", "score": <0-100>, "reason": "one sentence explaining the match"}, ...]`;
}
