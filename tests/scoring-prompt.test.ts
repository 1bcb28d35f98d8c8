import { describe, it, expect } from 'vitest';
import {
  MAX_SCORING_CANDIDATES,
  buildScoringPrompt,
  formatPrice,
  formatWeather,
  selectCandidates,
} from '../src/mastra/agents/prompts/scoring.prompt.js';
import { UserRequestSchema } from '../src/types/index.js';
import { makeEvent, makeForecast } from './helpers/fakes.js';

const request = UserRequestSchema.parse({
  city: 'New York',
  startDate: '2026-03-01',
  endDate: '2026-03-07',
  intent: 'jazz music indoor weekend',
  budgetMax: 100,
});

describe('selectCandidates', () => {
  it('keeps the first candidates in collection order up to the cap', () => {
    const events = Array.from({ length: 60 }, (_, i) => makeEvent(`e${i}`));
    const selected = selectCandidates(events);

    expect(selected).toHaveLength(MAX_SCORING_CANDIDATES);
    expect(selected[0].id).toBe('e0');
    expect(selected[49].id).toBe('e49');
  });

  it('returns short lists unchanged', () => {
    const events = [makeEvent('a'), makeEvent('b')];
    expect(selectCandidates(events)).toEqual(events);
  });
});

describe('formatting helpers', () => {
  it('formats prices', () => {
    expect(formatPrice(makeEvent('a', { price: { min: 0, max: 0 } }))).toBe('unknown');
    expect(formatPrice(makeEvent('a', { price: { min: 25, max: 25 } }))).toBe('$25');
    expect(formatPrice(makeEvent('a', { price: { min: 25, max: 60 } }))).toBe('$25-$60');
  });

  it('formats weather', () => {
    expect(formatWeather(undefined)).toBe('no forecast');
    expect(formatWeather(makeForecast('2026-03-07'))).toBe('Partly cloudy, 41-50F, rain 10%, outdoor ok: yes');
  });
});

describe('buildScoringPrompt', () => {
  it('states the request and lists every candidate', () => {
    const prompt = buildScoringPrompt(
      request,
      [makeEvent('jazz-1', { name: 'Blue Note Late Set' }), makeEvent('game-1', { name: 'Night Game', date: '2026-03-04' })],
      { '2026-03-07': makeForecast('2026-03-07') },
    );

    expect(prompt.startsWith('User is looking for: "jazz music indoor weekend"\n')).toBe(true);
    expect(prompt).toContain('Budget max: $100\n');
    expect(prompt).toContain('Date range: 2026-03-01 to 2026-03-07\n');
    expect(prompt).toContain('Venue / vibe preference: No preference\n');
    expect(prompt).toContain('Score each of the following 2 events');
    expect(prompt).toContain('ID: jazz-1\nName: Blue Note Late Set\n');
    expect(prompt).toContain('Date: 2026-03-07 (Weekend) @ 20:00:00\n');
    expect(prompt).toContain('Venue: Blue Note (Indoor)\n');
    expect(prompt).toContain('Weather: Partly cloudy, 41-50F, rain 10%, outdoor ok: yes');
    expect(prompt).toContain('ID: game-1\nName: Night Game\n');
    expect(prompt).toContain('Weather: no forecast');
  });

  it('reports a missing budget and joins preferences', () => {
    const prompt = buildScoringPrompt(
      UserRequestSchema.parse({
        city: 'New York',
        startDate: '2026-03-01',
        endDate: '2026-03-07',
        intent: 'something fun',
        venuePreference: 'indoor',
        vibeNotes: 'low key',
      }),
      [makeEvent('a')],
      {},
    );

    expect(prompt).toContain('Budget max: No limit\n');
    expect(prompt).toContain('Venue / vibe preference: indoor; low key\n');
  });

  it('truncates long descriptions and marks empty ones', () => {
    const prompt = buildScoringPrompt(
      request,
      [makeEvent('long', { description: 'x'.repeat(350) }), makeEvent('empty', { description: '   ' })],
      {},
    );

    expect(prompt).toContain(`Description: ${'x'.repeat(300)}…\n`);
    expect(prompt).toContain('Description: No description available\n');
  });
});
