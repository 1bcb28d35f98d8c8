import { describe, it, expect } from 'vitest';
import { rankEvents, rankStage } from '../src/mastra/workflows/steps/ranking.step.js';
import type { ScoreEntry } from '../src/types/index.js';
import { TEST_REQUEST, makeEvent, makeForecast } from './helpers/fakes.js';

const candidates = [makeEvent('a'), makeEvent('b'), makeEvent('c'), makeEvent('d', { date: '2026-03-04' })];
const forecasts = { '2026-03-07': makeForecast('2026-03-07') };

function ok(value: ScoreEntry[]) {
  return { ok: true as const, value };
}

describe('rankEvents', () => {
  it('sorts by score descending and keeps collection order on ties', () => {
    const ranked = rankEvents({
      candidates,
      forecasts,
      scores: ok([
        { id: 'c', score: 90, reason: 'Best' },
        { id: 'b', score: 50, reason: 'Fine' },
        { id: 'a', score: 50, reason: 'Also fine' },
      ]),
      topN: 10,
    });

    expect(ranked.map((r) => r.event.id)).toEqual(['c', 'a', 'b', 'd']);
  });

  it('gives omitted candidates score 0 and a default reason', () => {
    const ranked = rankEvents({ candidates, forecasts, scores: ok([{ id: 'a', score: 80 }]), topN: 10 });

    expect(ranked[0]).toMatchObject({ score: 80, reason: 'No reason given' });
    expect(ranked[1]).toMatchObject({ score: 0, reason: 'Not scored by judge' });
  });

  it('lets the first entry win for a duplicated id', () => {
    const ranked = rankEvents({
      candidates: [makeEvent('a')],
      forecasts,
      scores: ok([{ id: 'a', score: 30, reason: 'first' }, { id: 'a', score: 95, reason: 'second' }]),
      topN: 1,
    });

    expect(ranked).toHaveLength(1);
    expect(ranked[0]).toMatchObject({ score: 30, reason: 'first' });
  });

  it('limits the result to min(topN, candidates)', () => {
    const scores = ok([{ id: 'c', score: 90 }, { id: 'a', score: 70 }]);
    expect(rankEvents({ candidates, forecasts, scores, topN: 2 }).map((r) => r.event.id)).toEqual(['c', 'a']);
    expect(rankEvents({ candidates, forecasts, scores, topN: 10 })).toHaveLength(4);
    expect(rankEvents({ candidates: [], forecasts, scores, topN: 6 })).toEqual([]);
  });

  it('attaches weather only when a forecast exists for the event date', () => {
    const ranked = rankEvents({ candidates, forecasts, scores: ok([]), topN: 10 });
    const byId = new Map(ranked.map((r) => [r.event.id, r]));

    expect(byId.get('a')?.weather).toEqual(makeForecast('2026-03-07'));
    expect(byId.get('d')?.weather).toBeUndefined();
  });

  it('falls back to a neutral score and the given rationale when scoring failed', () => {
    const ranked = rankEvents({
      candidates,
      forecasts,
      scores: { ok: false, error: 'Judge unavailable: request timed out' },
      topN: 10,
    });

    expect(ranked.map((r) => r.event.id)).toEqual(['a', 'b', 'c', 'd']);
    expect(ranked.every((r) => r.score === 50)).toBe(true);
    expect(ranked[0].reason).toBe('Judge unavailable: request timed out');
  });

  it('keeps every score within 0..100', () => {
    const ranked = rankEvents({
      candidates,
      forecasts,
      scores: ok([{ id: 'a', score: 140 }, { id: 'b', score: -20 }, { id: 'c', score: Number.NaN }]),
      topN: 10,
    });

    for (const r of ranked) {
      expect(r.score).toBeGreaterThanOrEqual(0);
      expect(r.score).toBeLessThanOrEqual(100);
    }
    expect(ranked[0]).toMatchObject({ score: 100 });
  });
});

describe('rankStage', () => {
  it('ranks the candidates and carries request, count and issues forward', () => {
    const errors = [{ stage: 'forecast' as const, message: 'Open-Meteo returned 503' }];

    const ranked = rankStage({
      request: TEST_REQUEST,
      topN: 2,
      candidates,
      forecasts,
      totalFound: 7,
      errors,
      scores: ok([{ id: 'd', score: 80, reason: 'Midweek pick' }]),
    });

    expect(ranked.recommendations.map((r) => [r.event.id, r.score])).toEqual([
      ['d', 80],
      ['a', 0],
    ]);
    expect(ranked.request).toBe(TEST_REQUEST);
    expect(ranked.totalFound).toBe(7);
    expect(ranked.errors).toEqual(errors);
  });
});
