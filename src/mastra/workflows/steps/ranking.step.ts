import type { EventRecord, ForecastMap, Result, ScoreEntry, ScoredEvent } from '../../../types/index.js';
import type { RankedState, ScoredState } from '../utils/pipeline-state.js';
import {
  FALLBACK_SCORE,
  MISSING_REASON,
  UNSCORED_REASON,
  UNSCORED_SCORE,
} from '../utils/constants.js';
import { clampScore } from '../utils/sanitize-scores.js';

export interface RankInput {
  candidates: readonly EventRecord[];
  forecasts: ForecastMap;
  /** On failure, `error` is the rationale every candidate receives. */
  scores: Result<ScoreEntry[], string>;
  topN: number;
}

/** First entry per id wins; entries without an id cannot be matched and are dropped. */
function indexScores(entries: readonly ScoreEntry[]): Map<string, ScoreEntry> {
  const byId = new Map<string, ScoreEntry>();
  for (const entry of entries) {
    if (entry.id && !byId.has(entry.id)) byId.set(entry.id, entry);
  }
  return byId;
}

function scoreFor(event: EventRecord, scores: RankInput['scores'], byId: Map<string, ScoreEntry>): { score: number; reason: string } {
  if (!scores.ok) return { score: FALLBACK_SCORE, reason: scores.error };

  const entry = byId.get(event.id);
  if (!entry) return { score: UNSCORED_SCORE, reason: UNSCORED_REASON };
  return {
    score: clampScore(entry.score ?? UNSCORED_SCORE),
    reason: entry.reason ?? MISSING_REASON,
  };
}

/**
 * Merge judge scores onto every candidate, sort by score descending and keep
 * the top N. Ties keep the candidates' collection order.
 */
export function rankEvents({ candidates, forecasts, scores, topN }: RankInput): ScoredEvent[] {
  const byId = scores.ok ? indexScores(scores.value) : new Map<string, ScoreEntry>();

  const scored = candidates.map((event, index) => {
    const weather = forecasts[event.date];
    const { score, reason } = scoreFor(event, scores, byId);
    const item: ScoredEvent = weather ? { event, weather, score, reason } : { event, score, reason };
    return { item, index };
  });

  scored.sort((a, b) => b.item.score - a.item.score || a.index - b.index);

  const limit = Math.max(0, Math.min(topN, candidates.length));
  const top = scored.slice(0, limit).map((s) => s.item);

  console.log(`[pipeline:ranking] 🏆 Ranked ${candidates.length} events → top ${top.length}`);
  top.slice(0, 3).forEach((r, i) => {
    console.log(`[pipeline:ranking]   ${i + 1}. ${r.event.name} — score ${r.score}`);
  });

  return top;
}

/** Mapper: the ranking stage of the recommendation workflow. */
export function rankStage({ request, candidates, forecasts, scores, topN, totalFound, errors }: ScoredState): RankedState {
  return { request, recommendations: rankEvents({ candidates, forecasts, scores, topN }), totalFound, errors };
}
