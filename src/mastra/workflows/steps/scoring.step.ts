import { ParseError, ScoringError } from '../../../errors.js';
import type { EventRecord, ForecastMap, Result, ScoreEntry, UserRequest } from '../../../types/index.js';
import type { Judge } from '../../../types/collaborators.js';
import { SCORING_AGENT_SYSTEM_PROMPT, buildScoringPrompt } from '../../agents/prompts/scoring.prompt.js';
import { sanitizeScores } from '../utils/sanitize-scores.js';
import type { CollectedState, ScoredState } from '../utils/pipeline-state.js';
import {
  JUDGE_UNAVAILABLE_PREFIX,
  JUDGE_UNREADABLE_PREFIX,
  SCORING_MAX_OUTPUT_TOKENS,
  SCORING_TEMPERATURE,
} from '../utils/constants.js';

/** Rationale given to every candidate when scoring fails. */
export function fallbackReason(error: ScoringError): string {
  const prefix = error instanceof ParseError ? JUDGE_UNREADABLE_PREFIX : JUDGE_UNAVAILABLE_PREFIX;
  return `${prefix}: ${error.message}`;
}

/**
 * One judge round-trip for the whole candidate list. Judge failures and
 * unreadable replies both come back as `ok: false`.
 */
export async function scoreCandidates(
  judge: Judge,
  request: UserRequest,
  candidates: readonly EventRecord[],
  forecasts: ForecastMap,
): Promise<Result<ScoreEntry[], ScoringError>> {
  console.log(`[pipeline:scoring] 🤖 Scoring ${candidates.length} events`);
  const prompt = buildScoringPrompt(request, candidates, forecasts);

  const reply = await judge.complete(
    SCORING_AGENT_SYSTEM_PROMPT,
    [{ role: 'user', content: prompt }],
    { temperature: SCORING_TEMPERATURE, maxOutputTokens: SCORING_MAX_OUTPUT_TOKENS },
  );
  if (!reply.ok) {
    console.warn(`[pipeline:scoring] ⚠️ Judge unavailable: ${reply.error}`);
    return { ok: false, error: new ScoringError(reply.error) };
  }

  const sanitized = sanitizeScores(reply.value);
  if (!sanitized.ok) {
    console.warn(`[pipeline:scoring] ⚠️ ${sanitized.error.message}`);
    return sanitized;
  }

  console.log(`[pipeline:scoring] ✅ Judge returned ${sanitized.value.length} scores`);
  return sanitized;
}

/** Candidates the judge returned an entry for, matched by id. */
export function countMatched(candidates: readonly EventRecord[], entries: readonly ScoreEntry[]): number {
  const ids = new Set(entries.map((e) => e.id));
  return candidates.filter((c) => ids.has(c.id)).length;
}

/**
 * Mapper: the scoring stage of the recommendation workflow. No candidates
 * means no judge call. A failed or partial judge reply is recorded as a
 * `scoring` issue.
 */
export async function scoreStage(judge: Judge, state: CollectedState): Promise<ScoredState> {
  const { request, candidates, forecasts } = state;
  if (candidates.length === 0) {
    console.log(`[pipeline:scoring] ⏭️ No events to rank, skipping judge`);
    return { ...state, scores: { ok: true, value: [] } };
  }

  const scores = await scoreCandidates(judge, request, candidates, forecasts);
  if (!scores.ok) {
    const reason = fallbackReason(scores.error);
    return { ...state, scores: { ok: false, error: reason }, errors: [...state.errors, { stage: 'scoring', message: reason }] };
  }

  const matched = countMatched(candidates, scores.value);
  if (matched < candidates.length) {
    const message = `Judge scored ${matched} of ${candidates.length} candidates`;
    console.warn(`[pipeline:scoring] ⚠️ ${message}`);
    return { ...state, scores, errors: [...state.errors, { stage: 'scoring', message }] };
  }

  return { ...state, scores };
}
