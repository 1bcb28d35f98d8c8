import { z } from 'zod';

import { ParseError, errorMessage } from '../../../errors.js';
import type { Result, ScoreEntry } from '../../../types/index.js';

// ============================================
// Entry normalization
// ============================================

const IdSchema = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .optional()
  .catch(undefined);

const ScoreSchema = z
  .union([z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number)])
  .optional()
  .catch(undefined);

/** Every field is tolerant on its own: a bad `reason` never discards a good `score`. */
const RawScoreEntrySchema = z.object({
  id: IdSchema,
  event_id: IdSchema,
  eventId: IdSchema,
  score: ScoreSchema,
  reason: z.string().optional().catch(undefined),
});

export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0;
  return Math.min(100, Math.max(0, score));
}

function toScoreEntry(item: unknown): ScoreEntry | null {
  if (Array.isArray(item)) return null;
  const parsed = RawScoreEntrySchema.safeParse(item);
  if (!parsed.success) return null;

  const { id, event_id, eventId, score, reason } = parsed.data;
  const entry: ScoreEntry = {};
  const resolvedId = id || event_id || eventId;
  if (resolvedId) entry.id = resolvedId;
  if (score !== undefined) entry.score = clampScore(score);
  if (reason !== undefined && reason.trim()) entry.reason = reason.trim();
  return entry;
}

// ============================================
// Text repair
// ============================================

const LEADING_FENCE = /^```[ \t]*(?:json)?[ \t]*\r?\n?/i;
const TRAILING_FENCE = /\r?\n?[ \t]*```[ \t]*$/;

export function stripCodeFence(text: string): string {
  return text.trim().replace(LEADING_FENCE, '').replace(TRAILING_FENCE, '').trim();
}

interface ArrayScan {
  /** Index of the `]` closing the array, or -1 when the text ends first. */
  close: number;
  /** Index just past the last complete top-level element, or -1 if none completed. */
  lastElementEnd: number;
}

/** Walk the array starting at `open`, ignoring brackets inside string literals. */
function scanArray(text: string, open: number): ArrayScan {
  let depth = 0;
  let inString = false;
  let escaped = false;
  let lastElementEnd = -1;

  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ']' || ch === '}') {
      depth--;
      if (depth === 0) return { close: i, lastElementEnd };
      if (depth === 1) lastElementEnd = i + 1;
    }
  }
  return { close: -1, lastElementEnd };
}

/** Drop every comma (outside strings) whose next non-space character is `}` or `]`. */
export function removeTrailingCommas(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      out += ch;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === ',') {
      const next = text.slice(i + 1).match(/^\s*([}\]])/);
      if (next) continue;
    }
    out += ch;
  }
  return out;
}

/**
 * Cut the reply down to its JSON array: everything from the first `[` to the
 * bracket that closes it. A reply cut off mid-array keeps its complete
 * elements and gets a synthetic `]`.
 */
export function extractArrayText(text: string): string | null {
  const open = text.indexOf('[');
  if (open === -1) return null;

  const scan = scanArray(text, open);
  if (scan.close !== -1) return text.slice(open, scan.close + 1);

  if (scan.lastElementEnd === -1) return '[]';
  const kept = text.slice(open, scan.lastElementEnd).replace(/[\s,]+$/, '');
  return `${kept}]`;
}

// ============================================
// Entry point
// ============================================

/**
 * Recover the judge's `[{id, score, reason}, ...]` array from free text.
 * Repairs, in order: code fences, surrounding prose, truncation, trailing commas.
 */
export function sanitizeScores(raw: string): Result<ScoreEntry[], ParseError> {
  const unfenced = stripCodeFence(raw);
  const arrayText = extractArrayText(unfenced);
  if (arrayText === null) {
    return { ok: false, error: new ParseError('No JSON array found in judge reply') };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(removeTrailingCommas(arrayText));
  } catch (err) {
    return { ok: false, error: new ParseError(`Invalid JSON after repair: ${errorMessage(err)}`, { cause: err }) };
  }

  if (!Array.isArray(parsed)) {
    return { ok: false, error: new ParseError('Judge reply is not a JSON array') };
  }

  const entries = parsed
    .map(toScoreEntry)
    .filter((e): e is ScoreEntry => e !== null);
  return { ok: true, value: entries };
}
