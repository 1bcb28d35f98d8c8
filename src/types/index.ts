import { z } from 'zod';

import { ISO_DATE_PATTERN, parseIsoDate } from '../mastra/tools/utils/date-range.js';

// ============================================
// Shared helpers
// ============================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export { ISO_DATE_PATTERN };

const IsoDateSchema = z
  .string()
  .regex(ISO_DATE_PATTERN, 'Expected a YYYY-MM-DD date')
  .refine((v) => parseIsoDate(v) !== null, 'Expected a real calendar date');

// ============================================
// User Request
// ============================================

export const UserRequestSchema = z
  .object({
    city: z.string().trim().min(1, 'City is required'),
    regionCode: z.string().trim().min(1).optional(),
    countryCode: z.string().trim().length(2).default('US'),
    startDate: IsoDateSchema,
    endDate: IsoDateSchema,
    intent: z.string().trim().min(1, 'Describe what kind of event you are looking for'),
    venuePreference: z.string().trim().min(1).optional(),
    vibeNotes: z.string().trim().min(1).optional(),
    budgetMax: z.number().positive().optional(),
  })
  .refine((r) => r.startDate <= r.endDate, {
    message: 'Start date must be on or before end date',
    path: ['endDate'],
  });

export type UserRequest = Readonly<z.infer<typeof UserRequestSchema>>;
export type UserRequestInput = z.input<typeof UserRequestSchema>;

export const DEFAULT_TOP_N = 6;
export const MAX_TOP_N = 50;

export const TopNSchema = z.number().int().min(1).max(MAX_TOP_N).default(DEFAULT_TOP_N);

// ============================================
// Pipeline Input
// ============================================

export const PipelineInputSchema = z.object({
  request: UserRequestSchema,
  topN: TopNSchema,
  now: z.string().datetime().describe('Clock reading used for the forecast horizon'),
});

export type PipelineInput = z.infer<typeof PipelineInputSchema>;

// ============================================
// Event Record
// ============================================

export const TIME_TBD = 'TBD';

export const EventRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  date: z.string(),
  time: z.string(),
  venue: z.object({
    name: z.string(),
    address: z.string(),
    city: z.string(),
    region: z.string(),
    lat: z.number(),
    lng: z.number(),
  }),
  price: z.object({
    min: z.number(),
    max: z.number(),
  }),
  category: z.string(),
  genre: z.string(),
  ticketUrl: z.string(),
  imageUrl: z.string(),
  isWeekend: z.boolean(),
  isOutdoor: z.boolean(),
});

export type EventRecord = Readonly<z.infer<typeof EventRecordSchema>>;

// ============================================
// Forecast Record
// ============================================

export const ForecastRecordSchema = z.object({
  date: z.string(),
  tempMinF: z.number(),
  tempMaxF: z.number(),
  description: z.string(),
  precipitationChance: z.number(),
  windSpeedMph: z.number(),
  isSuitableOutdoor: z.boolean(),
});

export type ForecastRecord = Readonly<z.infer<typeof ForecastRecordSchema>>;

/** Forecasts keyed by `YYYY-MM-DD`. */
export type ForecastMap = Readonly<Record<string, ForecastRecord>>;

// ============================================
// Scoring
// ============================================

export interface ScoreEntry {
  id?: string;
  score?: number;
  reason?: string;
}

export const ScoredEventSchema = z.object({
  event: EventRecordSchema,
  weather: ForecastRecordSchema.optional(),
  score: z.number().min(0).max(100),
  reason: z.string(),
});

export type ScoredEvent = Readonly<z.infer<typeof ScoredEventSchema>>;

export const PipelineIssueSchema = z.object({
  stage: z.enum(['catalog', 'forecast', 'scoring', 'enrichment']),
  message: z.string(),
});

export type PipelineIssue = z.infer<typeof PipelineIssueSchema>;

export const SearchSnippetSchema = z.object({
  title: z.string(),
  snippet: z.string(),
  url: z.string(),
});

export type SearchSnippet = z.infer<typeof SearchSnippetSchema>;

export const RecommendationSetSchema = z.object({
  request: UserRequestSchema,
  recommendations: z.array(ScoredEventSchema),
  totalFound: z.number().int().nonnegative(),
  errors: z.array(PipelineIssueSchema),
  enrichment: z.record(z.array(SearchSnippetSchema)),
});

export interface RecommendationSet {
  readonly request: UserRequest;
  readonly recommendations: readonly ScoredEvent[];
  readonly totalFound: number;
  readonly errors: readonly PipelineIssue[];
  readonly enrichment: Readonly<Record<string, readonly SearchSnippet[]>>;
}

// ============================================
// Conversation
// ============================================

export const ConversationMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export type ConversationMessage = Readonly<z.infer<typeof ConversationMessageSchema>>;

/** Append-only; every QA turn returns a new array. */
export type ConversationState = readonly ConversationMessage[];

export const QuestionSchema = z.string().trim().min(1, 'Question is required').max(2000);
