import type {
  EventRecord,
  ForecastMap,
  PipelineIssue,
  Result,
  ScoredEvent,
  UserRequest,
  ScoreEntry,
} from '../../../types/index.js';

/** What the `.map` stages of the recommendation workflow hand to each other. */
export interface CollectedState {
  request: UserRequest;
  topN: number;
  candidates: EventRecord[];
  forecasts: ForecastMap;
  totalFound: number;
  errors: PipelineIssue[];
}

export interface ScoredState extends CollectedState {
  /** On failure, `error` is the rationale every candidate receives. */
  scores: Result<ScoreEntry[], string>;
}

export interface RankedState {
  request: UserRequest;
  recommendations: ScoredEvent[];
  totalFound: number;
  errors: PipelineIssue[];
}
