/**
 * Error taxonomy for the recommendation pipeline.
 *
 * Only ValidationError ever reaches a caller of the pipeline as a thrown error.
 * Collection and scoring failures are absorbed and surface in the output data
 * (`RecommendationSet.errors` or a rationale string).
 */

export type CollectionSource = 'catalog' | 'forecast' | 'search';

/** A catalog, forecast or search collaborator was unreachable or rejected the input. */
export class CollectionError extends Error {
  readonly source: CollectionSource;

  constructor(source: CollectionSource, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CollectionError';
    this.source = source;
  }
}

/** The judge could not produce usable scores. */
export class ScoringError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScoringError';
  }
}

/** The judge answered, but its reply stayed unparseable after every repair step. */
export class ParseError extends ScoringError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
  }
}

/** Malformed input, rejected before any collaborator is called. */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
