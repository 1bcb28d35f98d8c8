/** Score given to every candidate when the judge is unavailable or its reply is unreadable. */
export const FALLBACK_SCORE = 50;

/** Score for a candidate the judge did not mention. */
export const UNSCORED_SCORE = 0;

export const UNSCORED_REASON = 'Not scored by judge';
export const MISSING_REASON = 'No reason given';

export const JUDGE_UNAVAILABLE_PREFIX = 'Judge unavailable';
export const JUDGE_UNREADABLE_PREFIX = 'Judge reply unreadable';

// ── Catalog pagination safety caps ──

export const MAX_CATALOG_PAGES = 5;
export const MAX_CATALOG_ITEMS = 1000;

// ── Judge call settings ──

export const SCORING_TEMPERATURE = 0.2;
export const SCORING_MAX_OUTPUT_TOKENS = 2000;
export const QA_TEMPERATURE = 0.7;
export const QA_MAX_OUTPUT_TOKENS = 1000;

// ── Enrichment ──

/** Descriptions shorter than this are looked up on the web before Q&A. */
export const SPARSE_DESCRIPTION_CHARS = 40;
export const SNIPPETS_PER_EVENT = 3;
