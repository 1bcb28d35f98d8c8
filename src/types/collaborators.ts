import type { ConversationMessage, Result, SearchSnippet } from './index.js';
import type { TicketmasterEvent } from '../mastra/tools/utils/ticketmaster-types.js';
import type { RawForecastDay } from '../mastra/tools/utils/open-meteo-types.js';

export interface DateRange {
  start: string;
  end: string;
}

export interface CatalogQuery {
  city: string;
  regionCode?: string;
  countryCode: string;
  range: DateRange;
  budgetMax?: number;
}

export interface CatalogPage {
  events: TicketmasterEvent[];
  /** Pages the collaborator reports for this query; 0 when it returned nothing. */
  totalPages: number;
}

/** One page per call; the collector drives pagination. Throws CollectionError on failure. */
export interface CatalogSource {
  readonly pageSize: number;
  fetchPage(query: CatalogQuery, page: number): Promise<CatalogPage>;
}

/** Daily forecasts for an already horizon-trimmed range. Throws CollectionError on failure. */
export interface ForecastSource {
  fetchDaily(city: string, range: DateRange): Promise<RawForecastDay[]>;
}

export interface JudgeMessage {
  role: ConversationMessage['role'];
  content: string;
}

export interface JudgeCallOptions {
  temperature?: number;
  maxOutputTokens?: number;
}

/** The language-model judge. Never throws; failures come back as `ok: false`. */
export interface Judge {
  complete(
    instructions: string,
    messages: readonly JudgeMessage[],
    options?: JudgeCallOptions,
  ): Promise<Result<string, string>>;
}

export interface WebSearchSource {
  search(query: string, limit: number): Promise<SearchSnippet[]>;
}
