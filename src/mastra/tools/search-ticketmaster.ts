import { CollectionError, errorMessage } from '../../errors.js';
import type { CatalogPage, CatalogQuery, CatalogSource } from '../../types/collaborators.js';
import { fetchJson, type RetryOptions } from './utils/http.js';
import type { TicketmasterSearchResponse } from './utils/ticketmaster-types.js';

const TICKETMASTER_BASE = 'https://app.ticketmaster.com/discovery/v2';

export interface TicketmasterConfig {
  apiKey: string;
  baseUrl?: string;
  pageSize?: number;
  http?: RetryOptions;
}

// ============================================
// URL Builder
// ============================================

export function buildTicketmasterUrl(
  baseUrl: string,
  apiKey: string,
  query: CatalogQuery,
  page: number,
  pageSize: number,
): string {
  const params = new URLSearchParams({
    apikey: apiKey,
    city: query.city,
    countryCode: query.countryCode,
    startDateTime: `${query.range.start}T00:00:00Z`,
    endDateTime: `${query.range.end}T23:59:59Z`,
    size: String(pageSize),
    sort: 'date,asc',
    page: String(page),
  });
  if (query.regionCode) params.set('stateCode', query.regionCode);
  if (query.budgetMax !== undefined) params.set('priceMax', String(query.budgetMax));
  return `${baseUrl}/events.json?${params.toString()}`;
}

// ============================================
// Catalog Client
// ============================================

/**
 * Ticketmaster Discovery API client. Fetches a single page per call;
 * `fetchAllEvents` in the collect step drives pagination.
 */
export class TicketmasterCatalog implements CatalogSource {
  readonly pageSize: number;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly http: RetryOptions;

  constructor(config: TicketmasterConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? TICKETMASTER_BASE;
    this.pageSize = config.pageSize ?? 200;
    this.http = config.http ?? {};
  }

  async fetchPage(query: CatalogQuery, page: number): Promise<CatalogPage> {
    const url = buildTicketmasterUrl(this.baseUrl, this.apiKey, query, page, this.pageSize);

    let data: TicketmasterSearchResponse;
    try {
      data = await fetchJson<TicketmasterSearchResponse>(url, this.http);
    } catch (error) {
      throw new CollectionError('catalog', `Ticketmaster request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (data.fault) {
      throw new CollectionError('catalog', `Ticketmaster fault: ${data.fault.faultstring ?? 'unknown fault'}`);
    }

    const events = data._embedded?.events ?? [];
    console.log(`[ticketmaster] Page ${page}: ${events.length} events`);
    return {
      events,
      totalPages: data.page?.totalPages ?? (events.length > 0 ? 1 : 0),
    };
  }
}
