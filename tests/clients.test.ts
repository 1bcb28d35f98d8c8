import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpError, fetchWithRetry, parseRetryAfter } from '../src/mastra/tools/utils/http.js';
import { TicketmasterCatalog, buildTicketmasterUrl } from '../src/mastra/tools/search-ticketmaster.js';
import { OpenMeteoForecast } from '../src/mastra/tools/fetch-forecast.js';
import { toSearchSnippets } from '../src/mastra/tools/search-web.js';
import { CollectionError } from '../src/errors.js';
import type { CatalogQuery } from '../src/types/collaborators.js';
import { rawEvent } from './helpers/fakes.js';

const query: CatalogQuery = {
  city: 'New York',
  regionCode: 'NY',
  countryCode: 'US',
  range: { start: '2026-03-01', end: '2026-03-07' },
  budgetMax: 100,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch() {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.useRealTimers();
});

describe('fetchWithRetry', () => {
  it('retries server errors and returns the first success', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(new Response('busy', { status: 503 }));
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true }));

    const res = await fetchWithRetry('https://api.example/test', {}, { baseDelayMs: 1 });

    expect(res.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('retries network errors', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true }));

    const res = await fetchWithRetry('https://api.example/test', {}, { baseDelayMs: 1 });

    expect(res.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('fails immediately on other client errors', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(new Response('missing', { status: 404 }));

    const error = await fetchWithRetry('https://api.example/test', {}, { baseDelayMs: 1 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      expect(error.status).toBe(404);
      expect(error.message).toBe('HTTP request failed (404): missing');
    }
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured retries', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockImplementation(async () => new Response('down', { status: 500 }));

    await expect(fetchWithRetry('https://api.example/test', {}, { retries: 1, baseDelayMs: 1 })).rejects.toThrow(
      'HTTP request failed (500): down',
    );
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe('Retry-After handling', () => {
  it('reads delay-seconds and ignores other forms', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter(' 0 ')).toBe(0);
    expect(parseRetryAfter('soon')).toBeNull();
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:00 GMT')).toBeNull();
    expect(parseRetryAfter(null)).toBeNull();
  });

  it('fails at once when the server asks to wait longer than the limit', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockImplementation(
      async () => new Response('slow down', { status: 429, headers: { 'Retry-After': '3600' } }),
    );

    const error = await fetchWithRetry('https://api.example/test', {}, { baseDelayMs: 1 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HttpError);
    if (error instanceof HttpError) {
      expect(error.status).toBe(429);
      expect(error.message).toBe('HTTP request failed (429): Retry-After of 3600000ms exceeds the 10000ms limit');
    }
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('waits the requested seconds when within the limit', async () => {
    vi.useFakeTimers();
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'Retry-After': '2' } }));
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true }));

    const pending = fetchWithRetry('https://api.example/test', {}, { baseDelayMs: 50 });

    await vi.advanceTimersByTimeAsync(1999);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect((await pending).status).toBe(200);
  });

  it('falls back to exponential backoff for a non-numeric header', async () => {
    vi.useFakeTimers();
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'Retry-After': 'soon' } }));
    fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true }));

    const pending = fetchWithRetry('https://api.example/test', {}, { baseDelayMs: 1000 });

    await vi.advanceTimersByTimeAsync(999);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect((await pending).status).toBe(200);
  });
});

describe('TicketmasterCatalog', () => {
  it('builds the discovery query', () => {
    const url = new URL(buildTicketmasterUrl('https://tm.example/discovery/v2', 'test-key', query, 2, 200));

    expect(url.pathname).toBe('/discovery/v2/events.json');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      apikey: 'test-key',
      city: 'New York',
      countryCode: 'US',
      startDateTime: '2026-03-01T00:00:00Z',
      endDateTime: '2026-03-07T23:59:59Z',
      size: '200',
      sort: 'date,asc',
      page: '2',
      stateCode: 'NY',
      priceMax: '100',
    });
  });

  it('returns one page of events with the reported page count', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ _embedded: { events: [rawEvent('jazz-1', 'Blue Note Late Set')] }, page: { totalPages: 3 } }),
    );
    const catalog = new TicketmasterCatalog({ apiKey: 'test-key', http: { retries: 0 } });

    const page = await catalog.fetchPage(query, 0);

    expect(page.totalPages).toBe(3);
    expect(page.events.map((e) => e.id)).toEqual(['jazz-1']);
  });

  it('treats a page without events as the end', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse({ page: { totalPages: 0 } }));
    const catalog = new TicketmasterCatalog({ apiKey: 'test-key', http: { retries: 0 } });

    expect(await catalog.fetchPage(query, 0)).toEqual({ events: [], totalPages: 0 });
  });

  it('raises a CollectionError for a fault body', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse({ fault: { faultstring: 'Invalid ApiKey' } }));
    const catalog = new TicketmasterCatalog({ apiKey: 'test-key', http: { retries: 0 } });

    const error = await catalog.fetchPage(query, 0).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CollectionError);
    if (error instanceof CollectionError) {
      expect(error.source).toBe('catalog');
      expect(error.message).toBe('Ticketmaster fault: Invalid ApiKey');
    }
  });

  it('raises a CollectionError when the request is rejected', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(new Response('unauthorized', { status: 401 }));
    const catalog = new TicketmasterCatalog({ apiKey: 'test-key', http: { retries: 0 } });

    await expect(catalog.fetchPage(query, 0)).rejects.toThrow(
      'Ticketmaster request failed: HTTP request failed (401): unauthorized',
    );
  });
});

describe('OpenMeteoForecast', () => {
  it('geocodes the city and returns raw daily values', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse({ results: [{ latitude: 40.71, longitude: -74.01 }] }));
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        daily: {
          time: ['2026-03-06', '2026-03-07'],
          temperature_2m_max: [8, 10],
          temperature_2m_min: [1, 2],
          weathercode: [61, 2],
          precipitation_probability_max: [70, 10],
          windspeed_10m_max: [20, 12],
        },
      }),
    );
    const forecast = new OpenMeteoForecast({ http: { retries: 0 } });

    const days = await forecast.fetchDaily('New York', { start: '2026-03-06', end: '2026-03-07' });

    expect(days[1]).toEqual({
      date: '2026-03-07',
      tempMaxC: 10,
      tempMinC: 2,
      weatherCode: 2,
      precipitationChance: 10,
      windSpeedKmh: 12,
    });
    const forecastUrl = new URL(String(fetchMock.mock.calls[1][0]));
    expect(forecastUrl.searchParams.get('latitude')).toBe('40.71');
    expect(forecastUrl.searchParams.get('start_date')).toBe('2026-03-06');
    expect(forecastUrl.searchParams.get('end_date')).toBe('2026-03-07');
  });

  it('fails when the city cannot be geocoded', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse({}));
    const forecast = new OpenMeteoForecast({ http: { retries: 0 } });

    await expect(forecast.fetchDaily('Atlantis', { start: '2026-03-06', end: '2026-03-07' })).rejects.toThrow(
      'Cannot geocode city: "Atlantis"',
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe('toSearchSnippets', () => {
  it('keeps http results and collapses whitespace', () => {
    const snippets = toSearchSnippets({
      results: [
        { title: 'Late Set preview', url: 'https://news.example/late-set', text: 'Trio plays\n\n standards' },
        { title: 'No link', url: 'ftp://files.example/x', text: 'skip me' },
        { url: 'https://blog.example/post', text: 'Untitled post' },
        'not an object',
      ],
    });

    expect(snippets).toEqual([
      { title: 'Late Set preview', snippet: 'Trio plays standards', url: 'https://news.example/late-set' },
      { title: 'https://blog.example/post', snippet: 'Untitled post', url: 'https://blog.example/post' },
    ]);
  });

  it('returns nothing for an unexpected shape', () => {
    expect(toSearchSnippets(null)).toEqual([]);
    expect(toSearchSnippets({ results: 'none' })).toEqual([]);
  });
});
