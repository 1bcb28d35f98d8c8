import { Exa } from 'exa-js';

import { CollectionError, errorMessage } from '../../errors.js';
import type { SearchSnippet } from '../../types/index.js';
import type { WebSearchSource } from '../../types/collaborators.js';

type SearchAndContentsOptions = Parameters<Exa['searchAndContents']>[1];

const SNIPPET_MAX_CHARS = 400;

function isHttpUrl(s: string): boolean {
  return /^https?:\/\//i.test(s);
}

function readString(record: object, key: string): string {
  const value: unknown = Reflect.get(record, key);
  return typeof value === 'string' ? value.trim() : '';
}

/** Pull `{ title, snippet, url }` out of Exa's loosely typed result list. */
export function toSearchSnippets(response: unknown): SearchSnippet[] {
  const results: unknown = response && typeof response === 'object' ? Reflect.get(response, 'results') : undefined;
  if (!Array.isArray(results)) return [];

  const snippets: SearchSnippet[] = [];
  for (const r of results) {
    if (!r || typeof r !== 'object') continue;
    const url = readString(r, 'url');
    if (!isHttpUrl(url)) continue;
    snippets.push({
      title: readString(r, 'title') || url,
      snippet: readString(r, 'text').replace(/\s+/g, ' ').slice(0, SNIPPET_MAX_CHARS),
      url,
    });
  }
  return snippets;
}

/** Exa-backed web search, used to fill in events whose catalog description is sparse. */
export class ExaWebSearch implements WebSearchSource {
  private readonly exa: Exa;

  constructor(apiKey: string) {
    this.exa = new Exa(apiKey);
  }

  async search(query: string, limit: number): Promise<SearchSnippet[]> {
    const options = {
      type: 'auto',
      numResults: limit,
      text: { maxCharacters: SNIPPET_MAX_CHARS },
    } satisfies SearchAndContentsOptions;

    let response: unknown;
    try {
      response = await this.exa.searchAndContents(query, options);
    } catch (error) {
      throw new CollectionError('search', `Exa search failed: ${errorMessage(error)}`, { cause: error });
    }
    return toSearchSnippets(response).slice(0, limit);
  }
}
