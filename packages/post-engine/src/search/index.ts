import { z } from 'zod';
import { SafeSearchType, search as searchDuckDuckGo } from 'duck-duck-scrape';
import type { SearchContext } from '../types';
import type { SearchConfig } from '../config';
import { isUsableApiKey } from '../config';

const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';
const SEARCH_TIMEOUT_MS = 10_000;

export const NO_CONTEXT: SearchContext = { found: false, text: '' };

export interface SearchResultItem {
  title: string;
  snippet: string;
}

/**
 * Web search capability. Implementations may throw; the pipeline
 * guards every call with safeSearch().
 */
export interface SearchProvider {
  readonly name: string;
  search(query: string): Promise<SearchContext>;
}

/**
 * "1. Title: snippet" lines, one per result
 */
export function formatSearchResults(results: SearchResultItem[]): SearchContext {
  if (results.length === 0) return NO_CONTEXT;

  const text = results.map((result, i) => `${i + 1}. ${result.title}: ${result.snippet}`).join('\n');
  return { found: true, text };
}

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Keyless web search through DuckDuckGo's text results
 */
export class DuckDuckGoSearchProvider implements SearchProvider {
  readonly name = 'duckduckgo';

  constructor(private readonly maxResults: number = 3) {}

  async search(query: string): Promise<SearchContext> {
    const response = await withTimeout(
      searchDuckDuckGo(query, { safeSearch: SafeSearchType.MODERATE }),
      SEARCH_TIMEOUT_MS,
      'DuckDuckGo search'
    );

    if (response.noResults) return NO_CONTEXT;

    return formatSearchResults(
      response.results.slice(0, this.maxResults).map((result) => ({
        title: result.title,
        snippet: result.description || result.url,
      }))
    );
  }
}

const TavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string(),
      content: z.string(),
      url: z.string().optional(),
    })
  ),
});

/**
 * Search through the Tavily API (requires TAVILY_API_KEY)
 */
export class TavilySearchProvider implements SearchProvider {
  readonly name = 'tavily';

  constructor(
    private readonly apiKey: string,
    private readonly maxResults: number = 3
  ) {}

  async search(query: string): Promise<SearchContext> {
    const response = await fetch(TAVILY_SEARCH_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({ query, max_results: this.maxResults }),
      signal: AbortSignal.timeout(SEARCH_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new Error(`Tavily search failed with status ${response.status}`);
    }

    const data = TavilyResponseSchema.parse(await response.json());

    return formatSearchResults(
      data.results.slice(0, this.maxResults).map((result) => ({
        title: result.title,
        snippet: result.content,
      }))
    );
  }
}

export class NoopSearchProvider implements SearchProvider {
  readonly name = 'none';

  async search(): Promise<SearchContext> {
    return NO_CONTEXT;
  }
}

export function createSearchProvider(config: SearchConfig): SearchProvider {
  switch (config.provider) {
    case 'tavily':
      if (isUsableApiKey(config.apiKey)) {
        return new TavilySearchProvider(config.apiKey, config.maxResults);
      }
      console.warn('[Search] TAVILY_API_KEY not configured, falling back to DuckDuckGo');
      return new DuckDuckGoSearchProvider(config.maxResults);
    case 'duckduckgo':
      return new DuckDuckGoSearchProvider(config.maxResults);
    case 'none':
      return new NoopSearchProvider();
  }
}

/**
 * Search never aborts a run: errors and empty results both mean "no context"
 */
export async function safeSearch(provider: SearchProvider, query: string): Promise<SearchContext> {
  try {
    console.log(`[Search] Searching ${provider.name} for: ${query}`);
    const context = await provider.search(query);

    if (!context.found || !context.text.trim()) {
      console.warn('[Search] No search results found');
      return NO_CONTEXT;
    }

    return context;
  } catch (error) {
    console.warn(
      `[Search] ${provider.name} search failed, continuing without context:`,
      error instanceof Error ? error.message : error
    );
    return NO_CONTEXT;
  }
}
