/**
 * Web search boundary.
 *
 * SearchClient is what the deep search agent consumes; SerperSearchClient is
 * the HTTP implementation over the Serper news and organic search endpoints.
 */

import { z } from 'zod';
import { SearchError, maskSecretsInMessage } from '../domain/errors';

/** One search hit. Providers disagree on field names, so everything is optional. */
export interface SearchResult {
  title?: string;
  link?: string;
  snippet?: string;
  body?: string;
  date?: string;
  source?: string;
}

export interface SearchClient {
  searchNews(query: string, maxResults: number): Promise<SearchResult[]>;
  searchText(query: string, maxResults: number): Promise<SearchResult[]>;
}

export const SERPER_SEARCH_ENDPOINT = 'https://google.serper.dev/search';
export const SERPER_NEWS_ENDPOINT = 'https://google.serper.dev/news';

const SerperItemSchema = z
  .object({
    title: z.string().optional(),
    link: z.string().optional(),
    snippet: z.string().optional(),
    body: z.string().optional(),
    date: z.string().optional(),
    source: z.string().optional(),
  })
  .strip();

const SerperResponseSchema = z.object({
  news: z.array(SerperItemSchema).optional(),
  organic: z.array(SerperItemSchema).optional(),
});

export interface SerperSearchClientOptions {
  apiKey: string;
  newsEndpoint?: string;
  searchEndpoint?: string;
}

export class SerperSearchClient implements SearchClient {
  private readonly newsEndpoint: string;
  private readonly searchEndpoint: string;

  constructor(private readonly options: SerperSearchClientOptions) {
    if (!options.apiKey) {
      throw new RangeError('A Serper API key is required');
    }
    this.newsEndpoint = options.newsEndpoint ?? SERPER_NEWS_ENDPOINT;
    this.searchEndpoint = options.searchEndpoint ?? SERPER_SEARCH_ENDPOINT;
  }

  async searchNews(query: string, maxResults: number): Promise<SearchResult[]> {
    const data = await this.request(this.newsEndpoint, query, maxResults);
    return (data.news ?? []).slice(0, maxResults);
  }

  async searchText(query: string, maxResults: number): Promise<SearchResult[]> {
    const data = await this.request(this.searchEndpoint, query, maxResults);
    return (data.organic ?? []).slice(0, maxResults);
  }

  private async request(endpoint: string, query: string, num: number): Promise<z.infer<typeof SerperResponseSchema>> {
    const mask = (message: string) => maskSecretsInMessage(message, [this.options.apiKey]);

    let res: Response;
    try {
      res = await fetch(endpoint, {
        method: 'POST',
        headers: { 'X-API-KEY': this.options.apiKey, 'Content-Type': 'application/json' },
        body: JSON.stringify({ q: query, num }),
      });
    } catch (err) {
      throw new SearchError(mask(`Serper connection failed: ${err instanceof Error ? err.message : 'unknown error'}`));
    }

    if (res.status !== 200) {
      const text = await res.text().catch(() => '');
      throw new SearchError(mask(`Serper API error ${res.status}: ${text.slice(0, 200)}`), res.status);
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch {
      throw new SearchError('Serper returned a non-JSON body', res.status);
    }
    const parsed = SerperResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SearchError('Serper response has an unexpected shape', res.status);
    }
    return parsed.data;
  }
}
