import { z } from 'zod';
import { HttpClient } from '../utils/http';
import { describeError } from '../utils/errors';
import { logger, preview } from '../utils/logger';

export interface SearchResult {
  title: string;
  link: string;
  snippet: string;
}

export interface WebSearchClient {
  search(query: string, numResults: number): Promise<SearchResult[]>;
}

const serperResponseSchema = z.object({
  organic: z
    .array(
      z.object({
        title: z.string().nullish(),
        link: z.string().nullish(),
        snippet: z.string().nullish(),
      })
    )
    .nullish(),
});

/**
 * Serper.dev Google search client
 * Without an API key every search resolves to no results
 */
export class SerperSearchClient implements WebSearchClient {
  private readonly endpoint = 'https://google.serper.dev/search';
  private readonly timeoutMs = 15_000;

  constructor(
    private readonly http: HttpClient,
    private readonly apiKey: string | null
  ) {
    if (!apiKey) {
      logger.warn('SERPER_API_KEY not configured, web search disabled');
    }
  }

  async search(query: string, numResults: number): Promise<SearchResult[]> {
    if (!this.apiKey) {
      logger.debug('Skipping search without API key', { query });
      return [];
    }

    try {
      logger.info(`Serper search: '${query}'`, { numResults });
      const response = await this.http.request(this.endpoint, {
        method: 'POST',
        headers: {
          'X-API-KEY': this.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ q: query, num: Math.min(numResults, 100) }),
        timeoutMs: this.timeoutMs,
      });

      if (!response.ok) {
        const body = await response.text();
        logger.warn(`Serper returned ${response.status}`, { query, body: preview(body) });
        return [];
      }

      const parsed = serperResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.warn('Serper returned an unexpected payload', { query });
        return [];
      }

      const results = (parsed.data.organic ?? []).map(item => ({
        title: item.title ?? '',
        link: item.link ?? '',
        snippet: item.snippet ?? '',
      }));

      logger.info(`Serper returned ${results.length} organic results`, { query });
      return results;
    } catch (error) {
      logger.error('Serper search error', error, { query, reason: describeError(error) });
      return [];
    }
  }
}
