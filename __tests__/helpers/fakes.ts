import { HiringCheckStore } from '../../src/db/hiring-checks';
import { BrowserRenderer } from '../../src/services/browser-renderer';
import { CompletionClient, CompletionOptions } from '../../src/services/llm-client';
import { SearchResult, WebSearchClient } from '../../src/services/search-client';
import { CompanyInput, HiringResult } from '../../src/types/hiring';
import { HttpClient, HttpRequestOptions, HttpResponse } from '../../src/utils/http';

type Method = NonNullable<HttpRequestOptions['method']>;

export interface FakeRoute {
  status?: number;
  body?: string | object;
  error?: Error;
}

export function fakeResponse(url: string, status: number, text: string): HttpResponse {
  return {
    status,
    ok: status >= 200 && status < 300,
    url,
    text: async () => text,
    json: async (): Promise<unknown> => JSON.parse(text),
  };
}

/**
 * Routes requests by method and exact URL; anything unrouted is a 404
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: Array<{ url: string; options: HttpRequestOptions }> = [];
  private readonly routes = new Map<string, FakeRoute>();

  on(url: string, route: FakeRoute, method: Method = 'GET'): this {
    this.routes.set(`${method} ${url}`, route);
    return this;
  }

  async request(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    this.requests.push({ url, options });

    const route = this.routes.get(`${options.method ?? 'GET'} ${url}`);
    if (!route) return fakeResponse(url, 404, 'Not Found');
    if (route.error) throw route.error;

    const text = typeof route.body === 'string' ? route.body : JSON.stringify(route.body ?? '');
    return fakeResponse(url, route.status ?? 200, text);
  }

  requestedUrls(method?: Method): string[] {
    return this.requests
      .filter(request => !method || (request.options.method ?? 'GET') === method)
      .map(request => request.url);
  }
}

export class FakeSearchClient implements WebSearchClient {
  readonly queries: string[] = [];
  private readonly results = new Map<string, SearchResult[]>();

  on(query: string, links: string[]): this {
    this.results.set(
      query,
      links.map(link => ({ title: link, link, snippet: '' }))
    );
    return this;
  }

  async search(query: string): Promise<SearchResult[]> {
    this.queries.push(query);
    return this.results.get(query) ?? [];
  }
}

/**
 * Answers completions from a queue; an Error entry is thrown
 */
export class FakeCompletionClient implements CompletionClient {
  readonly calls: Array<{ prompt: string; options: CompletionOptions }> = [];

  constructor(private readonly replies: Array<string | Error> = []) {}

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    this.calls.push({ prompt, options });
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('No fake completion queued');
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export class FakeRenderer implements BrowserRenderer {
  readonly calls: string[] = [];
  private readonly pages = new Map<string, string | null>();

  on(url: string, html: string | null): this {
    this.pages.set(url, html);
    return this;
  }

  async render(url: string): Promise<string | null> {
    this.calls.push(url);
    return this.pages.get(url) ?? null;
  }
}

export class InMemoryHiringCheckStore implements HiringCheckStore {
  readonly saved: Array<{ company: CompanyInput; result: HiringResult }> = [];
  readonly cached = new Map<string, HiringResult>();

  async findRecent(website: string): Promise<HiringResult | null> {
    return this.cached.get(website) ?? null;
  }

  async save(company: CompanyInput, result: HiringResult): Promise<void> {
    this.saved.push({ company, result });
  }
}

/**
 * A page whose visible text is long enough to skip browser rendering
 */
export function longPage(body: string): string {
  const filler = 'We build tools for teams around the world. '.repeat(15);
  return `<html><body><p>${filler}</p>${body}</body></html>`;
}
