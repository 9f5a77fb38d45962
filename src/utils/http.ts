import fetch from 'node-fetch';

/**
 * Minimal HTTP surface shared by every network-facing component
 * Lets tests swap node-fetch for an in-process fake
 */
export interface HttpResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly url: string;
  text(): Promise<string>;
  json(): Promise<unknown>;
}

export interface HttpRequestOptions {
  method?: 'GET' | 'HEAD' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface HttpClient {
  request(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

const DESKTOP_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_4) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
];

export function randomUserAgent(): string {
  return DESKTOP_USER_AGENTS[Math.floor(Math.random() * DESKTOP_USER_AGENTS.length)];
}

/**
 * Headers for direct requests against company sites
 */
export function browserHeaders(): Record<string, string> {
  return {
    'User-Agent': randomUserAgent(),
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
  };
}

/**
 * node-fetch v2 backed client
 * The timeout option covers both the response headers and the body read
 */
export class NodeFetchHttpClient implements HttpClient {
  async request(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    return fetch(url, {
      method: options.method ?? 'GET',
      headers: options.headers,
      body: options.body,
      timeout: options.timeoutMs,
      redirect: 'follow',
    });
  }
}
