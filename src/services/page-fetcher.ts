import { BrowserRenderer } from './browser-renderer';
import { HttpClient, browserHeaders } from '../utils/http';
import { htmlToText } from '../utils/html';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface PageContent {
  url: string;
  html: string;
  text: string;
  source: 'http' | 'browser';
}

/**
 * Pages with less visible text than this are assumed to be rendered client-side
 */
export const MIN_STATIC_TEXT_LENGTH = 500;

const PLAIN_FETCH_TIMEOUT_MS = 10_000;

export class PageFetcher {
  private warnedNoRenderer = false;

  constructor(
    private readonly http: HttpClient,
    private readonly renderer: BrowserRenderer | null
  ) {}

  async fetchPlain(url: string): Promise<PageContent | null> {
    try {
      const response = await this.http.request(url, {
        headers: browserHeaders(),
        timeoutMs: PLAIN_FETCH_TIMEOUT_MS,
      });

      if (!response.ok) {
        logger.warn(`Career page returned ${response.status}`, { url });
        return null;
      }

      const html = await response.text();
      return { url, html, text: htmlToText(html), source: 'http' };
    } catch (error) {
      logger.warn(`Failed to fetch page`, { url, error: describeError(error) });
      return null;
    }
  }

  /**
   * Plain GET first, escalating to a headless browser when the page is
   * unreachable or looks like an empty JavaScript shell
   */
  async fetch(url: string, waitSelector?: string): Promise<PageContent | null> {
    const plain = await this.fetchPlain(url);
    if (plain && plain.text.length >= MIN_STATIC_TEXT_LENGTH) {
      return plain;
    }

    if (!this.renderer) {
      if (!this.warnedNoRenderer) {
        logger.warn('No browser renderer available, using plain HTTP content only');
        this.warnedNoRenderer = true;
      }
      return plain;
    }

    logger.info(`Escalating to browser render`, {
      url,
      plainTextLength: plain?.text.length ?? null,
    });

    let html: string | null;
    try {
      html = await this.renderer.render(url, waitSelector);
    } catch (error) {
      logger.warn(`Browser render failed, using plain HTTP content`, {
        url,
        error: describeError(error),
      });
      return plain;
    }
    if (html === null) {
      return plain;
    }

    return { url, html, text: htmlToText(html), source: 'browser' };
  }
}
