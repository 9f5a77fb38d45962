import { AtsPlatform, PlatformLookup, getPlatformResponse } from './base';
import { HttpClient } from '../utils/http';
import { logger } from '../utils/logger';

/**
 * Ashby job board adapter
 * Ashby has no public list endpoint; a reachable board is handed back for
 * rendering instead of postings
 */
export class AshbyPlatform implements AtsPlatform {
  readonly id = 'ashby';
  readonly label = 'Ashby';
  private readonly boardUrl = 'https://jobs.ashbyhq.com';

  constructor(private readonly http: HttpClient) {}

  async lookup(token: string): Promise<PlatformLookup> {
    const url = `${this.boardUrl}/${encodeURIComponent(token)}`;
    logger.info(`Checking Ashby: ${url}`);

    const response = await getPlatformResponse(this.http, url);
    if (!response.ok) {
      logger.warn(`Ashby board not reachable`, { token, reason: response.error });
      return { status: 'failed', platform: this.id, label: this.label, error: response.error };
    }

    return { status: 'requires_scraping', platform: this.id, label: this.label, boardUrl: url };
  }
}
