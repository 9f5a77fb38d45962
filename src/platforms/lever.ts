import { z } from 'zod';
import { AtsPlatform, PlatformLookup, getPlatformJson } from './base';
import { JobPosting } from '../types/hiring';
import { HttpClient } from '../utils/http';
import { logger } from '../utils/logger';

const leverPostingsSchema = z.array(
  z.object({
    text: z.string().nullish(),
    hostedUrl: z.string().nullish(),
    categories: z
      .object({
        location: z.string().nullish(),
        team: z.string().nullish(),
      })
      .nullish(),
  })
);

/**
 * Lever Postings API adapter
 * API Documentation: https://github.com/lever/postings-api
 */
export class LeverPlatform implements AtsPlatform {
  readonly id = 'lever';
  readonly label = 'Lever';
  private readonly apiUrl = 'https://api.lever.co/v0/postings';

  constructor(private readonly http: HttpClient) {}

  async lookup(token: string): Promise<PlatformLookup> {
    const url = `${this.apiUrl}/${encodeURIComponent(token)}`;
    logger.info(`Fetching Lever jobs: ${url}`);

    const body = await getPlatformJson(this.http, url);
    if (!body.ok) {
      logger.warn(`Lever API returned no jobs`, { token, reason: body.error });
      return { status: 'failed', platform: this.id, label: this.label, error: body.error };
    }

    const parsed = leverPostingsSchema.safeParse(body.value);
    if (!parsed.success) {
      logger.warn(`Lever API returned an unexpected payload`, { token });
      return { status: 'failed', platform: this.id, label: this.label, error: 'Unexpected payload' };
    }

    const postings: JobPosting[] = parsed.data
      .filter(posting => posting.text)
      .map(posting => ({
        title: posting.text ?? '',
        location: posting.categories?.location ?? undefined,
        department: posting.categories?.team ?? undefined,
        url: posting.hostedUrl ?? undefined,
        platform: this.label,
      }));

    logger.info(`Lever: Found ${postings.length} jobs`, { token });
    return postings.length > 0
      ? { status: 'found', platform: this.id, label: this.label, postings }
      : { status: 'empty', platform: this.id, label: this.label };
  }
}
