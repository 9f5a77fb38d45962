import { z } from 'zod';
import { AtsPlatform, PlatformLookup, getPlatformJson } from './base';
import { JobPosting } from '../types/hiring';
import { HttpClient } from '../utils/http';
import { logger } from '../utils/logger';

const workableAccountSchema = z.object({
  jobs: z.array(
    z.object({
      title: z.string().nullish(),
      url: z.string().nullish(),
      city: z.string().nullish(),
      country: z.string().nullish(),
      department: z.string().nullish(),
    })
  ),
});

/**
 * Workable widget API adapter
 * Only consulted for URLs already recognized as Workable boards
 */
export class WorkablePlatform implements AtsPlatform {
  readonly id = 'workable';
  readonly label = 'Workable';
  private readonly apiUrl = 'https://apply.workable.com/api/v1/widget/accounts';

  constructor(private readonly http: HttpClient) {}

  async lookup(token: string): Promise<PlatformLookup> {
    const url = `${this.apiUrl}/${encodeURIComponent(token)}`;
    logger.info(`Fetching Workable jobs: ${url}`);

    const body = await getPlatformJson(this.http, url);
    if (!body.ok) {
      logger.warn(`Workable API returned no jobs`, { token, reason: body.error });
      return { status: 'failed', platform: this.id, label: this.label, error: body.error };
    }

    const parsed = workableAccountSchema.safeParse(body.value);
    if (!parsed.success) {
      logger.warn(`Workable API returned an unexpected payload`, { token });
      return { status: 'failed', platform: this.id, label: this.label, error: 'Unexpected payload' };
    }

    const postings: JobPosting[] = [];
    for (const job of parsed.data.jobs) {
      if (!job.title) continue;
      const location = [job.city, job.country].filter(Boolean).join(', ');
      postings.push({
        title: job.title,
        location: location || undefined,
        department: job.department ?? undefined,
        url: job.url ?? undefined,
        platform: this.label,
      });
    }

    logger.info(`Workable: Found ${postings.length} jobs`, { token });
    return postings.length > 0
      ? { status: 'found', platform: this.id, label: this.label, postings }
      : { status: 'empty', platform: this.id, label: this.label };
  }
}
