import { z } from 'zod';
import { AtsPlatform, PlatformLookup, getPlatformJson } from './base';
import { JobPosting } from '../types/hiring';
import { HttpClient } from '../utils/http';
import { logger } from '../utils/logger';

const greenhouseJobsSchema = z.object({
  jobs: z.array(
    z.object({
      title: z.string().nullish(),
      absolute_url: z.string().nullish(),
      location: z.object({ name: z.string().nullish() }).nullish(),
      departments: z.array(z.object({ name: z.string().nullish() })).nullish(),
    })
  ),
});

/**
 * Greenhouse Job Board API adapter
 * API Documentation: https://developers.greenhouse.io/job-board.html
 */
export class GreenhousePlatform implements AtsPlatform {
  readonly id = 'greenhouse';
  readonly label = 'Greenhouse';
  private readonly apiUrl = 'https://boards-api.greenhouse.io/v1/boards';

  constructor(private readonly http: HttpClient) {}

  async lookup(token: string): Promise<PlatformLookup> {
    const url = `${this.apiUrl}/${encodeURIComponent(token)}/jobs`;
    logger.info(`Fetching Greenhouse jobs: ${url}`);

    const body = await getPlatformJson(this.http, url);
    if (!body.ok) {
      logger.warn(`Greenhouse API returned no jobs`, { token, reason: body.error });
      return { status: 'failed', platform: this.id, label: this.label, error: body.error };
    }

    const parsed = greenhouseJobsSchema.safeParse(body.value);
    if (!parsed.success) {
      logger.warn(`Greenhouse API returned an unexpected payload`, {
        token,
        issues: parsed.error.issues.map(issue => issue.path.join('.')),
      });
      return { status: 'failed', platform: this.id, label: this.label, error: 'Unexpected payload' };
    }

    const postings: JobPosting[] = [];
    for (const job of parsed.data.jobs) {
      if (!job.title) continue;
      postings.push({
        title: job.title,
        location: job.location?.name ?? undefined,
        department: job.departments?.[0]?.name ?? undefined,
        url: job.absolute_url ?? undefined,
        platform: this.label,
      });
    }

    logger.info(`Greenhouse: Found ${postings.length} jobs`, { token });
    return postings.length > 0
      ? { status: 'found', platform: this.id, label: this.label, postings }
      : { status: 'empty', platform: this.id, label: this.label };
  }
}
