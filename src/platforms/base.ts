import { JobPosting, PlatformId } from '../types/hiring';
import { Outcome, failure, success } from '../types/result';
import { HttpClient, HttpResponse } from '../utils/http';
import { describeError } from '../utils/errors';

export const PLATFORM_TIMEOUT_MS = 10_000;

/**
 * Hostname fragments identifying each ATS, in detection order
 */
export const PLATFORM_HOSTS: ReadonlyArray<{ id: PlatformId; host: string }> = [
  { id: 'greenhouse', host: 'greenhouse.io' },
  { id: 'lever', host: 'lever.co' },
  { id: 'ashby', host: 'ashbyhq.com' },
  { id: 'workable', host: 'workable.com' },
];

export type PlatformLookup =
  | { status: 'found'; platform: PlatformId; label: string; postings: JobPosting[] }
  | { status: 'requires_scraping'; platform: PlatformId; label: string; boardUrl: string }
  | { status: 'empty'; platform: PlatformId; label: string }
  | { status: 'failed'; platform: PlatformId; label: string; error: string };

export type PlatformHit = Extract<PlatformLookup, { status: 'found' | 'requires_scraping' }>;

/**
 * Base interface for all ATS platforms
 * Each platform adapter must implement this interface
 */
export interface AtsPlatform {
  /**
   * Unique identifier for the platform
   */
  readonly id: PlatformId;

  /**
   * Human readable name used in detection labels
   */
  readonly label: string;

  /**
   * Looks up the public job board for a company token
   */
  lookup(token: string): Promise<PlatformLookup>;
}

/**
 * Single GET against a platform endpoint
 * Network errors and non-2xx statuses both come back as failures
 */
export async function getPlatformResponse(
  http: HttpClient,
  url: string
): Promise<Outcome<HttpResponse>> {
  try {
    const response = await http.request(url, {
      headers: { Accept: 'application/json' },
      timeoutMs: PLATFORM_TIMEOUT_MS,
    });
    if (!response.ok) {
      return failure(`HTTP ${response.status}`);
    }
    return success(response);
  } catch (error) {
    return failure(describeError(error));
  }
}

export async function getPlatformJson(http: HttpClient, url: string): Promise<Outcome<unknown>> {
  const response = await getPlatformResponse(http, url);
  if (!response.ok) return response;

  try {
    return success(await response.value.json());
  } catch (error) {
    return failure(`Invalid JSON: ${describeError(error)}`);
  }
}
