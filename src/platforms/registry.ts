import { AtsPlatform, PLATFORM_HOSTS, PlatformHit, PlatformLookup } from './base';
import { PlatformId } from '../types/hiring';
import { parseUrl } from '../utils/url';
import { logger } from '../utils/logger';

const GENERIC_PATH_SEGMENTS = ['boards', 'postings', 'api', 'v0', 'v1'];
const HOST_PREFIXES = ['www.', 'jobs.', 'careers.'];
const NON_TOKEN_LABELS = [
  'com', 'co', 'io', 'net', 'org', 'ai', 'vc',
  'greenhouse', 'lever', 'ashbyhq', 'workable',
];

/**
 * Platforms probed by token when nothing is known about the company's ATS
 */
const PROBE_ORDER: PlatformId[] = ['greenhouse', 'lever', 'ashby'];

export function detectPlatform(url: string): PlatformId | null {
  const lower = url.toLowerCase();
  return PLATFORM_HOSTS.find(entry => lower.includes(entry.host))?.id ?? null;
}

function stripHostPrefixes(host: string): string {
  let stripped = host;
  let changed = true;
  while (changed) {
    changed = false;
    for (const prefix of HOST_PREFIXES) {
      if (stripped.startsWith(prefix)) {
        stripped = stripped.slice(prefix.length);
        changed = true;
      }
    }
  }
  return stripped;
}

/**
 * Company slug used by ATS boards
 *
 * jobs.lever.co/netflix -> "netflix", netflix.lever.co -> "netflix",
 * jobs.primary.vc -> "primary"
 */
export function extractCompanyToken(url: string): string | null {
  const parsed = parseUrl(url);
  if (!parsed) return null;

  const segments = parsed.pathname.split('/').filter(segment => segment.length > 0);
  const pathToken = segments.find(
    segment => !GENERIC_PATH_SEGMENTS.includes(segment.toLowerCase())
  );
  if (pathToken) return pathToken;

  const labels = stripHostPrefixes(parsed.hostname).split('.').filter(label => label.length > 0);
  const token = labels.find(label => !NON_TOKEN_LABELS.includes(label)) ?? labels[0] ?? null;

  logger.debug(`Extracted token '${token}' from '${parsed.hostname}'`);
  return token;
}

/**
 * Recognizes ATS URLs and reads canonical job lists without scraping
 */
export class PlatformRegistry {
  private readonly platforms: Map<PlatformId, AtsPlatform>;

  constructor(platforms: AtsPlatform[]) {
    this.platforms = new Map(platforms.map(platform => [platform.id, platform]));
  }

  get enabledPlatforms(): PlatformId[] {
    return [...this.platforms.keys()];
  }

  /**
   * Greenhouse, then Lever, then Ashby; the first board with postings (or a
   * board that needs rendering) wins. Failures count as "no jobs".
   */
  async tryAllPlatforms(url: string): Promise<PlatformHit | null> {
    const token = extractCompanyToken(url);
    if (!token) {
      logger.warn(`Could not extract company token`, { url });
      return null;
    }

    for (const id of PROBE_ORDER) {
      const platform = this.platforms.get(id);
      if (!platform) continue;

      const lookup = await platform.lookup(token);
      if (lookup.status === 'found' || lookup.status === 'requires_scraping') {
        return lookup;
      }
    }

    logger.info(`No jobs found via platform APIs`, { token });
    return null;
  }

  /**
   * Queries only the platform hosting the given ATS URL
   */
  async lookupUrl(url: string): Promise<PlatformLookup | null> {
    const id = detectPlatform(url);
    if (!id) return null;

    const platform = this.platforms.get(id);
    const token = extractCompanyToken(url);
    if (!platform || !token) return null;

    return platform.lookup(token);
  }
}
