import * as cheerio from 'cheerio';
import { WebSearchClient } from './search-client';
import { detectPlatform, extractCompanyToken } from '../platforms';
import { CareerPageCandidate } from '../types/hiring';
import { HttpClient, browserHeaders } from '../utils/http';
import { extractSitemapLocations } from '../utils/html';
import { cleanDomain, resolveHref, rootDomain, siteOrigin } from '../utils/url';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

const CAREER_PATHS = [
  '/careers',
  '/jobs',
  '/company/careers',
  '/about/careers',
  '/join-us',
  '/work-with-us',
  '/team',
];

const SITEMAP_KEYWORDS = ['career', 'jobs', 'join'];

const LINK_KEYWORDS = [
  'career',
  'job',
  'hiring',
  'join us',
  'work with us',
  'openings',
  'positions',
];

const SITEMAP_TIMEOUT_MS = 10_000;
const HOMEPAGE_TIMEOUT_MS = 10_000;
const PROBE_TIMEOUT_MS = 5_000;

/**
 * Finds the single most authoritative career page URL for a company
 */
export class CareerPageLocator {
  constructor(
    private readonly search: WebSearchClient,
    private readonly http: HttpClient
  ) {}

  /**
   * Search-first discovery: ATS backdoor, then sitemap, then organic search
   */
  async triangulate(domain: string): Promise<CareerPageCandidate | null> {
    const cleaned = cleanDomain(domain);
    logger.info(`Triangulating career page for: ${cleaned}`);

    const strategies = [
      () => this.findAtsUrl(cleaned),
      () => this.checkSitemap(cleaned),
      () => this.findOrganicUrl(cleaned),
    ];

    for (const strategy of strategies) {
      const candidate = await strategy();
      if (candidate) {
        logger.info(`Career page found via ${candidate.method}`, { url: candidate.url });
        return candidate;
      }
    }

    logger.warn(`Triangulation failed for ${cleaned}`);
    return null;
  }

  async findHomepageLink(website: string): Promise<CareerPageCandidate | null> {
    const homepage = siteOrigin(website);

    try {
      const response = await this.http.request(homepage, {
        headers: browserHeaders(),
        timeoutMs: HOMEPAGE_TIMEOUT_MS,
      });
      if (!response.ok) {
        logger.debug(`Homepage returned ${response.status}`, { homepage });
        return null;
      }

      const $ = cheerio.load(await response.text());
      for (const anchor of $('a[href]').toArray()) {
        const href = $(anchor).attr('href')?.trim() ?? '';
        if (!href || href.startsWith('#') || /^(mailto|tel|javascript):/i.test(href)) {
          continue;
        }

        const text = $(anchor).text().toLowerCase();
        const lowerHref = href.toLowerCase();
        if (!LINK_KEYWORDS.some(keyword => text.includes(keyword) || lowerHref.includes(keyword))) {
          continue;
        }

        const url = resolveHref(homepage, href);
        if (url) {
          logger.info(`Career link found on homepage`, { url });
          return { url, method: 'Homepage_Link' };
        }
      }
    } catch (error) {
      logger.debug(`Homepage link search failed`, { homepage, error: describeError(error) });
    }

    return null;
  }

  /**
   * HEAD requests against conventional career paths
   */
  async probePatterns(website: string): Promise<CareerPageCandidate | null> {
    for (const url of probeCandidates(website)) {
      try {
        const response = await this.http.request(url, {
          method: 'HEAD',
          headers: browserHeaders(),
          timeoutMs: PROBE_TIMEOUT_MS,
        });
        if (response.status === 200) {
          logger.info(`Career page found by probing`, { url });
          return { url, method: 'Pattern_Probe' };
        }
      } catch (error) {
        logger.debug(`Probe failed`, { url, error: describeError(error) });
      }
    }

    return null;
  }

  /**
   * A failed triangulation falls through to the homepage link and the probe
   */
  async locate(website: string): Promise<CareerPageCandidate | null> {
    let triangulated: CareerPageCandidate | null = null;
    try {
      triangulated = await this.triangulate(website);
    } catch (error) {
      logger.warn(`Triangulation error, falling back to homepage and probing`, {
        website,
        error: describeError(error),
      });
    }

    return (
      triangulated ??
      (await this.findHomepageLink(website)) ??
      (await this.probePatterns(website))
    );
  }

  private async findAtsUrl(domain: string): Promise<CareerPageCandidate | null> {
    const company = extractCompanyToken(`https://${domain}`) ?? domain.split('.')[0];
    const query = `site:greenhouse.io OR site:lever.co OR site:ashbyhq.com "${company}"`;
    const results = await this.search.search(query, 5);

    const hit = results.find(result => detectPlatform(result.link) !== null);
    return hit ? { url: hit.link, method: 'ATS_Backdoor' } : null;
  }

  private async checkSitemap(domain: string): Promise<CareerPageCandidate | null> {
    const sitemapUrl = `https://${domain}/sitemap.xml`;

    try {
      const response = await this.http.request(sitemapUrl, {
        headers: browserHeaders(),
        timeoutMs: SITEMAP_TIMEOUT_MS,
      });
      if (!response.ok) return null;

      const locations = extractSitemapLocations(await response.text());
      const url = locations.find(location => {
        const lower = location.toLowerCase();
        return SITEMAP_KEYWORDS.some(keyword => lower.includes(keyword));
      });
      return url ? { url, method: 'Sitemap_Discovery' } : null;
    } catch (error) {
      logger.debug(`Sitemap fetch failed for ${domain}`, { error: describeError(error) });
      return null;
    }
  }

  private async findOrganicUrl(domain: string): Promise<CareerPageCandidate | null> {
    const results = await this.search.search(`site:${domain} (careers OR jobs)`, 5);
    const first = results.find(result => result.link.length > 0);
    return first ? { url: first.link, method: 'Google_Organic' } : null;
  }
}

/**
 * Ordered, de-duplicated URLs tried by probePatterns
 */
export function probeCandidates(website: string): string[] {
  const base = siteOrigin(website);
  const root = rootDomain(cleanDomain(website));
  const rootOrigin = `https://${root}`;

  const bases = [base];
  if (rootOrigin !== base) bases.push(rootOrigin);

  const urls = bases.flatMap(origin => CAREER_PATHS.map(path => `${origin}${path}`));
  urls.push(`https://careers.${root}`, `https://jobs.${root}`);

  return [...new Set(urls)];
}
