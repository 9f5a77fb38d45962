import { CareerPageLocator } from './career-page-locator';
import { ContentExtractor, harvestJobTitles } from './content-extractor';
import { createHiringResult, failedResult } from './hiring-result';
import { PageFetcher } from './page-fetcher';
import { PlatformRegistry } from '../platforms';
import { HiringResult, JobPosting } from '../types/hiring';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Detection method labels are a downstream contract; the "Playwright" names
 * refer to the rendered-fetch layer regardless of the browser driver
 */
export const DetectionMethod = {
  NONE: 'none',
  FAILED: 'failed',
  RENDERED: 'Playwright',
  RENDERED_LLM: 'Playwright + Mistral AI',
  RENDERED_SELECTORS: 'Playwright + DOM selectors',
  PLAIN_LLM: 'Mistral AI (basic HTTP)',
} as const;

const EMPTY_PAGE_PHRASES = ['no open position', 'no current opening'];

interface DetectionProgress {
  careerUrl: string | null;
}

function postingTitles(postings: JobPosting[]): string[] {
  return postings.map(posting => posting.title).filter(title => title.length > 0);
}

/**
 * Four-layer hiring detection
 *
 * 1. ATS platform APIs by company token
 * 2. career page discovery
 * 3. fetch (escalating to a browser) and LLM extraction
 * 4. ATS recovery from the career URL, then plain fetch and LLM extraction
 *
 * Each layer either answers or hands over to the next; none runs twice.
 */
export class HiringDetector {
  constructor(
    private readonly platforms: PlatformRegistry,
    private readonly locator: CareerPageLocator,
    private readonly fetcher: PageFetcher,
    private readonly extractor: ContentExtractor
  ) {}

  /**
   * Never throws; unexpected errors come back as "failed" results
   */
  async checkHiring(companyName: string, website: string): Promise<HiringResult> {
    const progress: DetectionProgress = { careerUrl: null };
    try {
      return await this.runLayers(companyName, website, progress);
    } catch (error) {
      logger.error(`Hiring check failed for ${companyName}`, error, { website });
      return failedResult(`Error: ${describeError(error)}`, progress.careerUrl);
    }
  }

  /**
   * Same pipeline as checkHiring, but unexpected errors propagate so a caller
   * can retry the company
   */
  async detect(companyName: string, website: string): Promise<HiringResult> {
    return this.runLayers(companyName, website, { careerUrl: null });
  }

  private async runLayers(
    companyName: string,
    website: string,
    progress: DetectionProgress
  ): Promise<HiringResult> {
    logger.info(`Checking hiring for: ${companyName}`, { website });

    // Layer 1
    const hit = await this.platforms.tryAllPlatforms(website);
    if (hit?.status === 'found') {
      const titles = postingTitles(hit.postings);
      logger.info(`Layer 1 success: ${hit.label} API`, { companyName, jobs: titles.length });
      return createHiringResult({
        isHiring: titles.length > 0,
        careerPageUrl: hit.postings[0]?.url ?? null,
        jobRoles: titles,
        hiringSummary: `Found ${titles.length} positions via ${hit.label}`,
        detectionMethod: `${hit.label} API`,
      });
    }

    // Layer 2, skipped when the ATS board itself needs rendering
    let careerUrl: string;
    if (hit?.status === 'requires_scraping') {
      careerUrl = hit.boardUrl;
      logger.info(`${hit.label} board requires rendering`, { careerUrl });
    } else {
      const candidate = await this.locator.locate(website);
      if (!candidate) {
        logger.warn(`No career page found for ${companyName}`);
        return createHiringResult({
          isHiring: false,
          careerPageUrl: null,
          jobRoles: [],
          hiringSummary: 'No career page found',
          detectionMethod: DetectionMethod.NONE,
        });
      }
      careerUrl = candidate.url;
      logger.info(`Found career page: ${careerUrl}`, { method: candidate.method });
    }
    progress.careerUrl = careerUrl;

    const rendered = await this.tryRenderedPage(companyName, careerUrl);
    if (rendered) {
      return rendered;
    }

    return this.tryRecovery(companyName, careerUrl);
  }

  /**
   * Layer 3: null hands over to Layer 4
   */
  private async tryRenderedPage(
    companyName: string,
    careerUrl: string
  ): Promise<HiringResult | null> {
    const page = await this.fetcher.fetch(careerUrl);
    if (!page) return null;

    const lowerText = page.text.toLowerCase();
    if (EMPTY_PAGE_PHRASES.some(phrase => lowerText.includes(phrase))) {
      logger.info(`Career page reports no openings`, { companyName, careerUrl });
      return createHiringResult({
        isHiring: false,
        careerPageUrl: careerUrl,
        jobRoles: [],
        hiringSummary: 'No open positions',
        detectionMethod: DetectionMethod.RENDERED,
      });
    }

    if (this.extractor.isConfigured) {
      const verdict = await this.extractor.analyzeCareerPage(page.text, companyName);
      const result = createHiringResult({
        ...verdict,
        careerPageUrl: careerUrl,
        detectionMethod: DetectionMethod.RENDERED_LLM,
      });
      if (result.isHiring) {
        logger.info(`Layer 3 success: ${result.detectionMethod}`, { companyName });
        return result;
      }
    }

    const titles = harvestJobTitles(page.html);
    if (titles.length > 0) {
      const verdict = await this.extractor.analyzeJobList(titles, companyName);
      const result = createHiringResult({
        ...verdict,
        careerPageUrl: careerUrl,
        detectionMethod: DetectionMethod.RENDERED_SELECTORS,
      });
      if (result.isHiring) {
        logger.info(`Layer 3 success: ${result.detectionMethod}`, { companyName });
        return result;
      }
    }

    return null;
  }

  /**
   * Layer 4: always terminal
   */
  private async tryRecovery(companyName: string, careerUrl: string): Promise<HiringResult> {
    // Plain GETs on ATS single-page shells carry no job content
    const lookup = await this.platforms.lookupUrl(careerUrl);
    if (lookup?.status === 'found') {
      const titles = postingTitles(lookup.postings);
      if (titles.length > 0) {
        logger.info(`Layer 4 ATS recovery: ${titles.length} jobs via ${lookup.platform} API`);
        return createHiringResult({
          isHiring: true,
          careerPageUrl: careerUrl,
          jobRoles: titles,
          hiringSummary: `Found ${titles.length} positions via ${lookup.platform} API`,
          detectionMethod: `${lookup.platform} API (Layer 4 recovery)`,
        });
      }
    }

    const page = await this.fetcher.fetchPlain(careerUrl);
    if (!page) {
      return failedResult('Could not access career page', careerUrl);
    }

    if (!this.extractor.isConfigured) {
      return failedResult('Mistral API key not configured', careerUrl);
    }

    const verdict = await this.extractor.analyzeCareerPage(page.text, companyName);
    const result = createHiringResult({
      ...verdict,
      careerPageUrl: careerUrl,
      detectionMethod: DetectionMethod.PLAIN_LLM,
    });
    logger.info(`Layer 4: LLM analysis found ${result.jobCount} jobs`, { companyName });
    return result;
  }
}
