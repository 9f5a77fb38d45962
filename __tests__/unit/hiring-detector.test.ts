import { beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config';
import { createPlatformRegistry } from '../../src/platforms';
import { HiringDetector, createBatchService, createHiringDetector } from '../../src/services';
import { CareerPageLocator } from '../../src/services/career-page-locator';
import { ContentExtractor } from '../../src/services/content-extractor';
import { PageFetcher } from '../../src/services/page-fetcher';
import { SearchResult, WebSearchClient } from '../../src/services/search-client';
import { CareerPageCandidate, HiringResult } from '../../src/types/hiring';
import {
  FakeCompletionClient,
  FakeHttpClient,
  FakeRenderer,
  FakeSearchClient,
  longPage,
} from '../helpers/fakes';

const SITEMAP = '<urlset><url><loc>https://acme.io/</loc></url><url><loc>https://acme.io/careers</loc></url></urlset>';
const BACKDOOR_QUERY = 'site:greenhouse.io OR site:lever.co OR site:ashbyhq.com "acme"';

function expectConsistent(result: HiringResult): void {
  expect(result.jobCount).toBe(result.jobRoles.length);
  expect(result.jobRoles.length).toBeLessThanOrEqual(20);
  expect(result.isHiring).toBe(result.jobCount > 0);
}

describe('HiringDetector', () => {
  let http: FakeHttpClient;
  let search: FakeSearchClient;
  let renderer: FakeRenderer;

  beforeEach(() => {
    http = new FakeHttpClient();
    search = new FakeSearchClient();
    renderer = new FakeRenderer();
  });

  function detector(llm: FakeCompletionClient | null): HiringDetector {
    return createHiringDetector(loadConfig({}), { http, search, llm, renderer });
  }

  it('answers from the Greenhouse API without touching anything else', async () => {
    http.on('https://boards-api.greenhouse.io/v1/boards/acme/jobs', {
      body: {
        jobs: [
          { title: 'Backend Engineer', absolute_url: 'https://boards.greenhouse.io/acme/jobs/1' },
          { title: 'Product Designer', absolute_url: 'https://boards.greenhouse.io/acme/jobs/2' },
          { title: 'Recruiter', absolute_url: 'https://boards.greenhouse.io/acme/jobs/3' },
        ],
      },
    });
    const llm = new FakeCompletionClient();

    const result = await detector(llm).checkHiring('Acme', 'https://boards.greenhouse.io/acme');

    expect(result).toEqual({
      isHiring: true,
      careerPageUrl: 'https://boards.greenhouse.io/acme/jobs/1',
      jobRoles: ['Backend Engineer', 'Product Designer', 'Recruiter'],
      jobCount: 3,
      hiringSummary: 'Found 3 positions via Greenhouse',
      detectionMethod: 'Greenhouse API',
    });
    expect(http.requests).toHaveLength(1);
    expect(search.queries).toHaveLength(0);
    expect(renderer.calls).toHaveLength(0);
    expect(llm.calls).toHaveLength(0);
  });

  it('finds the career page through the sitemap and extracts roles with the LLM', async () => {
    http
      .on('https://acme.io/sitemap.xml', { body: SITEMAP })
      .on('https://acme.io/careers', {
        body: longPage('<h2>Backend Engineer</h2><h2>Product Designer</h2>'),
      });
    const llm = new FakeCompletionClient([
      '{"is_hiring": true, "job_roles": ["Backend Engineer", "Product Designer"], "hiring_summary": "Hiring engineers and designers"}',
    ]);

    const result = await detector(llm).checkHiring('Acme', 'https://acme.io');

    expect(result).toEqual({
      isHiring: true,
      careerPageUrl: 'https://acme.io/careers',
      jobRoles: ['Backend Engineer', 'Product Designer'],
      jobCount: 2,
      hiringSummary: 'Hiring engineers and designers',
      detectionMethod: 'Playwright + Mistral AI',
    });
    expect(search.queries).toEqual([BACKDOOR_QUERY]);
    expect(llm.calls[0].prompt).toContain('Backend Engineer');
  });

  it('short-circuits on an explicit "no open positions" page', async () => {
    http
      .on('https://acme.io/sitemap.xml', { body: SITEMAP })
      .on('https://acme.io/careers', {
        body: longPage('<p>There are no open positions right now.</p>'),
      });
    const llm = new FakeCompletionClient();

    const result = await detector(llm).checkHiring('Acme', 'https://acme.io');

    expect(result).toEqual({
      isHiring: false,
      careerPageUrl: 'https://acme.io/careers',
      jobRoles: [],
      jobCount: 0,
      hiringSummary: 'No open positions',
      detectionMethod: 'Playwright',
    });
    expect(llm.calls).toHaveLength(0);
  });

  it('reports when no career page exists', async () => {
    const llm = new FakeCompletionClient();

    const result = await detector(llm).checkHiring('Acme', 'https://acme.io');

    expect(result).toEqual({
      isHiring: false,
      careerPageUrl: null,
      jobRoles: [],
      jobCount: 0,
      hiringSummary: 'No career page found',
      detectionMethod: 'none',
    });
    expect(llm.calls).toHaveLength(0);
  });

  it('renders an Ashby board directly, skipping discovery', async () => {
    http.on('https://jobs.ashbyhq.com/acme', { body: '<div id="app"></div>' });
    renderer.on('https://jobs.ashbyhq.com/acme', '<div id="app"><h2>Staff Engineer</h2></div>');
    const llm = new FakeCompletionClient([
      '{"is_hiring": true, "job_roles": ["Staff Engineer"], "hiring_summary": "One opening"}',
    ]);

    const result = await detector(llm).checkHiring('Acme', 'https://acme.io');

    expect(result.detectionMethod).toBe('Playwright + Mistral AI');
    expect(result.careerPageUrl).toBe('https://jobs.ashbyhq.com/acme');
    expect(result.jobRoles).toEqual(['Staff Engineer']);
    expect(search.queries).toHaveLength(0);
    expect(renderer.calls).toEqual(['https://jobs.ashbyhq.com/acme']);
  });

  it('falls back to job title markup when the LLM sees no openings', async () => {
    http
      .on('https://acme.io/sitemap.xml', { body: SITEMAP })
      .on('https://acme.io/careers', {
        body: longPage('<ul><li class="job-title">Platform Engineer</li></ul>'),
      });
    const llm = new FakeCompletionClient([
      '{"is_hiring": false, "job_roles": [], "hiring_summary": "Unclear"}',
      '["Platform Engineer"]',
    ]);

    const result = await detector(llm).checkHiring('Acme', 'https://acme.io');

    expect(result).toEqual({
      isHiring: true,
      careerPageUrl: 'https://acme.io/careers',
      jobRoles: ['Platform Engineer'],
      jobCount: 1,
      hiringSummary: 'Found 1 open positions',
      detectionMethod: 'Playwright + DOM selectors',
    });
  });

  it('recovers postings from an ATS career URL in the last layer', async () => {
    search.on(BACKDOOR_QUERY, ['https://jobs.lever.co/acme-labs']);
    http.on('https://api.lever.co/v0/postings/acme-labs', {
      body: [
        { text: 'Backend Engineer', hostedUrl: 'https://jobs.lever.co/acme-labs/1' },
        { text: 'Support Lead', hostedUrl: 'https://jobs.lever.co/acme-labs/2' },
      ],
    });
    const llm = new FakeCompletionClient();

    const result = await detector(llm).checkHiring('Acme', 'https://acme.io');

    expect(result).toEqual({
      isHiring: true,
      careerPageUrl: 'https://jobs.lever.co/acme-labs',
      jobRoles: ['Backend Engineer', 'Support Lead'],
      jobCount: 2,
      hiringSummary: 'Found 2 positions via lever API',
      detectionMethod: 'lever API (Layer 4 recovery)',
    });
    expect(llm.calls).toHaveLength(0);
  });

  it('ends with a plain HTTP analysis when nothing else answers', async () => {
    http
      .on('https://acme.io/sitemap.xml', { body: SITEMAP })
      .on('https://acme.io/careers', { body: longPage('<p>Life at Acme</p>') });
    const llm = new FakeCompletionClient([
      '{"is_hiring": false, "job_roles": [], "hiring_summary": "No roles listed"}',
      '{"is_hiring": false, "job_roles": [], "hiring_summary": "No roles listed"}',
    ]);

    const result = await detector(llm).checkHiring('Acme', 'https://acme.io');

    expect(result).toEqual({
      isHiring: false,
      careerPageUrl: 'https://acme.io/careers',
      jobRoles: [],
      jobCount: 0,
      hiringSummary: 'No roles listed',
      detectionMethod: 'Mistral AI (basic HTTP)',
    });
    expect(llm.calls).toHaveLength(2);
  });

  it('fails when the career page cannot be reached', async () => {
    search.on('site:acme.io (careers OR jobs)', ['https://acme.io/careers']);

    const result = await detector(new FakeCompletionClient()).checkHiring('Acme', 'https://acme.io');

    expect(result.detectionMethod).toBe('failed');
    expect(result.hiringSummary).toBe('Could not access career page');
    expect(result.careerPageUrl).toBe('https://acme.io/careers');
  });

  it('fails without an LLM when the page has no recognizable roles', async () => {
    http
      .on('https://acme.io/sitemap.xml', { body: SITEMAP })
      .on('https://acme.io/careers', { body: longPage('<p>Life at Acme</p>') });

    const result = await detector(null).checkHiring('Acme', 'https://acme.io');

    expect(result.detectionMethod).toBe('failed');
    expect(result.hiringSummary).toBe('Mistral API key not configured');
    expectConsistent(result);
  });

  it('falls back to probing when search errors out', async () => {
    const brokenSearch: WebSearchClient = {
      search: async (): Promise<SearchResult[]> => {
        throw new Error('ECONNRESET');
      },
    };
    http
      .on('https://acme.io/careers', { status: 200 }, 'HEAD')
      .on('https://acme.io/careers', { body: longPage('<p>We have no current openings.</p>') });
    const withBrokenSearch = createHiringDetector(loadConfig({}), {
      http,
      search: brokenSearch,
      llm: null,
      renderer,
    });

    const result = await withBrokenSearch.checkHiring('Acme', 'https://acme.io');

    expect(result).toEqual({
      isHiring: false,
      careerPageUrl: 'https://acme.io/careers',
      jobRoles: [],
      jobCount: 0,
      hiringSummary: 'No open positions',
      detectionMethod: 'Playwright',
    });
  });

  describe('unexpected errors', () => {
    class FlakyLocator extends CareerPageLocator {
      attempts = 0;

      constructor(private failures: number) {
        super(new FakeSearchClient(), new FakeHttpClient());
      }

      async locate(): Promise<CareerPageCandidate | null> {
        this.attempts++;
        if (this.failures > 0) {
          this.failures--;
          throw new Error('ECONNRESET');
        }
        return { url: 'https://acme.io/careers', method: 'Pattern_Probe' };
      }
    }

    function withLocator(locator: CareerPageLocator): HiringDetector {
      return new HiringDetector(
        createPlatformRegistry(loadConfig({}), http),
        locator,
        new PageFetcher(http, renderer),
        new ContentExtractor(null)
      );
    }

    beforeEach(() => {
      http.on('https://acme.io/careers', { body: longPage('<p>There are no open positions.</p>') });
    });

    it('checkHiring turns them into failed results', async () => {
      const result = await withLocator(new FlakyLocator(1)).checkHiring('Acme', 'https://acme.io');

      expect(result).toEqual({
        isHiring: false,
        careerPageUrl: null,
        jobRoles: [],
        jobCount: 0,
        hiringSummary: 'Error: ECONNRESET',
        detectionMethod: 'failed',
      });
    });

    it('detect lets them through', async () => {
      await expect(withLocator(new FlakyLocator(1)).detect('Acme', 'https://acme.io')).rejects.toThrow(
        'ECONNRESET'
      );
    });

    it('are retried by the batch service', async () => {
      const locator = new FlakyLocator(1);
      const config = loadConfig({ RETRY_BASE_DELAY_MS: '0' });
      const batch = createBatchService(config, withLocator(locator), null);

      const report = await batch.checkCompanies([{ companyName: 'Acme', website: 'https://acme.io' }]);

      expect(locator.attempts).toBe(2);
      expect(report.results[0].result).toEqual({
        isHiring: false,
        careerPageUrl: 'https://acme.io/careers',
        jobRoles: [],
        jobCount: 0,
        hiringSummary: 'No open positions',
        detectionMethod: 'Playwright',
      });
    });
  });
});
