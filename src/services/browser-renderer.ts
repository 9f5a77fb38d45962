import puppeteer, { Browser, TimeoutError } from 'puppeteer-core';
import chromium from '@sparticuz/chromium';
import pLimit from 'p-limit';
import { Config } from '../config';
import { randomUserAgent } from '../utils/http';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface BrowserRenderer {
  /**
   * Serialized DOM after JavaScript ran, or null when rendering failed
   */
  render(url: string, waitSelector?: string): Promise<string | null>;
}

type ExecutableSource =
  | { kind: 'serverless' }
  | { kind: 'local'; executablePath: string };

const NAVIGATION_TIMEOUT_MS = 30_000;
const SELECTOR_TIMEOUT_MS = 5_000;

/**
 * Headless Chromium renderer for JavaScript-only career pages
 *
 * Puppeteer talks to the browser subprocess asynchronously, so a render never
 * blocks the event loop; the pool caps how many browsers run at once,
 * independently of the per-company concurrency gate.
 */
export class PuppeteerRenderer implements BrowserRenderer {
  private readonly pool: ReturnType<typeof pLimit>;

  constructor(
    private readonly executable: ExecutableSource,
    maxConcurrentRenders: number
  ) {
    this.pool = pLimit(Math.max(1, maxConcurrentRenders));
  }

  render(url: string, waitSelector?: string): Promise<string | null> {
    return this.pool(() => this.renderPage(url, waitSelector));
  }

  private async renderPage(url: string, waitSelector?: string): Promise<string | null> {
    let browser: Browser | null = null;

    try {
      logger.info(`Launching browser for: ${url}`);
      browser = await this.launchBrowser();
      const page = await browser.newPage();

      await page.setViewport({ width: 1920, height: 1080 });
      await page.setUserAgent(randomUserAgent());

      try {
        await page.goto(url, {
          waitUntil: 'networkidle2',
          timeout: NAVIGATION_TIMEOUT_MS,
        });
      } catch (error) {
        if (!(error instanceof TimeoutError)) throw error;
        logger.warn(`Network never went idle, using partial render`, { url });
      }

      if (waitSelector) {
        try {
          await page.waitForSelector(waitSelector, { timeout: SELECTOR_TIMEOUT_MS });
        } catch (error) {
          logger.warn(`Selector ${waitSelector} not found`, { url, error: String(error) });
        }
      }

      const content = await page.content();
      logger.info(`Rendered ${content.length} characters`, { url });
      return content;
    } catch (error) {
      logger.error(`Browser render failed`, error, { url });
      return null;
    } finally {
      if (browser) {
        await browser.close().catch((error: unknown) => {
          logger.warn(`Failed to close browser`, { url, error: describeError(error) });
        });
      }
    }
  }

  private async launchBrowser(): Promise<Browser> {
    if (this.executable.kind === 'serverless') {
      // Use serverless-optimized Chromium
      return puppeteer.launch({
        args: chromium.args,
        executablePath: await chromium.executablePath(),
        headless: true,
      });
    }

    return puppeteer.launch({
      executablePath: this.executable.executablePath,
      headless: true,
      args: ['--no-sandbox', '--disable-setuid-sandbox'],
    });
  }
}

/**
 * Returns null when rendering is disabled or no browser is available;
 * page fetching then stays on plain HTTP
 */
export function createBrowserRenderer(config: Config): BrowserRenderer | null {
  if (!config.enableBrowserRender) {
    logger.info('Browser rendering disabled by configuration');
    return null;
  }

  const isServerless = process.env.VERCEL || process.env.AWS_LAMBDA_FUNCTION_NAME;
  if (isServerless) {
    return new PuppeteerRenderer({ kind: 'serverless' }, config.maxConcurrentRenders);
  }

  if (config.chromeExecutablePath) {
    return new PuppeteerRenderer(
      { kind: 'local', executablePath: config.chromeExecutablePath },
      config.maxConcurrentRenders
    );
  }

  logger.warn('No browser runtime available (set CHROME_EXECUTABLE_PATH), rendering disabled');
  return null;
}
