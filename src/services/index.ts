import { HiringBatchService } from './batch-checker';
import { BrowserRenderer, createBrowserRenderer } from './browser-renderer';
import { CareerPageLocator } from './career-page-locator';
import { ContentExtractor } from './content-extractor';
import { HiringDetector } from './hiring-detector';
import { CompletionClient, MistralClient } from './llm-client';
import { PageFetcher } from './page-fetcher';
import { SerperSearchClient, WebSearchClient } from './search-client';
import { Config } from '../config';
import { getPool } from '../db/client';
import { HiringCheckStore, PgHiringCheckStore } from '../db/hiring-checks';
import { createPlatformRegistry } from '../platforms';
import { ConfigurationError } from '../utils/errors';
import { HttpClient, NodeFetchHttpClient } from '../utils/http';
import { RateLimiter } from '../utils/rate-limiter';
import { logger } from '../utils/logger';

export { HiringDetector, DetectionMethod } from './hiring-detector';
export { HiringBatchService } from './batch-checker';
export type { HiringChecker, BatchOptions } from './batch-checker';

/**
 * Collaborators that can be swapped out, mostly for tests
 * Anything left out is built from the configuration
 */
export interface DetectorDependencies {
  http?: HttpClient;
  search?: WebSearchClient;
  llm?: CompletionClient | null;
  renderer?: BrowserRenderer | null;
}

function createCompletionClient(config: Config, http: HttpClient): CompletionClient | null {
  if (!config.mistral.apiKey) {
    logger.warn('MISTRAL_API_KEY not configured, LLM extraction disabled');
    return null;
  }

  const client = new MistralClient(
    http,
    config.mistral.apiKey,
    config.mistral.model,
    new RateLimiter(config.mistral.rateLimitRpm)
  );
  logger.info(`LLM extraction enabled`, {
    model: client.getModelName(),
    rateLimitRpm: config.mistral.rateLimitRpm,
  });
  return client;
}

export function createHiringDetector(
  config: Config,
  deps: DetectorDependencies = {}
): HiringDetector {
  const anyPlatformEnabled = config.enableGreenhouse || config.enableLever || config.enableAshby;
  if (!config.mistral.apiKey && deps.llm == null && !anyPlatformEnabled) {
    throw new ConfigurationError(
      'No LLM key configured and every ATS platform is disabled; no company can ever be detected as hiring'
    );
  }

  const http = deps.http ?? new NodeFetchHttpClient();
  const search = deps.search ?? new SerperSearchClient(http, config.serperApiKey);
  const llm = deps.llm !== undefined ? deps.llm : createCompletionClient(config, http);
  const renderer = deps.renderer !== undefined ? deps.renderer : createBrowserRenderer(config);

  return new HiringDetector(
    createPlatformRegistry(config, http),
    new CareerPageLocator(search, http),
    new PageFetcher(http, renderer),
    new ContentExtractor(llm)
  );
}

export function createHiringCheckStore(config: Config): HiringCheckStore | null {
  if (!config.databaseUrl) {
    logger.info('DATABASE_URL not set, hiring checks are not stored');
    return null;
  }
  return new PgHiringCheckStore(getPool(config.databaseUrl));
}

export function createBatchService(
  config: Config,
  detector: HiringDetector = createHiringDetector(config),
  store: HiringCheckStore | null = createHiringCheckStore(config)
): HiringBatchService {
  return new HiringBatchService(detector, store, {
    maxConcurrent: config.maxConcurrentRequests,
    retry: {
      attempts: config.retryMaxAttempts,
      multiplier: config.retryBackoffMultiplier,
      baseDelayMs: config.retryBaseDelayMs,
    },
    cacheHours: config.hiringCacheHours,
  });
}
