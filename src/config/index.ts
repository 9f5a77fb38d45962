/**
 * Configuration management
 * All behavior is driven by environment variables; nothing is required
 * up front, missing keys degrade the matching component instead
 */

export interface Config {
  // Mistral
  mistral: {
    apiKey: string | null;
    model: string;
    rateLimitRpm: number;
  };

  // Serper
  serperApiKey: string | null;

  // Concurrency & retries
  maxConcurrentRequests: number;
  maxConcurrentRenders: number;
  retryMaxAttempts: number;
  retryBackoffMultiplier: number;
  retryBaseDelayMs: number;

  // Browser rendering
  enableBrowserRender: boolean;
  chromeExecutablePath: string | null;

  // Platform Toggles
  enableGreenhouse: boolean;
  enableLever: boolean;
  enableAshby: boolean;

  // Storage
  databaseUrl: string | null;
  hiringCacheHours: number;

  // API
  apiSecret: string | null;
}

export type Env = Record<string, string | undefined>;

export function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function optional(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    mistral: {
      apiKey: optional(env.MISTRAL_API_KEY),
      model: env.MISTRAL_MODEL || 'mistral-large-latest',
      rateLimitRpm: parseNumber(env.MISTRAL_RATE_LIMIT_RPM, 60),
    },
    serperApiKey: optional(env.SERPER_API_KEY),
    maxConcurrentRequests: parseNumber(env.MAX_CONCURRENT_REQUESTS, 10),
    maxConcurrentRenders: parseNumber(env.MAX_CONCURRENT_RENDERS, 2),
    retryMaxAttempts: parseNumber(env.RETRY_MAX_ATTEMPTS, 3),
    retryBackoffMultiplier: parseNumber(env.RETRY_BACKOFF_MULTIPLIER, 2),
    retryBaseDelayMs: parseNumber(env.RETRY_BASE_DELAY_MS, 1000),
    enableBrowserRender: parseBoolean(env.ENABLE_BROWSER_RENDER, true),
    chromeExecutablePath: optional(env.CHROME_EXECUTABLE_PATH),
    enableGreenhouse: parseBoolean(env.ENABLE_GREENHOUSE, true),
    enableLever: parseBoolean(env.ENABLE_LEVER, true),
    enableAshby: parseBoolean(env.ENABLE_ASHBY, true),
    databaseUrl: optional(env.DATABASE_URL),
    hiringCacheHours: parseNumber(env.HIRING_CACHE_HOURS, 24),
    apiSecret: optional(env.API_SECRET),
  };
}
