import { describeError } from './errors';
import { logger } from './logger';

export interface RetryOptions {
  attempts: number;
  multiplier: number;
  baseDelayMs: number;
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Runs fn until it resolves or the attempts are used up
 * Delays grow as baseDelayMs * multiplier^(attempt - 1); the last error is rethrown
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, options.attempts);
  let delay = options.baseDelayMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      logger.warn(`Attempt ${attempt}/${attempts} failed`, {
        label: options.label,
        error: describeError(error),
      });

      if (attempt < attempts) {
        await wait(delay);
        delay *= options.multiplier;
      }
    }
  }

  logger.error(`All ${attempts} attempts exhausted`, lastError, { label: options.label });
  throw lastError;
}
