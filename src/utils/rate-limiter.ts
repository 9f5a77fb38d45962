import { logger } from './logger';
import { sleep } from './retry';

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

/**
 * Process-wide requests-per-minute gate for LLM calls
 *
 * One shared lastGrantAt timestamp; callers queue on a promise chain so that
 * concurrent acquire() calls are granted one at a time, 60000/rpm ms apart.
 * Construct once and pass the same instance to every client that needs it.
 */
export class RateLimiter {
  readonly intervalMs: number;
  private lastGrantAt = Number.NEGATIVE_INFINITY;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly requestsPerMinute: number,
    private readonly clock: Clock = systemClock
  ) {
    this.intervalMs = 60_000 / Math.max(1, requestsPerMinute);
    logger.info(`Rate limiter initialized: ${requestsPerMinute} RPM`, {
      intervalMs: Math.round(this.intervalMs),
    });
  }

  acquire(): Promise<void> {
    const grant = this.tail.then(() => this.waitForSlot());
    this.tail = grant.catch(error => {
      logger.error('Rate limiter wait failed', error);
    });
    return grant;
  }

  private async waitForSlot(): Promise<void> {
    const elapsed = this.clock.now() - this.lastGrantAt;
    if (elapsed < this.intervalMs) {
      const waitMs = this.intervalMs - elapsed;
      logger.debug(`Rate limit: waiting ${Math.round(waitMs)}ms`);
      await this.clock.sleep(waitMs);
    }
    this.lastGrantAt = this.clock.now();
  }
}
