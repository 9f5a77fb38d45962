import { AtsPlatform } from './base';
import { GreenhousePlatform } from './greenhouse';
import { LeverPlatform } from './lever';
import { AshbyPlatform } from './ashby';
import { WorkablePlatform } from './workable';
import { PlatformRegistry } from './registry';
import { Config } from '../config';
import { HttpClient } from '../utils/http';

export { PlatformRegistry, detectPlatform, extractCompanyToken } from './registry';
export type { AtsPlatform, PlatformHit, PlatformLookup } from './base';

/**
 * Factory function to create enabled ATS platforms based on configuration
 */
export function createPlatforms(config: Config, http: HttpClient): AtsPlatform[] {
  const platforms: AtsPlatform[] = [];

  if (config.enableGreenhouse) {
    platforms.push(new GreenhousePlatform(http));
  }

  if (config.enableLever) {
    platforms.push(new LeverPlatform(http));
  }

  if (config.enableAshby) {
    platforms.push(new AshbyPlatform(http));
  }

  // Workable is never probed by token, only used for recognized Workable URLs
  platforms.push(new WorkablePlatform(http));

  return platforms;
}

export function createPlatformRegistry(config: Config, http: HttpClient): PlatformRegistry {
  return new PlatformRegistry(createPlatforms(config, http));
}
