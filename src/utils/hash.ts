import { createHash } from 'crypto';
import { cleanDomain } from './url';

/**
 * Deterministic storage key for a company, derived from its cleaned domain
 * so that "https://www.acme.io/" and "acme.io" share one record
 */
export function generateCompanyKey(website: string): string {
  return createHash('sha256').update(cleanDomain(website).toLowerCase()).digest('hex');
}
