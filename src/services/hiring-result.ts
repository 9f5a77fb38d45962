import { MAX_JOB_ROLES, MAX_SUMMARY_LENGTH } from './content-extractor';
import { HiringResult } from '../types/hiring';

export interface HiringResultInput {
  isHiring: boolean;
  careerPageUrl: string | null;
  jobRoles: readonly string[];
  hiringSummary: string;
  detectionMethod: string;
}

/**
 * Single construction point for pipeline answers
 *
 * Roles are trimmed, de-duplicated in order and capped; a result is only
 * hiring when at least one role survives, and a non-hiring result carries none.
 */
export function createHiringResult(input: HiringResultInput): HiringResult {
  const roles = [
    ...new Set(input.jobRoles.map(role => role.trim()).filter(role => role.length > 0)),
  ].slice(0, MAX_JOB_ROLES);

  const isHiring = input.isHiring && roles.length > 0;
  const jobRoles = isHiring ? roles : [];

  return Object.freeze({
    isHiring,
    careerPageUrl: input.careerPageUrl,
    jobRoles: Object.freeze(jobRoles),
    jobCount: jobRoles.length,
    hiringSummary: input.hiringSummary.slice(0, MAX_SUMMARY_LENGTH),
    detectionMethod: input.detectionMethod,
  });
}

export function failedResult(summary: string, careerPageUrl: string | null = null): HiringResult {
  return createHiringResult({
    isHiring: false,
    careerPageUrl,
    jobRoles: [],
    hiringSummary: summary,
    detectionMethod: 'failed',
  });
}
