/**
 * Hiring detection schema
 * Every pipeline layer is normalized to HiringResult
 */

export type PlatformId = 'greenhouse' | 'lever' | 'ashby' | 'workable';

/**
 * A single posting returned by an ATS public API
 */
export interface JobPosting {
  title: string;
  location?: string;
  department?: string;
  url?: string;
  platform: string;
}

export type DiscoveryMethod =
  | 'ATS_Backdoor'
  | 'Sitemap_Discovery'
  | 'Google_Organic'
  | 'Pattern_Probe'
  | 'Homepage_Link'
  | 'none';

export interface CareerPageCandidate {
  url: string;
  method: DiscoveryMethod;
}

/**
 * Final answer for one company
 * jobCount always equals jobRoles.length
 */
export interface HiringResult {
  readonly isHiring: boolean;
  readonly careerPageUrl: string | null;
  readonly jobRoles: readonly string[];
  readonly jobCount: number;
  readonly hiringSummary: string;
  readonly detectionMethod: string;
}

/**
 * Structured judgement produced by the LLM extraction step
 */
export interface HiringVerdict {
  isHiring: boolean;
  jobRoles: string[];
  hiringSummary: string;
}

export interface CompanyInput {
  companyName: string;
  website: string;
  companyId?: number;
}

export interface CompanyHiringResult extends CompanyInput {
  result: HiringResult;
  cached: boolean;
}

export interface HiringBatchReport {
  totalCompanies: number;
  hiringCompanies: number;
  results: CompanyHiringResult[];
}
