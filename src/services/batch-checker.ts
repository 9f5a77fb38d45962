import pLimit from 'p-limit';
import { DetectionMethod } from './hiring-detector';
import { failedResult } from './hiring-result';
import { HiringCheckStore } from '../db/hiring-checks';
import {
  CompanyHiringResult,
  CompanyInput,
  HiringBatchReport,
  HiringResult,
} from '../types/hiring';
import { describeError } from '../utils/errors';
import { RetryOptions, withRetry } from '../utils/retry';
import { logger } from '../utils/logger';

/**
 * A check that throws on unexpected errors so the batch can retry it
 */
export interface HiringChecker {
  detect(companyName: string, website: string): Promise<HiringResult>;
}

export interface BatchOptions {
  maxConcurrent: number;
  retry: Omit<RetryOptions, 'label'>;
  cacheHours: number;
}

/**
 * Runs hiring checks for many companies behind a concurrency gate
 */
export class HiringBatchService {
  private readonly gate: ReturnType<typeof pLimit>;

  constructor(
    private readonly checker: HiringChecker,
    private readonly store: HiringCheckStore | null,
    private readonly options: BatchOptions
  ) {
    this.gate = pLimit(Math.max(1, options.maxConcurrent));
  }

  async checkCompany(company: CompanyInput): Promise<CompanyHiringResult> {
    const cached = await this.findCached(company);
    if (cached) {
      logger.info(`Using cached hiring check for ${company.companyName}`);
      return { ...company, result: cached, cached: true };
    }

    let result: HiringResult;
    try {
      result = await withRetry(
        () => this.checker.detect(company.companyName, company.website),
        { ...this.options.retry, label: company.companyName }
      );
    } catch (error) {
      result = failedResult(`Error: ${describeError(error)}`);
    }

    await this.saveResult(company, result);
    return { ...company, result, cached: false };
  }

  /**
   * Results keep the input order; onResult fires as each company finishes
   */
  async checkCompanies(
    companies: CompanyInput[],
    onResult?: (result: CompanyHiringResult) => void
  ): Promise<HiringBatchReport> {
    logger.info(`Checking hiring for ${companies.length} companies`, {
      maxConcurrent: this.options.maxConcurrent,
    });

    const results = await Promise.all(
      companies.map(company =>
        this.gate(async () => {
          const result = await this.checkCompany(company);
          onResult?.(result);
          return result;
        })
      )
    );

    const hiringCompanies = results.filter(entry => entry.result.isHiring).length;
    logger.info(`Hiring check complete`, { total: results.length, hiring: hiringCompanies });

    return {
      totalCompanies: results.length,
      hiringCompanies,
      results,
    };
  }

  private async findCached(company: CompanyInput): Promise<HiringResult | null> {
    if (!this.store || this.options.cacheHours <= 0) return null;

    try {
      const cached = await this.store.findRecent(company.website, this.options.cacheHours);
      // A failure only speaks for the run that produced it
      return cached?.detectionMethod === DetectionMethod.FAILED ? null : cached;
    } catch (error) {
      logger.error('Failed to read cached hiring check', error, { company: company.companyName });
      return null;
    }
  }

  private async saveResult(company: CompanyInput, result: HiringResult): Promise<void> {
    if (!this.store) return;

    try {
      await this.store.save(company, result);
    } catch (error) {
      logger.error('Failed to store hiring check', error, { company: company.companyName });
    }
  }
}
