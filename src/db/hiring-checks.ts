import { z } from 'zod';
import { Queryable } from './client';
import { createHiringResult } from '../services/hiring-result';
import { CompanyInput, HiringResult } from '../types/hiring';
import { generateCompanyKey } from '../utils/hash';
import { logger } from '../utils/logger';

/**
 * Where finished hiring checks are kept between runs
 */
export interface HiringCheckStore {
  /**
   * Latest non-failed check younger than maxAgeHours
   */
  findRecent(website: string, maxAgeHours: number): Promise<HiringResult | null>;
  save(company: CompanyInput, result: HiringResult): Promise<void>;
}

const hiringCheckRowSchema = z.object({
  is_hiring: z.boolean(),
  career_page_url: z.string().nullable(),
  job_roles: z.array(z.string()),
  hiring_summary: z.string(),
  detection_method: z.string(),
});

/**
 * Database operations for hiring checks
 * One row per company, replaced on every new check
 */
export class PgHiringCheckStore implements HiringCheckStore {
  constructor(private readonly db: Queryable) {}

  async findRecent(website: string, maxAgeHours: number): Promise<HiringResult | null> {
    const companyKey = generateCompanyKey(website);

    const result = await this.db.query(
      `SELECT is_hiring, career_page_url, job_roles, hiring_summary, detection_method
      FROM hiring_checks
      WHERE company_key = $1
        AND detection_method <> 'failed'
        AND checked_at >= NOW() - ($2::float8 * INTERVAL '1 hour')`,
      [companyKey, maxAgeHours]
    );

    if (result.rows.length === 0) {
      return null;
    }

    const row = hiringCheckRowSchema.safeParse(result.rows[0]);
    if (!row.success) {
      logger.warn('Ignoring malformed hiring_checks row', { companyKey, reason: row.error.message });
      return null;
    }

    return createHiringResult({
      isHiring: row.data.is_hiring,
      careerPageUrl: row.data.career_page_url,
      jobRoles: row.data.job_roles,
      hiringSummary: row.data.hiring_summary,
      detectionMethod: row.data.detection_method,
    });
  }

  async save(company: CompanyInput, result: HiringResult): Promise<void> {
    const companyKey = generateCompanyKey(company.website);

    try {
      await this.db.query(
        `INSERT INTO hiring_checks (
          company_key, company_id, company_name, website, is_hiring,
          career_page_url, job_roles, job_count, hiring_summary, detection_method, checked_at
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, NOW())
        ON CONFLICT (company_key) DO UPDATE SET
          company_id = EXCLUDED.company_id,
          company_name = EXCLUDED.company_name,
          website = EXCLUDED.website,
          is_hiring = EXCLUDED.is_hiring,
          career_page_url = EXCLUDED.career_page_url,
          job_roles = EXCLUDED.job_roles,
          job_count = EXCLUDED.job_count,
          hiring_summary = EXCLUDED.hiring_summary,
          detection_method = EXCLUDED.detection_method,
          checked_at = NOW()`,
        [
          companyKey,
          company.companyId ?? null,
          company.companyName,
          company.website,
          result.isHiring,
          result.careerPageUrl,
          [...result.jobRoles],
          result.jobCount,
          result.hiringSummary,
          result.detectionMethod,
        ]
      );
    } catch (error) {
      logger.error(`Error saving hiring check`, error, { companyKey, company: company.companyName });
      throw error;
    }
  }
}
