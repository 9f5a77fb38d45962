import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import { loadConfig } from '../src/config';
import { createBatchService, HiringBatchService } from '../src/services';
import { CompanyHiringResult } from '../src/types/hiring';
import { describeError } from '../src/utils/errors';
import { logger } from '../src/utils/logger';

export interface HandlerRequest {
  method?: string;
  headers: { authorization?: string };
  body: unknown;
}

export interface HandlerResponse {
  status(code: number): HandlerResponse;
  json(body: unknown): unknown;
}

export type BatchRunner = Pick<HiringBatchService, 'checkCompanies'>;

export interface HiringHandlerOptions {
  apiSecret: string | null;
  getRunner: () => BatchRunner;
}

export const MAX_COMPANIES_PER_REQUEST = 100;

const hiringRequestSchema = z.object({
  companies: z
    .array(
      z.object({
        company_name: z.string().trim().min(1),
        website: z.string().trim().min(1),
        company_id: z.number().int().nullish(),
      })
    )
    .min(1)
    .max(MAX_COMPANIES_PER_REQUEST),
});

function toWire(entry: CompanyHiringResult) {
  return {
    company_id: entry.companyId ?? null,
    company_name: entry.companyName,
    is_hiring: entry.result.isHiring,
    job_count: entry.result.jobCount,
    job_roles: [...entry.result.jobRoles],
    career_page_url: entry.result.careerPageUrl,
    hiring_summary: entry.result.hiringSummary,
    detection_method: entry.result.detectionMethod,
  };
}

export function createHiringHandler(options: HiringHandlerOptions) {
  return async function hiringHandler(req: HandlerRequest, res: HandlerResponse): Promise<void> {
    if (req.method !== 'POST') {
      res.status(405).json({ error: 'Method not allowed' });
      return;
    }

    const authHeader = req.headers.authorization;
    if (options.apiSecret && authHeader !== `Bearer ${options.apiSecret}`) {
      logger.warn('Unauthorized hiring request', { authHeader: authHeader ? 'present' : 'missing' });
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    const parsed = hiringRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid request body',
        details: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
      return;
    }

    const startTime = Date.now();
    try {
      const report = await options.getRunner().checkCompanies(
        parsed.data.companies.map(company => ({
          companyName: company.company_name,
          website: company.website,
          companyId: company.company_id ?? undefined,
        }))
      );

      logger.info('Hiring check request completed', {
        total: report.totalCompanies,
        hiring: report.hiringCompanies,
        duration: `${Date.now() - startTime}ms`,
      });

      res.status(200).json({
        success: true,
        total_companies: report.totalCompanies,
        hiring_companies: report.hiringCompanies,
        results: report.results.map(toWire),
      });
    } catch (error) {
      logger.error('Hiring check request failed', error);
      res.status(500).json({ success: false, error: describeError(error) });
    }
  };
}

let runner: BatchRunner | null = null;

/**
 * Batch hiring check endpoint
 * Secured with API_SECRET when it is set
 */
export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  const config = loadConfig();
  const hiringHandler = createHiringHandler({
    apiSecret: config.apiSecret,
    getRunner: () => {
      if (!runner) {
        runner = createBatchService(config);
      }
      return runner;
    },
  });
  await hiringHandler(req, res);
}
