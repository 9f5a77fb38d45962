import * as cheerio from 'cheerio';
import { z } from 'zod';
import { CompletionClient } from './llm-client';
import { HiringVerdict } from '../types/hiring';
import { Outcome, failure, success } from '../types/result';
import { describeError } from '../utils/errors';
import { logger, preview } from '../utils/logger';

export const MAX_JOB_ROLES = 20;
export const MAX_SUMMARY_LENGTH = 200;
const MAX_PAGE_TEXT = 10_000;

const PARSE_ERROR_SUMMARY = 'Error: Could not parse AI response';

const verdictSchema = z.object({
  is_hiring: z.boolean().default(false),
  job_roles: z.array(z.string()).default([]),
  hiring_summary: z.string().default(''),
});

const jobListSchema = z.array(z.string());

const TITLE_TAGS = ['h2', 'h3', 'h4', 'a', 'div', 'li'];
const TITLE_SELECTORS = [
  '.job-title',
  '.job-listing',
  '.position-title',
  '.opening-title',
  '.career-title',
  '[data-job-title]',
  '[data-position]',
];

/**
 * Removes a surrounding Markdown code fence, with or without a language tag
 */
export function stripCodeFence(raw: string): string {
  const text = raw.trim();
  const fenced = /```[\w-]*[^\S\n]*\n?([\s\S]*?)```/.exec(text);
  if (fenced) return fenced[1].trim();
  // Unterminated fence
  return text.replace(/^```[\w-]*[^\S\n]*\n?/, '').trim();
}

function parseJson<S extends z.ZodTypeAny>(raw: string, schema: S): Outcome<z.output<S>> {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(raw));
  } catch (error) {
    return failure(`Invalid JSON: ${describeError(error)}`);
  }

  const parsed = schema.safeParse(data);
  return parsed.success ? success(parsed.data) : failure(parsed.error.message);
}

/**
 * Visible-text heuristics for job titles on a career page
 */
export function harvestJobTitles(html: string): string[] {
  const $ = cheerio.load(html);
  const titles: string[] = [];

  for (const selector of TITLE_SELECTORS) {
    $(TITLE_TAGS.map(tag => `${tag}${selector}`).join(', ')).each((_, element) => {
      const text = $(element).text().replace(/\s+/g, ' ').trim();
      if (text.length > 5 && text.length < 100) {
        titles.push(text);
      }
    });
  }

  const unique = [...new Set(titles)];
  logger.info(`Extracted ${unique.length} potential job titles from HTML`);
  return unique;
}

/**
 * Turns career page text into a structured hiring verdict with the LLM
 * Never throws; failures come back as negative verdicts with an "Error:" summary
 */
export class ContentExtractor {
  constructor(private readonly llm: CompletionClient | null) {}

  get isConfigured(): boolean {
    return this.llm !== null;
  }

  async analyzeCareerPage(text: string, companyName: string): Promise<HiringVerdict> {
    if (!this.llm) {
      return { isHiring: false, jobRoles: [], hiringSummary: 'Error: LLM not configured' };
    }

    const prompt = `Analyze this career page content from ${companyName} and extract job information.

Content:
${text.slice(0, MAX_PAGE_TEXT)}

Extract:
1. is_hiring: Are they currently hiring? (true/false)
2. job_roles: List of specific job titles/roles (array of strings)
3. hiring_summary: Brief summary of hiring status (string, max ${MAX_SUMMARY_LENGTH} chars)

Return ONLY valid JSON in this exact format, with no other text:
{
  "is_hiring": true/false,
  "job_roles": ["Job Title 1", "Job Title 2", ...],
  "hiring_summary": "brief summary here"
}

Important:
- Only include REAL job titles you find
- If you see "No open positions" or similar, set is_hiring to false
- Be specific with job titles (e.g., "Senior Software Engineer" not just "Engineer")
- Include up to ${MAX_JOB_ROLES} job titles maximum`;

    let raw: string;
    try {
      raw = await this.llm.complete(prompt, {
        temperature: 0.1,
        maxTokens: 1000,
        promptName: 'analyze_career_page',
      });
    } catch (error) {
      logger.error('Career page analysis failed', error, { companyName });
      return { isHiring: false, jobRoles: [], hiringSummary: `Error: ${describeError(error)}` };
    }

    const parsed = parseJson(raw, verdictSchema);
    if (!parsed.ok) {
      logger.error('LLM returned an unusable verdict', undefined, {
        companyName,
        reason: parsed.error,
        response: preview(raw),
      });
      return { isHiring: false, jobRoles: [], hiringSummary: PARSE_ERROR_SUMMARY };
    }

    logger.info(`LLM analysis: ${parsed.value.job_roles.length} jobs found`, { companyName });
    return {
      isHiring: parsed.value.is_hiring,
      jobRoles: parsed.value.job_roles.slice(0, MAX_JOB_ROLES),
      hiringSummary: parsed.value.hiring_summary.slice(0, MAX_SUMMARY_LENGTH),
    };
  }

  /**
   * Cleans scraped titles with the LLM; without it the raw titles are kept
   */
  async analyzeJobList(titles: string[], companyName: string): Promise<HiringVerdict> {
    if (titles.length === 0) {
      return { isHiring: false, jobRoles: [], hiringSummary: 'No jobs found' };
    }

    const rawFallback: HiringVerdict = {
      isHiring: true,
      jobRoles: titles.slice(0, MAX_JOB_ROLES),
      hiringSummary: `Found ${titles.length} potential positions`,
    };

    if (!this.llm) {
      return rawFallback;
    }

    const prompt = `Given these potential job titles from ${companyName}, clean and filter them.

Raw titles:
${JSON.stringify(titles)}

Tasks:
1. Remove duplicates
2. Remove non-job entries (like "About Us", "FAQ", etc.)
3. Standardize formatting
4. Keep only real job titles

Return ONLY a JSON array of cleaned job titles:
["Job Title 1", "Job Title 2", ...]`;

    try {
      const raw = await this.llm.complete(prompt, {
        temperature: 0.1,
        maxTokens: 500,
        promptName: 'analyze_job_list',
      });

      const parsed = parseJson(raw, jobListSchema);
      if (!parsed.ok) {
        logger.warn('Job list analysis returned unusable output', {
          companyName,
          reason: parsed.error,
          response: preview(raw),
        });
        return rawFallback;
      }

      return {
        isHiring: parsed.value.length > 0,
        jobRoles: parsed.value.slice(0, MAX_JOB_ROLES),
        hiringSummary: `Found ${parsed.value.length} open positions`,
      };
    } catch (error) {
      logger.error('Job list analysis failed', error, { companyName });
      return rawFallback;
    }
  }
}
