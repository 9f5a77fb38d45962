import { loadConfig } from '../config';
import { createHiringDetector } from '../services';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Runs the detection pipeline for one company and prints the result
 *
 * Usage: npm run check-hiring -- "Acme" https://acme.io
 */
async function main(): Promise<void> {
  const [companyName, website] = process.argv.slice(2);
  if (!companyName || !website) {
    console.error('Usage: check-hiring <company name> <website>');
    process.exitCode = 1;
    return;
  }

  try {
    const detector = createHiringDetector(loadConfig());
    const result = await detector.checkHiring(companyName, website);

    console.log(
      JSON.stringify(
        {
          company_name: companyName,
          is_hiring: result.isHiring,
          job_count: result.jobCount,
          job_roles: result.jobRoles,
          career_page_url: result.careerPageUrl,
          hiring_summary: result.hiringSummary,
          detection_method: result.detectionMethod,
        },
        null,
        2
      )
    );
  } catch (error) {
    logger.error('Hiring check failed', error);
    console.error(describeError(error));
    process.exitCode = 1;
  }
}

void main();
