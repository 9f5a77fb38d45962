import { describe, expect, it } from 'vitest';
import { createHiringResult, failedResult } from '../../src/services/hiring-result';

describe('createHiringResult', () => {
  it('trims, de-duplicates and counts roles', () => {
    const result = createHiringResult({
      isHiring: true,
      careerPageUrl: 'https://acme.io/careers',
      jobRoles: [' Designer ', 'Designer', '', 'Backend Engineer'],
      hiringSummary: 'Hiring',
      detectionMethod: 'Playwright + Mistral AI',
    });

    expect(result.jobRoles).toEqual(['Designer', 'Backend Engineer']);
    expect(result.jobCount).toBe(2);
    expect(result.isHiring).toBe(true);
  });

  it('caps roles at twenty and the summary at 200 characters', () => {
    const result = createHiringResult({
      isHiring: true,
      careerPageUrl: null,
      jobRoles: Array.from({ length: 30 }, (_, i) => `Role ${i}`),
      hiringSummary: 'a'.repeat(300),
      detectionMethod: 'Greenhouse API',
    });

    expect(result.jobCount).toBe(20);
    expect(result.hiringSummary).toHaveLength(200);
  });

  it('is not hiring without roles', () => {
    const result = createHiringResult({
      isHiring: true,
      careerPageUrl: 'https://acme.io/careers',
      jobRoles: [],
      hiringSummary: 'Maybe hiring',
      detectionMethod: 'Mistral AI (basic HTTP)',
    });

    expect(result.isHiring).toBe(false);
    expect(result.jobCount).toBe(0);
  });

  it('drops roles from negative answers', () => {
    const result = createHiringResult({
      isHiring: false,
      careerPageUrl: 'https://acme.io/careers',
      jobRoles: ['Designer'],
      hiringSummary: 'Positions closed',
      detectionMethod: 'Mistral AI (basic HTTP)',
    });

    expect(result.jobRoles).toEqual([]);
    expect(result.jobCount).toBe(0);
  });

  it('is immutable', () => {
    const result = failedResult('Could not access career page', 'https://acme.io/careers');

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.jobRoles)).toBe(true);
    expect(result).toEqual({
      isHiring: false,
      careerPageUrl: 'https://acme.io/careers',
      jobRoles: [],
      jobCount: 0,
      hiringSummary: 'Could not access career page',
      detectionMethod: 'failed',
    });
  });
});
