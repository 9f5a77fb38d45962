/**
 * Database schema, embedded so serverless handlers need no file access
 */
export const HIRING_SCHEMA_SQL = `
-- Hiring Checks Table
-- Latest hiring answer per company, keyed by a hash of the cleaned domain
CREATE TABLE IF NOT EXISTS hiring_checks (
  company_key VARCHAR(64) PRIMARY KEY,
  company_id BIGINT,
  company_name VARCHAR(255) NOT NULL,
  website TEXT NOT NULL,
  is_hiring BOOLEAN NOT NULL,
  career_page_url TEXT,
  job_roles TEXT[] NOT NULL DEFAULT '{}',
  job_count INTEGER NOT NULL DEFAULT 0,
  hiring_summary VARCHAR(255) NOT NULL,
  detection_method VARCHAR(100) NOT NULL,
  checked_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
);

-- Indexes for performance
CREATE INDEX IF NOT EXISTS idx_hiring_checks_checked_at ON hiring_checks(checked_at DESC);
CREATE INDEX IF NOT EXISTS idx_hiring_checks_is_hiring ON hiring_checks(is_hiring);
`;
