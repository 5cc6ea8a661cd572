import { DedupKey, Extraction } from '../../types/models';
import { ExtractionDegenerateKeyError } from '../../models/errors';

const LEGAL_SUFFIXES = new Set(['inc', 'llc', 'ltd', 'corp', 'corporation', 'co', 'gmbh', 'plc', 'limited', 'incorporated']);

export function normalizeCompanyKey(company: string): string {
  const words = company
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .split(/\s+/)
    .filter(Boolean);

  while (words.length > 1 && LEGAL_SUFFIXES.has(words[words.length - 1])) {
    words.pop();
  }
  return words.join(' ');
}

export function normalizeTitleKey(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export function normalizeJobKey(jobId: string): string {
  return jobId.trim().toLowerCase();
}

/**
 * `company#jobid` when a job id is known, `company|title` otherwise.
 * Throws ExtractionDegenerateKeyError when no company survives normalization.
 */
export function buildDedupKey(extraction: Extraction): DedupKey {
  const companyKey = extraction.companyName ? normalizeCompanyKey(extraction.companyName) : '';
  if (!companyKey) {
    throw new ExtractionDegenerateKeyError(extraction.messageId);
  }

  const jobKey = extraction.jobId ? normalizeJobKey(extraction.jobId) || undefined : undefined;
  const titleKey = extraction.title ? normalizeTitleKey(extraction.title) || undefined : undefined;

  const value = jobKey
    ? `${companyKey}#${jobKey}`
    : `${companyKey}|${titleKey ?? ''}`;

  return { value, companyKey, titleKey, jobKey };
}
