import { Extraction, NormalizedText } from '../../types/models';
import { parseAddress } from '../../utils/address';
import {
  COMPANY_RULES,
  ExtractionContext,
  JOB_ID_RULES,
  STATUS_RULES,
  TITLE_RULES,
  firstMatch
} from './rules';

/**
 * Pull company, title, job id and status keyword out of a normalized message.
 * Deterministic; absent fields stay undefined.
 */
export function extract(
  normalized: NormalizedText,
  sender: string,
  receivedAt: Date,
  messageId: string
): Extraction {
  const context: ExtractionContext = {
    normalized,
    sender: parseAddress(sender)
  };

  return {
    messageId,
    companyName: firstMatch(COMPANY_RULES, context),
    title: firstMatch(TITLE_RULES, context),
    jobId: firstMatch(JOB_ID_RULES, context),
    statusKeyword: firstMatch(STATUS_RULES, context),
    observedDate: receivedAt
  };
}
