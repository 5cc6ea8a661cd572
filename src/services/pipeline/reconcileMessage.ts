import { MessageOutcome, NormalizedText, RawMessage } from '../../types/models';
import { ApplicationRepository } from '../../repositories/ApplicationRepository';
import { ReconciliationEngine } from '../reconciliation/ReconciliationEngine';
import { extract } from '../extraction/FieldExtractor';
import { normalize } from '../text/TextNormalizer';

/**
 * Extract fields from a relevant message and fold them into the store.
 * Throws ExtractionDegenerateKeyError or StoreConflictError.
 */
export async function reconcileMessage(
  message: RawMessage,
  applications: ApplicationRepository,
  engine: ReconciliationEngine,
  normalized: NormalizedText = normalize(message.subject, message.body)
): Promise<MessageOutcome> {
  const extraction = extract(normalized, message.sender, message.receivedAt, message.id);
  const key = engine.keyFor(extraction);
  const result = await applications.upsert(key, extraction);

  if (result.created) {
    return { kind: 'created', messageId: message.id, recordId: result.record.id };
  }
  if (!result.changed) {
    return { kind: 'unchanged', messageId: message.id, recordId: result.record.id };
  }
  return { kind: 'updated', messageId: message.id, recordId: result.record.id };
}
