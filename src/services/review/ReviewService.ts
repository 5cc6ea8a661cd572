import { MessageOutcome, RawMessage, ReviewItem } from '../../types/models';
import { ApplicationRepository } from '../../repositories/ApplicationRepository';
import { ReviewQueueRepository } from '../../repositories/ReviewQueueRepository';
import { ReconciliationEngine } from '../reconciliation/ReconciliationEngine';
import { reconcileMessage } from '../pipeline/reconcileMessage';

export type ReviewDecision =
  | { status: 'not_found' }
  | { status: 'already_resolved'; item: ReviewItem }
  | { status: 'accepted'; outcome: MessageOutcome }
  | { status: 'dismissed' };

function toRawMessage(item: ReviewItem): RawMessage {
  return {
    id: item.messageId,
    sender: item.sender,
    subject: item.subject,
    body: item.body,
    receivedAt: item.receivedAt
  };
}

/**
 * Manual decisions on borderline messages
 */
export class ReviewService {
  constructor(
    private readonly reviewQueue: ReviewQueueRepository,
    private readonly applications: ApplicationRepository,
    private readonly engine: ReconciliationEngine = new ReconciliationEngine()
  ) {}

  async listPending(): Promise<ReviewItem[]> {
    return this.reviewQueue.listByState('pending');
  }

  /**
   * Treat the message as relevant: extract and reconcile it, skipping the classifier.
   * The item stays pending when reconciliation fails.
   */
  async accept(messageId: string): Promise<ReviewDecision> {
    const item = await this.reviewQueue.get(messageId);
    if (!item) {
      return { status: 'not_found' };
    }
    if (item.state !== 'pending') {
      return { status: 'already_resolved', item };
    }

    const outcome = await reconcileMessage(toRawMessage(item), this.applications, this.engine);
    await this.reviewQueue.resolve(messageId, 'accepted');
    console.log(`✅ [REVIEW] ${messageId} accepted (${outcome.kind})`);
    return { status: 'accepted', outcome };
  }

  async dismiss(messageId: string): Promise<ReviewDecision> {
    const item = await this.reviewQueue.get(messageId);
    if (!item) {
      return { status: 'not_found' };
    }
    if (item.state !== 'pending') {
      return { status: 'already_resolved', item };
    }

    await this.reviewQueue.resolve(messageId, 'dismissed');
    console.log(`🗑️ [REVIEW] ${messageId} dismissed`);
    return { status: 'dismissed' };
  }
}
