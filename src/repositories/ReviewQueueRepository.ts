import { Database } from 'sqlite';
import { RawMessage, ReviewItem, ReviewItemRow, ReviewState } from '../types/models';
import { reviewItemRowToModel } from '../models/transformers';
import { withTransaction } from '../database/transaction';

/**
 * Borderline messages awaiting a manual relevance decision
 */
export class ReviewQueueRepository {
  constructor(private readonly db: Database) {}

  /**
   * Queue a message. Re-flagging a message keeps its earlier decision.
   */
  async enqueue(message: RawMessage, score: number): Promise<void> {
    await withTransaction(this.db, () => this.db.run(`
      INSERT INTO review_queue (message_id, sender, subject, body, score, received_at, flagged_at, state)
      VALUES (?, ?, ?, ?, ?, ?, ?, 'pending')
      ON CONFLICT(message_id) DO UPDATE SET score = excluded.score
    `, [
      message.id, message.sender, message.subject, message.body, score,
      message.receivedAt.toISOString(), new Date().toISOString()
    ]));
  }

  async get(messageId: string): Promise<ReviewItem | null> {
    const row = await this.db.get<ReviewItemRow>('SELECT * FROM review_queue WHERE message_id = ?', [messageId]);
    return row ? reviewItemRowToModel(row) : null;
  }

  async listByState(state: ReviewState = 'pending'): Promise<ReviewItem[]> {
    const rows = await this.db.all<ReviewItemRow[]>(
      'SELECT * FROM review_queue WHERE state = ? ORDER BY received_at DESC, message_id',
      [state]
    );
    return rows.map(reviewItemRowToModel);
  }

  async resolve(messageId: string, state: Exclude<ReviewState, 'pending'>): Promise<boolean> {
    const result = await withTransaction(this.db, () => this.db.run(
      "UPDATE review_queue SET state = ?, resolved_at = ? WHERE message_id = ? AND state = 'pending'",
      [state, new Date().toISOString(), messageId]
    ));
    return (result.changes ?? 0) > 0;
  }
}
