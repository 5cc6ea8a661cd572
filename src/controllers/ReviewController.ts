import { Request, Response } from 'express';
import { ReviewDecision, ReviewService } from '../services/review/ReviewService';
import { respondWithError } from './httpErrors';

/**
 * ReviewController exposes the manual review queue
 */
export class ReviewController {
  constructor(private readonly reviewService: ReviewService) {}

  /**
   * GET /api/review - Pending borderline messages
   */
  async listPending(req: Request, res: Response): Promise<void> {
    try {
      const items = await this.reviewService.listPending();
      res.json({ items, total: items.length });
    } catch (error) {
      respondWithError(res, error, 'Failed to retrieve review queue');
    }
  }

  /**
   * POST /api/review/:messageId/accept
   */
  async accept(req: Request, res: Response): Promise<void> {
    try {
      const decision = await this.reviewService.accept(req.params.messageId);
      this.sendDecision(res, req.params.messageId, decision);
    } catch (error) {
      respondWithError(res, error, 'Failed to accept review item');
    }
  }

  /**
   * POST /api/review/:messageId/dismiss
   */
  async dismiss(req: Request, res: Response): Promise<void> {
    try {
      const decision = await this.reviewService.dismiss(req.params.messageId);
      this.sendDecision(res, req.params.messageId, decision);
    } catch (error) {
      respondWithError(res, error, 'Failed to dismiss review item');
    }
  }

  private sendDecision(res: Response, messageId: string, decision: ReviewDecision): void {
    switch (decision.status) {
      case 'not_found':
        res.status(404).json({
          error: 'Not Found',
          message: `No review item for message ${messageId}`
        });
        return;
      case 'already_resolved':
        res.status(409).json({
          error: 'Already resolved',
          message: `Review item ${messageId} was already ${decision.item.state}`
        });
        return;
      case 'accepted':
        res.json({ status: 'accepted', outcome: decision.outcome });
        return;
      case 'dismissed':
        res.json({ status: 'dismissed' });
        return;
    }
  }
}
