import { Request, Response } from 'express';
import { IngestionService } from '../services/ingestion/IngestionService';
import { respondWithError } from './httpErrors';

/**
 * IngestionController triggers and inspects mailbox ingestion runs
 */
export class IngestionController {
  constructor(private readonly ingestionService: IngestionService) {}

  /**
   * POST /api/ingestion/run - Run one ingestion and wait for it
   */
  async triggerRun(req: Request, res: Response): Promise<void> {
    try {
      const run = await this.ingestionService.runOnce();
      res.json({ run });
    } catch (error) {
      respondWithError(res, error, 'Ingestion run failed');
    }
  }

  /**
   * POST /api/ingestion/cancel
   */
  async cancelRun(req: Request, res: Response): Promise<void> {
    const cancelled = this.ingestionService.cancel();
    res.json({
      cancelled,
      message: cancelled ? 'Cancellation requested' : 'No ingestion run is active'
    });
  }

  /**
   * GET /api/ingestion/runs - Run history, newest first
   */
  async listRuns(req: Request, res: Response): Promise<void> {
    try {
      const limit = typeof req.query.limit === 'string' ? Number.parseInt(req.query.limit, 10) : 20;
      if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
        res.status(400).json({
          error: 'Invalid limit parameter',
          message: 'limit must be between 1 and 100'
        });
        return;
      }

      const runs = await this.ingestionService.listRuns(limit);
      res.json({ runs, running: this.ingestionService.isRunning() });
    } catch (error) {
      respondWithError(res, error, 'Failed to retrieve ingestion runs');
    }
  }
}
