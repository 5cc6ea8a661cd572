import { Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ApplicationRepository } from '../repositories/ApplicationRepository';
import { PipelineFactory } from '../services/pipeline/createPipeline';
import {
  RawMessage,
  isValidStatus,
  throwValidationError,
  validateManualApplication,
  validateParseRequest
} from '../models';
import { respondWithError } from './httpErrors';

export const EXPORT_FILENAME = 'applications_export.csv';

/**
 * ApplicationController serves the tracked applications
 */
export class ApplicationController {
  constructor(
    private readonly applications: ApplicationRepository,
    private readonly pipelineFactory: PipelineFactory
  ) {}

  /**
   * GET /api/applications - All applications, most recently updated first
   */
  async listApplications(req: Request, res: Response): Promise<void> {
    try {
      const status = typeof req.query.status === 'string' ? req.query.status : undefined;
      if (status !== undefined && !isValidStatus(status)) {
        res.status(400).json({
          error: 'Invalid status parameter',
          message: `Unknown status "${status}"`
        });
        return;
      }

      const applications = await this.applications.listAll({ status });
      res.json({ applications, total: applications.length });
    } catch (error) {
      respondWithError(res, error, 'Failed to retrieve applications');
    }
  }

  /**
   * GET /api/applications/:id - One application with its status history
   */
  async getApplication(req: Request, res: Response): Promise<void> {
    try {
      const application = await this.applications.findById(req.params.id);
      if (!application) {
        res.status(404).json({
          error: 'Not Found',
          message: `Application ${req.params.id} not found`
        });
        return;
      }

      const history = await this.applications.getStatusHistory(application.id);
      res.json({ application, history });
    } catch (error) {
      respondWithError(res, error, 'Failed to retrieve application');
    }
  }

  /**
   * POST /api/applications - Manual entry
   */
  async createApplication(req: Request, res: Response): Promise<void> {
    try {
      const result = validateManualApplication(req.body);
      if (result.error || !result.value) {
        throwValidationError(result);
      }
      const input = result.value;

      const application = await this.applications.create({
        companyName: input.companyName,
        title: input.title || undefined,
        jobId: input.jobId || undefined,
        applicationDate: input.applicationDate ?? new Date(),
        status: input.status,
        notes: input.notes
      });
      console.log(`📝 Manual application added for ${application.companyName}`);
      res.status(201).json({ application });
    } catch (error) {
      respondWithError(res, error, 'Failed to create application');
    }
  }

  /**
   * POST /api/applications/parse - Run a pasted email through the pipeline
   */
  async parseMessage(req: Request, res: Response): Promise<void> {
    try {
      const result = validateParseRequest(req.body);
      if (result.error || !result.value) {
        throwValidationError(result);
      }
      const input = result.value;

      const message: RawMessage = {
        id: input.messageId ?? `pasted-${uuidv4()}`,
        sender: input.sender,
        subject: input.subject,
        body: input.body,
        receivedAt: input.receivedAt ?? new Date()
      };

      const pipeline = await this.pipelineFactory();
      const report = await pipeline.run([message]);
      res.json({ messageId: message.id, report });
    } catch (error) {
      respondWithError(res, error, 'Failed to parse message');
    }
  }

  /**
   * GET /api/export - CSV download of every application
   */
  async exportCsv(req: Request, res: Response): Promise<void> {
    try {
      const csv = await this.applications.exportCsv();
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${EXPORT_FILENAME}"`);
      res.send(csv);
    } catch (error) {
      respondWithError(res, error, 'Failed to export applications');
    }
  }
}
