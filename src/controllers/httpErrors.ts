import { Response } from 'express';
import { TrackerError, TrackerErrorCode } from '../models/errors';
import { ValidationError } from '../models/validation';

const STATUS_BY_CODE: Record<TrackerErrorCode, { status: number; error: string }> = {
  VALIDATION: { status: 400, error: 'Validation failed' },
  EXTRACTION_DEGENERATE_KEY: { status: 422, error: 'Unprocessable message' },
  STORE_CONFLICT: { status: 409, error: 'Conflict' },
  INGESTION_IN_PROGRESS: { status: 409, error: 'Ingestion in progress' },
  ADAPTER_INGESTION: { status: 502, error: 'Mail source unavailable' },
  CLASSIFICATION_LOAD: { status: 500, error: 'Relevance model unavailable' }
};

/**
 * Reply with `{ error, message }`, mapping known errors to their HTTP status
 */
export function respondWithError(res: Response, error: unknown, context: string): void {
  if (error instanceof TrackerError) {
    const { status, error: title } = STATUS_BY_CODE[error.code];
    if (status >= 500) {
      console.error(`❌ ${context}:`, error.message);
    }
    res.status(status).json({
      error: title,
      message: error.message,
      ...(error instanceof ValidationError ? { details: error.details.map(detail => detail.message) } : {})
    });
    return;
  }

  console.error(`❌ ${context}:`, error);
  res.status(500).json({
    error: 'Internal server error',
    message: context
  });
}
