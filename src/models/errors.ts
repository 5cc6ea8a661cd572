/**
 * Error taxonomy for the ingestion pipeline and its outer surfaces
 */

export type TrackerErrorCode =
  | 'CLASSIFICATION_LOAD'
  | 'EXTRACTION_DEGENERATE_KEY'
  | 'STORE_CONFLICT'
  | 'ADAPTER_INGESTION'
  | 'INGESTION_IN_PROGRESS'
  | 'VALIDATION';

export class TrackerError extends Error {
  constructor(message: string, public readonly code: TrackerErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TrackerError';
  }
}

/**
 * The model artifact could not be read or is inconsistent. Fatal for a run.
 */
export class ClassificationLoadError extends TrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CLASSIFICATION_LOAD', options);
    this.name = 'ClassificationLoadError';
  }
}

export class ExtractionDegenerateKeyError extends TrackerError {
  constructor(public readonly messageId: string) {
    super(`No company could be extracted from message ${messageId}`, 'EXTRACTION_DEGENERATE_KEY');
    this.name = 'ExtractionDegenerateKeyError';
  }
}

export class StoreConflictError extends TrackerError {
  constructor(message: string, public readonly dedupKey?: string, options?: { cause?: unknown }) {
    super(message, 'STORE_CONFLICT', options);
    this.name = 'StoreConflictError';
  }
}

export class AdapterIngestionError extends TrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ADAPTER_INGESTION', options);
    this.name = 'AdapterIngestionError';
  }
}

export class IngestionInProgressError extends TrackerError {
  constructor() {
    super('An ingestion run is already in progress', 'INGESTION_IN_PROGRESS');
    this.name = 'IngestionInProgressError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
