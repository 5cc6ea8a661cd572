import {
  ApplicationRecord,
  ApplicationRow,
  ApplicationStatus,
  FetchSummary,
  IngestionRun,
  IngestionRunRow,
  IngestionRunStatus,
  PipelineReport,
  ReviewItem,
  ReviewItemRow,
  ReviewState,
  StatusChange,
  StatusChangeRow
} from '../types/models';
import { isValidStatus } from './validation';

/**
 * Transformation functions between database rows and model objects
 */

function toStatus(value: string): ApplicationStatus {
  if (!isValidStatus(value)) {
    throw new Error(`Unknown application status in storage: ${value}`);
  }
  return value;
}

// Application transformations
export function applicationRowToModel(row: ApplicationRow, sourceMessageIds: string[]): ApplicationRecord {
  return {
    id: row.id,
    dedupKey: row.dedup_key,
    companyName: row.company_name,
    title: row.title ?? undefined,
    jobId: row.job_id,
    applicationDate: new Date(row.application_date),
    status: toStatus(row.status),
    lastUpdated: new Date(row.last_updated),
    createdAt: new Date(row.created_at),
    notes: row.notes,
    source: row.source === 'manual' ? 'manual' : 'email',
    sourceMessageIds
  };
}

export function statusChangeRowToModel(row: StatusChangeRow): StatusChange {
  return {
    applicationId: row.application_id,
    fromStatus: row.from_status === null ? null : toStatus(row.from_status),
    toStatus: toStatus(row.to_status),
    messageId: row.message_id,
    changedAt: new Date(row.changed_at)
  };
}

// Review queue transformations
const REVIEW_STATES: ReviewState[] = ['pending', 'accepted', 'dismissed'];

export function reviewItemRowToModel(row: ReviewItemRow): ReviewItem {
  const state = REVIEW_STATES.find(candidate => candidate === row.state) ?? 'pending';
  return {
    messageId: row.message_id,
    sender: row.sender,
    subject: row.subject,
    body: row.body,
    score: row.score,
    receivedAt: new Date(row.received_at),
    flaggedAt: new Date(row.flagged_at),
    state,
    resolvedAt: row.resolved_at ? new Date(row.resolved_at) : undefined
  };
}

// Ingestion run transformations
const RUN_STATUSES: IngestionRunStatus[] = ['running', 'completed', 'cancelled', 'failed'];

export function ingestionRunRowToModel(row: IngestionRunRow): IngestionRun {
  const status = RUN_STATUSES.find(candidate => candidate === row.status) ?? 'failed';
  const report: PipelineReport | undefined = row.report ? JSON.parse(row.report) : undefined;
  const fetch: FetchSummary | undefined = row.fetch_summary ? JSON.parse(row.fetch_summary) : undefined;
  return {
    id: row.id,
    startedAt: new Date(row.started_at),
    finishedAt: row.finished_at ? new Date(row.finished_at) : undefined,
    status,
    fetch,
    report,
    error: row.error ?? undefined,
    latestMessageAt: row.latest_message_at ? new Date(row.latest_message_at) : undefined
  };
}
