/**
 * Core data models for the application tracker
 */

export const APPLICATION_STATUSES = [
  'Applied',
  'Viewed',
  'Interview',
  'Assessment',
  'Offer',
  'Rejected',
  'Withdrawn'
] as const;

export type ApplicationStatus = typeof APPLICATION_STATUSES[number];

export const STATUS_KEYWORDS = [
  'received',
  'viewed',
  'interview',
  'assessment',
  'offer',
  'rejected',
  'withdrawn'
] as const;

export type StatusKeyword = typeof STATUS_KEYWORDS[number];

export interface RawMessage {
  id: string; // Provider's unique message ID
  sender: string; // Raw From header, e.g. "Acme Careers <jobs@acme.com>"
  subject: string;
  body: string; // Plain text or HTML
  receivedAt: Date;
  threadId?: string;
}

export interface NormalizedText {
  subject: string;
  body: string;
  text: string; // subject + body, original case
  lowered: string;
}

export interface ClassificationResult {
  messageId: string;
  score: number;
  isRelevant: boolean;
  needsReview: boolean;
}

export interface Extraction {
  messageId: string;
  companyName?: string;
  title?: string;
  jobId?: string;
  statusKeyword?: StatusKeyword;
  observedDate: Date;
}

export interface DedupKey {
  value: string;
  companyKey: string;
  titleKey?: string;
  jobKey?: string;
}

export interface ApplicationRecord {
  id: string;
  dedupKey: string;
  companyName: string;
  title?: string;
  jobId: string; // '' when the application has no job id
  applicationDate: Date;
  status: ApplicationStatus;
  lastUpdated: Date;
  createdAt: Date;
  notes: string;
  source: 'email' | 'manual';
  sourceMessageIds: string[];
}

export interface StatusChange {
  applicationId: string;
  fromStatus: ApplicationStatus | null;
  toStatus: ApplicationStatus;
  messageId: string | null;
  changedAt: Date;
}

export interface UpsertResult {
  record: ApplicationRecord;
  created: boolean;
  changed: boolean; // false when the message was already part of the record
}

export type MessageOutcome =
  | { kind: 'created'; messageId: string; recordId: string }
  | { kind: 'updated'; messageId: string; recordId: string }
  | { kind: 'unchanged'; messageId: string; recordId?: string }
  | { kind: 'skipped_irrelevant'; messageId: string; score: number }
  | { kind: 'flagged_for_review'; messageId: string; score: number }
  | { kind: 'failed'; messageId: string; reason: string };

export interface PipelineFailure {
  messageId: string;
  reason: string;
}

/**
 * Per-batch counts. `unchanged` counts messages already attached to a record,
 * an outcome added on top of created/updated/skipped/flagged/failed.
 */
export interface PipelineReport {
  processed: number;
  created: number;
  updated: number;
  unchanged: number;
  skippedIrrelevant: number;
  flaggedForReview: number;
  failed: PipelineFailure[];
  cancelled: boolean;
}

export type ReviewState = 'pending' | 'accepted' | 'dismissed';

export interface ReviewItem {
  messageId: string;
  sender: string;
  subject: string;
  body: string;
  score: number;
  receivedAt: Date;
  flaggedAt: Date;
  state: ReviewState;
  resolvedAt?: Date;
}

export type IngestionRunStatus = 'running' | 'completed' | 'cancelled' | 'failed';

/**
 * What a mail source handed over. `truncated` means more mail matched
 * than one batch holds; the newest matches were left for a later run.
 */
export interface MailBatch {
  messages: RawMessage[];
  unreadable: string[];
  truncated: boolean;
}

export interface FetchSummary {
  fetched: number;
  unreadable: string[];
  truncated: boolean;
}

export interface IngestionRun {
  id: string;
  startedAt: Date;
  finishedAt?: Date;
  status: IngestionRunStatus;
  fetch?: FetchSummary;
  report?: PipelineReport;
  error?: string;
  latestMessageAt?: Date;
}

// Database row interfaces (for SQLite storage)
export interface ApplicationRow {
  id: string;
  dedup_key: string;
  company_key: string;
  company_name: string;
  title: string | null;
  title_key: string | null;
  job_id: string;
  application_date: string;
  status: string;
  last_updated: string;
  created_at: string;
  notes: string;
  source: string;
}

export interface ApplicationMessageRow {
  message_id: string;
  application_id: string;
  status_keyword: string | null;
  observed_at: string;
  added_at: string;
}

export interface StatusChangeRow {
  id: number;
  application_id: string;
  from_status: string | null;
  to_status: string;
  message_id: string | null;
  changed_at: string;
}

export interface ReviewItemRow {
  message_id: string;
  sender: string;
  subject: string;
  body: string;
  score: number;
  received_at: string;
  flagged_at: string;
  state: string;
  resolved_at: string | null;
}

export interface IngestionRunRow {
  id: string;
  started_at: string;
  finished_at: string | null;
  status: string;
  report: string | null; // JSON
  fetch_summary: string | null; // JSON
  error: string | null;
  latest_message_at: string | null;
}

/**
 * Serialized relevance model: TF-IDF vocabulary plus logistic-regression coefficients
 */
export interface ClassifierArtifact {
  version: string;
  vocabulary: Record<string, number>; // term -> feature index
  idf: number[];
  weights: number[];
  bias: number;
  threshold: number;
  ngramRange: [number, number];
}
