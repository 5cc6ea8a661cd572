import { Database } from 'sqlite';
import Papa from 'papaparse';
import { v4 as uuidv4 } from 'uuid';
import {
  ApplicationMessageRow,
  ApplicationRecord,
  ApplicationRow,
  ApplicationStatus,
  DedupKey,
  Extraction,
  StatusChange,
  StatusChangeRow,
  UpsertResult
} from '../types/models';
import { applicationRowToModel, statusChangeRowToModel } from '../models/transformers';
import { StoreConflictError, errorMessage } from '../models/errors';
import { withTransaction } from '../database/transaction';
import { KeyedMutex } from '../utils/KeyedMutex';
import { MatchCandidate, ReconciliationEngine } from '../services/reconciliation/ReconciliationEngine';
import { buildDedupKey } from '../services/reconciliation/dedupKey';

export interface ApplicationFilter {
  status?: ApplicationStatus;
}

export interface NewManualApplication {
  companyName: string;
  title?: string;
  jobId?: string;
  applicationDate: Date;
  status: ApplicationStatus;
  notes?: string;
}

export const EXPORT_FIELDS = [
  'id',
  'company_name',
  'title',
  'job_id',
  'application_date',
  'status',
  'last_updated',
  'created_at',
  'source',
  'notes',
  'source_message_ids'
] as const;

const DEFAULT_MAX_ATTEMPTS = 3;

function isSqliteConflict(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'SQLITE_CONSTRAINT' || error.code === 'SQLITE_BUSY';
}

/**
 * ApplicationRepository owns the applications table and its message membership.
 * Writes for one company run one at a time and each is a single transaction.
 */
export class ApplicationRepository {
  private readonly companyLocks = new KeyedMutex();

  constructor(
    private readonly db: Database,
    private readonly engine: ReconciliationEngine = new ReconciliationEngine(),
    private readonly maxAttempts: number = DEFAULT_MAX_ATTEMPTS
  ) {}

  /**
   * Fold an extraction into the record its key resolves to, creating it if needed.
   * A message that is already attached somewhere is a no-op.
   */
  async upsert(key: DedupKey, extraction: Extraction): Promise<UpsertResult> {
    return this.companyLocks.runExclusive(key.companyKey, async () => {
      for (let attempt = 1; ; attempt++) {
        try {
          return await withTransaction(this.db, () => this.upsertInTransaction(key, extraction));
        } catch (error) {
          if (!isSqliteConflict(error)) {
            throw error;
          }
          if (attempt >= this.maxAttempts) {
            throw new StoreConflictError(
              `Upsert for ${key.value} failed after ${attempt} attempts: ${errorMessage(error)}`,
              key.value,
              { cause: error }
            );
          }
          console.warn(`⚠️ [STORE] Conflict on ${key.value} (attempt ${attempt}/${this.maxAttempts}), retrying`);
        }
      }
    });
  }

  private async upsertInTransaction(key: DedupKey, extraction: Extraction): Promise<UpsertResult> {
    const membership = await this.db.get<{ application_id: string }>(
      'SELECT application_id FROM application_messages WHERE message_id = ?',
      [extraction.messageId]
    );
    if (membership) {
      const record = await this.findById(membership.application_id);
      if (record) {
        return { record, created: false, changed: false };
      }
    }

    const companyRows = await this.db.all<ApplicationRow[]>(
      'SELECT * FROM applications WHERE company_key = ?',
      [key.companyKey]
    );
    const match = this.engine.selectMatch(key, companyRows.map(row => this.rowToCandidate(row)));
    const now = new Date().toISOString();

    if (!match) {
      const id = uuidv4();
      const state = this.engine.initialState(extraction);

      await this.db.run(`
        INSERT INTO applications (
          id, dedup_key, company_key, company_name, title, title_key, job_id,
          application_date, status, last_updated, created_at, notes, source
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `, [
        id, key.value, key.companyKey, extraction.companyName ?? key.companyKey,
        extraction.title ?? null, key.titleKey ?? null, extraction.jobId ?? '',
        state.applicationDate.toISOString(), state.status, state.lastUpdated.toISOString(),
        now, '', 'email'
      ]);
      await this.attachMessage(id, extraction, now);
      await this.recordStatusChange(id, null, 'Applied', extraction.messageId, now);
      if (state.status !== 'Applied') {
        await this.recordStatusChange(id, 'Applied', state.status, extraction.messageId, now);
      }

      return { record: await this.requireById(id), created: true, changed: true };
    }

    const next = this.engine.apply(
      { status: match.status, applicationDate: match.applicationDate, lastUpdated: match.lastUpdated },
      extraction
    );

    await this.db.run(
      'UPDATE applications SET status = ?, application_date = ?, last_updated = ? WHERE id = ?',
      [next.status, next.applicationDate.toISOString(), next.lastUpdated.toISOString(), match.id]
    );
    await this.attachMessage(match.id, extraction, now);
    if (next.statusChanged) {
      await this.recordStatusChange(match.id, next.previousStatus, next.status, extraction.messageId, now);
    }

    return { record: await this.requireById(match.id), created: false, changed: true };
  }

  /**
   * Manually entered application. A record already holding the same dedup key is a conflict.
   */
  async create(input: NewManualApplication): Promise<ApplicationRecord> {
    const key = buildDedupKey({
      messageId: 'manual-entry',
      companyName: input.companyName,
      title: input.title,
      jobId: input.jobId,
      observedDate: input.applicationDate
    });

    return this.companyLocks.runExclusive(key.companyKey, async () => {
      try {
        return await withTransaction(this.db, async () => {
          const existing = await this.db.get<{ id: string }>(
            'SELECT id FROM applications WHERE dedup_key = ?',
            [key.value]
          );
          if (existing) {
            throw new StoreConflictError(`An application for ${key.value} already exists`, key.value);
          }

          const id = uuidv4();
          const now = new Date().toISOString();
          const date = input.applicationDate.toISOString();

          await this.db.run(`
            INSERT INTO applications (
              id, dedup_key, company_key, company_name, title, title_key, job_id,
              application_date, status, last_updated, created_at, notes, source
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          `, [
            id, key.value, key.companyKey, input.companyName.trim(), input.title ?? null,
            key.titleKey ?? null, input.jobId ?? '', date, input.status, date, now,
            input.notes ?? '', 'manual'
          ]);
          await this.recordStatusChange(id, null, input.status, null, now);

          return this.requireById(id);
        });
      } catch (error) {
        if (isSqliteConflict(error)) {
          throw new StoreConflictError(`An application for ${key.value} already exists`, key.value, { cause: error });
        }
        throw error;
      }
    });
  }

  async findById(id: string): Promise<ApplicationRecord | null> {
    const row = await this.db.get<ApplicationRow>('SELECT * FROM applications WHERE id = ?', [id]);
    if (!row) {
      return null;
    }
    const messages = await this.db.all<ApplicationMessageRow[]>(
      'SELECT * FROM application_messages WHERE application_id = ? ORDER BY observed_at, rowid',
      [id]
    );
    return applicationRowToModel(row, messages.map(message => message.message_id));
  }

  async findByDedupKey(dedupKey: string): Promise<ApplicationRecord | null> {
    const row = await this.db.get<{ id: string }>('SELECT id FROM applications WHERE dedup_key = ?', [dedupKey]);
    return row ? this.findById(row.id) : null;
  }

  async hasMessage(messageId: string): Promise<boolean> {
    const row = await this.db.get<{ message_id: string }>(
      'SELECT message_id FROM application_messages WHERE message_id = ?',
      [messageId]
    );
    return row !== undefined;
  }

  /**
   * All records, most recently updated first
   */
  async listAll(filter: ApplicationFilter = {}): Promise<ApplicationRecord[]> {
    const where = filter.status ? 'WHERE status = ?' : '';
    const params = filter.status ? [filter.status] : [];

    const rows = await this.db.all<ApplicationRow[]>(
      `SELECT * FROM applications ${where} ORDER BY last_updated DESC, created_at DESC, id`,
      params
    );
    const messages = await this.db.all<ApplicationMessageRow[]>(
      'SELECT * FROM application_messages ORDER BY observed_at, rowid'
    );

    const byApplication = new Map<string, string[]>();
    for (const message of messages) {
      const ids = byApplication.get(message.application_id) ?? [];
      ids.push(message.message_id);
      byApplication.set(message.application_id, ids);
    }

    return rows.map(row => applicationRowToModel(row, byApplication.get(row.id) ?? []));
  }

  /**
   * CSV of every record with a header row, every line newline-terminated; message ids are `;`-joined
   */
  async exportCsv(filter: ApplicationFilter = {}): Promise<string> {
    const records = await this.listAll(filter);
    const data = records.map(record => [
      record.id,
      record.companyName,
      record.title ?? '',
      record.jobId,
      record.applicationDate.toISOString(),
      record.status,
      record.lastUpdated.toISOString(),
      record.createdAt.toISOString(),
      record.source,
      record.notes,
      record.sourceMessageIds.join(';')
    ]);

    const csv = Papa.unparse({ fields: [...EXPORT_FIELDS], data }, { newline: '\n' });
    // unparse ends an empty table with a newline but not a filled one
    return csv.endsWith('\n') ? csv : `${csv}\n`;
  }

  async getStatusHistory(applicationId: string): Promise<StatusChange[]> {
    const rows = await this.db.all<StatusChangeRow[]>(
      'SELECT * FROM status_history WHERE application_id = ? ORDER BY id',
      [applicationId]
    );
    return rows.map(statusChangeRowToModel);
  }

  private rowToCandidate(row: ApplicationRow): MatchCandidate & { applicationDate: Date } {
    const record = applicationRowToModel(row, []);
    return {
      id: record.id,
      dedupKey: record.dedupKey,
      titleKey: row.title_key ?? undefined,
      jobId: record.jobId,
      status: record.status,
      lastUpdated: record.lastUpdated,
      applicationDate: record.applicationDate
    };
  }

  private async requireById(id: string): Promise<ApplicationRecord> {
    const record = await this.findById(id);
    if (!record) {
      throw new Error(`Application ${id} disappeared inside its own transaction`);
    }
    return record;
  }

  private async attachMessage(applicationId: string, extraction: Extraction, now: string): Promise<void> {
    await this.db.run(
      'INSERT INTO application_messages (message_id, application_id, status_keyword, observed_at, added_at) VALUES (?, ?, ?, ?, ?)',
      [extraction.messageId, applicationId, extraction.statusKeyword ?? null, extraction.observedDate.toISOString(), now]
    );
  }

  private async recordStatusChange(
    applicationId: string,
    fromStatus: ApplicationStatus | null,
    toStatus: ApplicationStatus,
    messageId: string | null,
    changedAt: string
  ): Promise<void> {
    await this.db.run(
      'INSERT INTO status_history (application_id, from_status, to_status, message_id, changed_at) VALUES (?, ?, ?, ?, ?)',
      [applicationId, fromStatus, toStatus, messageId, changedAt]
    );
  }
}
