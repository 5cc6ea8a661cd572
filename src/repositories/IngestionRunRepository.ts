import { Database } from 'sqlite';
import { v4 as uuidv4 } from 'uuid';
import { FetchSummary, IngestionRun, IngestionRunRow, IngestionRunStatus, PipelineReport } from '../types/models';
import { ingestionRunRowToModel } from '../models/transformers';
import { withTransaction } from '../database/transaction';

export interface RunCompletion {
  status: Exclude<IngestionRunStatus, 'running'>;
  fetch?: FetchSummary;
  report?: PipelineReport;
  error?: string;
  latestMessageAt?: Date;
}

/**
 * History of ingestion runs; the newest finished run is the fetch checkpoint
 */
export class IngestionRunRepository {
  constructor(private readonly db: Database) {}

  async start(startedAt: Date = new Date()): Promise<IngestionRun> {
    const id = uuidv4();
    await withTransaction(this.db, () => this.db.run(
      "INSERT INTO ingestion_runs (id, started_at, status) VALUES (?, ?, 'running')",
      [id, startedAt.toISOString()]
    ));
    return { id, startedAt, status: 'running' };
  }

  async finish(id: string, completion: RunCompletion): Promise<IngestionRun> {
    await withTransaction(this.db, () => this.db.run(`
      UPDATE ingestion_runs
      SET status = ?, finished_at = ?, fetch_summary = ?, report = ?, error = ?, latest_message_at = ?
      WHERE id = ?
    `, [
      completion.status,
      new Date().toISOString(),
      completion.fetch ? JSON.stringify(completion.fetch) : null,
      completion.report ? JSON.stringify(completion.report) : null,
      completion.error ?? null,
      completion.latestMessageAt ? completion.latestMessageAt.toISOString() : null,
      id
    ]));

    const run = await this.get(id);
    if (!run) {
      throw new Error(`Ingestion run ${id} not found`);
    }
    return run;
  }

  async get(id: string): Promise<IngestionRun | null> {
    const row = await this.db.get<IngestionRunRow>('SELECT * FROM ingestion_runs WHERE id = ?', [id]);
    return row ? ingestionRunRowToModel(row) : null;
  }

  async listRecent(limit: number = 20): Promise<IngestionRun[]> {
    const rows = await this.db.all<IngestionRunRow[]>(
      'SELECT * FROM ingestion_runs ORDER BY started_at DESC, rowid DESC LIMIT ?',
      [limit]
    );
    return rows.map(ingestionRunRowToModel);
  }

  /**
   * Newest message timestamp reached by a completed or cancelled run
   */
  async latestCheckpoint(): Promise<Date | null> {
    const row = await this.db.get<{ latest: string | null }>(`
      SELECT MAX(latest_message_at) as latest FROM ingestion_runs
      WHERE status IN ('completed', 'cancelled') AND latest_message_at IS NOT NULL
    `);
    return row?.latest ? new Date(row.latest) : null;
  }

  /**
   * Runs left 'running' by a crashed process
   */
  async failStaleRuns(): Promise<number> {
    const result = await withTransaction(this.db, () => this.db.run(
      "UPDATE ingestion_runs SET status = 'failed', finished_at = ?, error = 'interrupted' WHERE status = 'running'",
      [new Date().toISOString()]
    ));
    return result.changes ?? 0;
  }
}
