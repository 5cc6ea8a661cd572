import { IngestionRun, PipelineReport, RawMessage } from '../../types/models';
import {
  AdapterIngestionError,
  IngestionInProgressError,
  errorMessage
} from '../../models/errors';
import { IngestionRunRepository } from '../../repositories/IngestionRunRepository';
import { PipelineFactory } from '../pipeline/createPipeline';
import { MailSource } from '../mail/MailSource';

export interface IngestionServiceOptions {
  lookbackDays: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Timestamp of the newest message the pipeline actually took. Workers take
 * messages in time order, so the first `processed` ones are done.
 */
function latestProcessedAt(messages: RawMessage[], report: PipelineReport): Date | undefined {
  const times = messages
    .map(message => message.receivedAt.getTime())
    .filter(time => Number.isFinite(time))
    .sort((a, b) => a - b);
  const taken = Math.min(report.processed, times.length);
  return taken > 0 ? new Date(times[taken - 1]) : undefined;
}

/**
 * One ingestion run = fetch since checkpoint, then pipeline. At most one at a time.
 */
export class IngestionService {
  private active: AbortController | null = null;

  constructor(
    private readonly source: MailSource | null,
    private readonly pipelineFactory: PipelineFactory,
    private readonly runs: IngestionRunRepository,
    private readonly options: IngestionServiceOptions
  ) {}

  isRunning(): boolean {
    return this.active !== null;
  }

  /**
   * Ask the active run to stop taking new messages. Returns false when idle.
   */
  cancel(): boolean {
    if (!this.active) {
      return false;
    }
    this.active.abort();
    console.log('🛑 [INGESTION] Cancellation requested');
    return true;
  }

  async listRuns(limit?: number): Promise<IngestionRun[]> {
    return this.runs.listRecent(limit);
  }

  async checkpoint(now: Date = new Date()): Promise<Date> {
    const latest = await this.runs.latestCheckpoint();
    return latest ?? new Date(now.getTime() - this.options.lookbackDays * DAY_MS);
  }

  /**
   * Throws IngestionInProgressError when a run is active. Model and adapter
   * failures mark the run failed and are rethrown.
   */
  async runOnce(): Promise<IngestionRun> {
    if (this.active) {
      throw new IngestionInProgressError();
    }
    const controller = new AbortController();
    this.active = controller;

    try {
      const run = await this.runs.start();
      console.log(`🔄 [INGESTION] Run ${run.id} started`);

      try {
        const pipeline = await this.pipelineFactory();
        if (!this.source) {
          throw new AdapterIngestionError('No mail source is configured');
        }

        const since = await this.checkpoint();
        const batch = await this.source.fetchMessages(since, controller.signal);
        if (batch.truncated) {
          console.warn(`⚠️ [INGESTION] Run ${run.id} took the oldest ${batch.messages.length} matches; the rest wait for the next run`);
        }
        if (batch.unreadable.length > 0) {
          console.warn(`⚠️ [INGESTION] Run ${run.id} could not read ${batch.unreadable.length} messages: ${batch.unreadable.join(', ')}`);
        }
        const report = await pipeline.run(batch.messages, { signal: controller.signal });

        const finished = await this.runs.finish(run.id, {
          status: report.cancelled ? 'cancelled' : 'completed',
          fetch: { fetched: batch.messages.length, unreadable: batch.unreadable, truncated: batch.truncated },
          report,
          latestMessageAt: latestProcessedAt(batch.messages, report)
        });
        console.log(`✅ [INGESTION] Run ${run.id} ${finished.status}`);
        return finished;
      } catch (error) {
        await this.runs.finish(run.id, { status: 'failed', error: errorMessage(error) });
        console.error(`❌ [INGESTION] Run ${run.id} failed:`, errorMessage(error));
        throw error;
      }
    } finally {
      this.active = null;
    }
  }
}
