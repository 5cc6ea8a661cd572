import cron, { ScheduledTask } from 'node-cron';
import { IngestionService } from './IngestionService';
import { errorMessage } from '../../models/errors';

/**
 * Periodic ingestion on a cron expression. Ticks that land while a run is
 * still going are skipped.
 */
export class IngestionScheduler {
  private task: ScheduledTask | null = null;

  constructor(
    private readonly service: IngestionService,
    private readonly expression: string
  ) {}

  start(): void {
    if (this.task) {
      return;
    }
    if (!cron.validate(this.expression)) {
      throw new Error(`Invalid ingestion cron expression: ${this.expression}`);
    }

    this.task = cron.schedule(this.expression, () => {
      void this.tick();
    });
    console.log(`⏰ [SCHEDULER] Ingestion scheduled (${this.expression})`);
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log('⏰ [SCHEDULER] Ingestion schedule stopped');
    }
  }

  async tick(): Promise<void> {
    if (this.service.isRunning()) {
      console.log('⏭️ [SCHEDULER] Previous ingestion still running, skipping tick');
      return;
    }
    try {
      await this.service.runOnce();
    } catch (error) {
      console.error('❌ [SCHEDULER] Scheduled ingestion failed:', errorMessage(error));
    }
  }
}
