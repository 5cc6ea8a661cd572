import { MessageOutcome, NormalizedText, PipelineReport, RawMessage } from '../../types/models';
import { validateRawMessage } from '../../models/validation';
import { errorMessage } from '../../models/errors';
import { ApplicationRepository } from '../../repositories/ApplicationRepository';
import { ReviewQueueRepository } from '../../repositories/ReviewQueueRepository';
import { RelevanceClassifier } from '../ml/RelevanceClassifier';
import { ReconciliationEngine } from '../reconciliation/ReconciliationEngine';
import { normalize } from '../text/TextNormalizer';
import { reconcileMessage } from './reconcileMessage';

export interface PipelineDependencies {
  classifier: RelevanceClassifier;
  applications: ApplicationRepository;
  reviewQueue: ReviewQueueRepository;
  engine?: ReconciliationEngine;
}

export interface PipelineOptions {
  concurrency?: number;
  debug?: boolean;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export function emptyReport(): PipelineReport {
  return {
    processed: 0,
    created: 0,
    updated: 0,
    unchanged: 0,
    skippedIrrelevant: 0,
    flaggedForReview: 0,
    failed: [],
    cancelled: false
  };
}

function sortTime(message: RawMessage): number {
  const time = new Date(message.receivedAt).getTime();
  return Number.isFinite(time) ? time : Number.POSITIVE_INFINITY;
}

function messageIdOf(message: RawMessage): string {
  return typeof message.id === 'string' && message.id.length > 0 ? message.id : '<unknown>';
}

/**
 * Runs a batch of messages through normalize -> classify -> extract -> reconcile.
 * One outcome per message; per-message errors never abort the batch.
 */
export class IngestionPipeline {
  private readonly engine: ReconciliationEngine;
  private readonly concurrency: number;
  private readonly debug: boolean;

  constructor(private readonly deps: PipelineDependencies, options: PipelineOptions = {}) {
    this.engine = deps.engine ?? new ReconciliationEngine();
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 4));
    this.debug = options.debug ?? false;
  }

  get classifier(): RelevanceClassifier {
    return this.deps.classifier;
  }

  async run(messages: RawMessage[], options: RunOptions = {}): Promise<PipelineReport> {
    const ordered = messages
      .map((message, index) => ({ message, index, time: sortTime(message) }))
      .sort((a, b) => a.time - b.time || a.index - b.index)
      .map(entry => entry.message);

    const outcomes = new Array<MessageOutcome | undefined>(ordered.length).fill(undefined);
    let next = 0;
    let cancelled = false;

    const worker = async (): Promise<void> => {
      while (next < ordered.length) {
        if (options.signal?.aborted) {
          cancelled = true;
          return;
        }
        const index = next++;
        outcomes[index] = await this.processMessage(ordered[index]);
      }
    };

    const workerCount = Math.min(this.concurrency, ordered.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const report = this.summarize(outcomes);
    report.cancelled = cancelled;

    console.log(
      `📬 [PIPELINE] ${report.processed}/${ordered.length} processed: ${report.created} created, ` +
      `${report.updated} updated, ${report.unchanged} unchanged, ${report.skippedIrrelevant} irrelevant, ` +
      `${report.flaggedForReview} for review, ${report.failed.length} failed${cancelled ? ' (cancelled)' : ''}`
    );
    return report;
  }

  /**
   * Full treatment of one message, classifier gate included
   */
  async processMessage(input: RawMessage): Promise<MessageOutcome> {
    const messageId = messageIdOf(input);

    try {
      const { error, value: message } = validateRawMessage(input);
      if (error || !message) {
        return { kind: 'failed', messageId, reason: `malformed message: ${error ? error.message : 'empty'}` };
      }

      if (await this.deps.applications.hasMessage(message.id)) {
        this.log(`↩️ ${message.id} already recorded`);
        return { kind: 'unchanged', messageId: message.id };
      }

      const normalized = normalize(message.subject, message.body);
      const classification = this.deps.classifier.classify(message.id, normalized.text);

      if (!classification.isRelevant) {
        if (classification.needsReview) {
          await this.deps.reviewQueue.enqueue(message, classification.score);
          this.log(`🔍 ${message.id} flagged for review (score ${classification.score.toFixed(3)})`);
          return { kind: 'flagged_for_review', messageId: message.id, score: classification.score };
        }
        this.log(`⏭️ ${message.id} skipped (score ${classification.score.toFixed(3)})`);
        return { kind: 'skipped_irrelevant', messageId: message.id, score: classification.score };
      }

      return await this.reconcileNormalized(message, normalized);
    } catch (error) {
      console.error(`❌ [PIPELINE] Message ${messageId} failed:`, errorMessage(error));
      return { kind: 'failed', messageId, reason: errorMessage(error) };
    }
  }

  private async reconcileNormalized(message: RawMessage, normalized: NormalizedText): Promise<MessageOutcome> {
    const outcome = await reconcileMessage(message, this.deps.applications, this.engine, normalized);
    this.log(`✏️ ${message.id} -> ${outcome.kind}`);
    return outcome;
  }

  private summarize(outcomes: Array<MessageOutcome | undefined>): PipelineReport {
    const report = emptyReport();
    for (const outcome of outcomes) {
      if (!outcome) {
        continue;
      }
      report.processed++;
      switch (outcome.kind) {
        case 'created':
          report.created++;
          break;
        case 'updated':
          report.updated++;
          break;
        case 'unchanged':
          report.unchanged++;
          break;
        case 'skipped_irrelevant':
          report.skippedIrrelevant++;
          break;
        case 'flagged_for_review':
          report.flaggedForReview++;
          break;
        case 'failed':
          report.failed.push({ messageId: outcome.messageId, reason: outcome.reason });
          break;
      }
    }
    return report;
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[PIPELINE DEBUG] ${message}`);
    }
  }
}
