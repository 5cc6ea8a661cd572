import { Database } from 'sqlite';
import { openDatabase } from '../../config/database';
import { runMigrations } from '../../database/migrations';
import { ClassifierArtifact, MailBatch, RawMessage } from '../../types/models';
import { RelevanceModel, parseRelevanceModel } from '../../services/ml/RelevanceModel';
import { RelevanceClassifier } from '../../services/ml/RelevanceClassifier';
import { MailSource } from '../../services/mail/MailSource';
import { IngestionPipeline } from '../../services/pipeline/IngestionPipeline';
import { createStores } from '../../services/pipeline/createPipeline';
import { loadConfig } from '../../config';
import { AppContext, AppOverrides, createApp } from '../../app';

/**
 * Fresh in-memory database with every migration applied
 */
export async function createTestDatabase(): Promise<Database> {
  const db = await openDatabase(':memory:');
  await runMigrations(db);
  return db;
}

export async function closeTestDatabase(db: Database): Promise<void> {
  await db.close();
}

/**
 * Small hand-built model: any of the first seven terms makes a message
 * relevant (score >= 0.88); "update" alone scores sigmoid(-0.5) ~ 0.3775;
 * no known term scores sigmoid(-2) ~ 0.1192.
 */
export const TEST_MODEL_ARTIFACT: ClassifierArtifact = {
  version: 'test-1',
  vocabulary: {
    applying: 0,
    application: 1,
    interview: 2,
    req: 3,
    moving: 4,
    forward: 5,
    candidates: 6,
    update: 7
  },
  idf: [1, 1, 1, 1, 1, 1, 1, 1],
  weights: [4, 4, 4, 4, 4, 4, 4, 1.5],
  bias: -2,
  threshold: 0.5,
  ngramRange: [1, 1]
};

export function testModel(): RelevanceModel {
  return parseRelevanceModel(TEST_MODEL_ARTIFACT);
}

export function testClassifier(reviewMargin = 0.15): RelevanceClassifier {
  return new RelevanceClassifier(testModel(), { reviewMargin });
}

export const ACME_SENDER = 'Acme Corp Careers <careers@acmecorp.com>';

export function createMessage(overrides: Partial<RawMessage> = {}): RawMessage {
  return {
    id: `msg-${Math.random().toString(36).slice(2)}`,
    sender: ACME_SENDER,
    subject: 'Thank you for applying to Acme Corp — Req #1234',
    body: 'We have received your application and our team will review it shortly.',
    receivedAt: new Date('2024-03-01T09:00:00Z'),
    ...overrides
  };
}

/**
 * Confirmation, interview invite and rejection for one Acme requisition
 */
export function acmeLifecycle(): RawMessage[] {
  return [
    createMessage({
      id: 'acme-1',
      receivedAt: new Date('2024-03-01T09:00:00Z')
    }),
    createMessage({
      id: 'acme-2',
      subject: 'Update on Acme Corp Req #1234: Interview scheduled',
      body: 'We would like to meet you next week. Please pick a slot that works for you.',
      receivedAt: new Date('2024-03-08T14:30:00Z')
    }),
    createMessage({
      id: 'acme-3',
      subject: 'Acme Corp application — not moving forward',
      body: 'Thank you for your interest. We have decided to move ahead with other candidates.',
      receivedAt: new Date('2024-03-20T11:00:00Z')
    })
  ];
}

/**
 * Mail source that hands out a fixed batch, or fails with the given error
 */
export class StaticMailSource implements MailSource {
  readonly name = 'static';
  readonly calls: Date[] = [];

  constructor(private readonly messages: RawMessage[] | Error) {}

  async fetchMessages(since: Date): Promise<MailBatch> {
    this.calls.push(since);
    if (this.messages instanceof Error) {
      throw this.messages;
    }
    return { messages: this.messages, unreadable: [], truncated: false };
  }
}

/**
 * Express app over `db` using the test model and the given mail source
 */
export function createTestApp(db: Database, mailSource: MailSource | null = null, overrides: AppOverrides = {}): AppContext {
  const stores = createStores(db);
  return createApp(db, loadConfig({ NODE_ENV: 'test' }), {
    mailSource,
    pipelineFactory: async () => new IngestionPipeline(
      { classifier: testClassifier(), applications: stores.applications, reviewQueue: stores.reviewQueue },
      { concurrency: 1 }
    ),
    ...overrides
  });
}
