import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Database } from 'sqlite';
import { ApplicationRepository } from '../../../repositories/ApplicationRepository';
import { ReviewQueueRepository } from '../../../repositories/ReviewQueueRepository';
import { IngestionPipeline, emptyReport } from '../../../services/pipeline/IngestionPipeline';
import { RawMessage } from '../../../types/models';
import {
  acmeLifecycle,
  closeTestDatabase,
  createMessage,
  createTestDatabase,
  testClassifier
} from '../../helpers/fixtures';

describe('IngestionPipeline', () => {
  let db: Database;
  let applications: ApplicationRepository;
  let reviewQueue: ReviewQueueRepository;

  const createPipeline = (concurrency = 1) => new IngestionPipeline(
    { classifier: testClassifier(), applications, reviewQueue },
    { concurrency }
  );

  beforeEach(async () => {
    db = await createTestDatabase();
    applications = new ApplicationRepository(db);
    reviewQueue = new ReviewQueueRepository(db);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await closeTestDatabase(db);
  });

  describe('application lifecycle', () => {
    it('should fold confirmation, interview and rejection into one record', async () => {
      const report = await createPipeline().run(acmeLifecycle());

      expect(report).toEqual({
        ...emptyReport(),
        processed: 3,
        created: 1,
        updated: 2
      });

      const records = await applications.listAll();
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        dedupKey: 'acme#1234',
        companyName: 'Acme Corp',
        jobId: '1234',
        status: 'Rejected',
        applicationDate: new Date('2024-03-01T09:00:00Z'),
        lastUpdated: new Date('2024-03-20T11:00:00Z'),
        sourceMessageIds: ['acme-1', 'acme-2', 'acme-3']
      });

      const history = await applications.getStatusHistory(records[0].id);
      expect(history.map(change => [change.fromStatus, change.toStatus, change.messageId])).toEqual([
        [null, 'Applied', 'acme-1'],
        ['Applied', 'Interview', 'acme-2'],
        ['Interview', 'Rejected', 'acme-3']
      ]);
    });

    it('should process the batch in received order whatever the input order', async () => {
      const [confirmation, interview, rejection] = acmeLifecycle();

      await createPipeline().run([rejection, confirmation, interview]);

      const records = await applications.listAll();
      expect(records).toHaveLength(1);
      expect(records[0].status).toBe('Rejected');
      expect(records[0].sourceMessageIds).toEqual(['acme-1', 'acme-2', 'acme-3']);
    });

    it('should be idempotent when the same batch is run again', async () => {
      const pipeline = createPipeline();
      await pipeline.run(acmeLifecycle());

      const rerun = await pipeline.run(acmeLifecycle());

      expect(rerun).toEqual({ ...emptyReport(), processed: 3, unchanged: 3 });
      const records = await applications.listAll();
      expect(records).toHaveLength(1);
      expect(records[0].sourceMessageIds).toEqual(['acme-1', 'acme-2', 'acme-3']);
      expect(await applications.getStatusHistory(records[0].id)).toHaveLength(3);
    });

    it('should detect known messages before touching the store', async () => {
      const pipeline = createPipeline();
      await pipeline.run(acmeLifecycle());
      const upsert = jest.spyOn(applications, 'upsert');

      await pipeline.run(acmeLifecycle());

      expect(upsert).not.toHaveBeenCalled();
    });

    it('should keep a rejected record rejected when a later interview mail arrives', async () => {
      const pipeline = createPipeline();
      await pipeline.run(acmeLifecycle());

      const report = await pipeline.run([createMessage({
        id: 'acme-4',
        subject: 'Acme Corp Req #1234 interview reminder',
        body: 'Your slot is confirmed.',
        receivedAt: new Date('2024-03-25T09:00:00Z')
      })]);

      expect(report.updated).toBe(1);
      const [record] = await applications.listAll();
      expect(record.status).toBe('Rejected');
      expect(record.sourceMessageIds).toEqual(['acme-1', 'acme-2', 'acme-3', 'acme-4']);
      expect(await applications.getStatusHistory(record.id)).toHaveLength(3);
    });

    it.each([
      ['viewed first', ['globex-viewed', 'globex-interview']],
      ['interview first', ['globex-interview', 'globex-viewed']]
    ])('should settle same-timestamp mails on the higher stage (%s)', async (_label, order) => {
      const sameTime = new Date('2024-04-02T10:00:00Z');
      const messages: Record<string, RawMessage> = {
        'globex-viewed': createMessage({
          id: 'globex-viewed',
          sender: 'Globex Talent <jobs@globex.com>',
          subject: 'Globex Req #77 update',
          body: 'A recruiter viewed your application today.',
          receivedAt: sameTime
        }),
        'globex-interview': createMessage({
          id: 'globex-interview',
          sender: 'Globex Talent <jobs@globex.com>',
          subject: 'Globex Req #77 next steps',
          body: 'We would like to invite you to an interview.',
          receivedAt: sameTime
        })
      };

      await createPipeline().run(order.map(id => messages[id]));

      const records = await applications.listAll();
      expect(records).toHaveLength(1);
      expect(records[0].companyName).toBe('Globex');
      expect(records[0].status).toBe('Interview');
    });

    it('should keep one record per key with concurrent workers', async () => {
      const messages = Array.from({ length: 8 }, (_, index) => createMessage({
        id: `bulk-${index}`,
        receivedAt: new Date(Date.UTC(2024, 2, 1, index))
      }));

      const report = await createPipeline(4).run(messages);

      expect(report.processed).toBe(8);
      expect(report.created).toBe(1);
      expect(report.updated).toBe(7);
      const records = await applications.listAll();
      expect(records).toHaveLength(1);
      expect(records[0].sourceMessageIds).toHaveLength(8);
    });
  });

  describe('relevance gate', () => {
    it('should skip irrelevant messages without storing them', async () => {
      const report = await createPipeline().run([createMessage({
        id: 'lunch',
        subject: 'Lunch on Friday?',
        body: 'Pizza at noon.'
      })]);

      expect(report).toEqual({ ...emptyReport(), processed: 1, skippedIrrelevant: 1 });
      expect(await applications.listAll()).toHaveLength(0);
      expect(await reviewQueue.listByState()).toHaveLength(0);
    });

    it('should queue borderline messages for review', async () => {
      const outcome = await createPipeline().processMessage(createMessage({
        id: 'borderline',
        subject: 'Quick update',
        body: 'Here is the monthly newsletter.'
      }));

      expect(outcome).toEqual({
        kind: 'flagged_for_review',
        messageId: 'borderline',
        score: expect.closeTo(0.3775, 4)
      });
      const pending = await reviewQueue.listByState();
      expect(pending.map(item => item.messageId)).toEqual(['borderline']);
      expect(await applications.listAll()).toHaveLength(0);
    });
  });

  describe('failures', () => {
    it('should record a malformed message and keep going', async () => {
      const report = await createPipeline().run([
        createMessage({ id: 'bad-date', receivedAt: new Date('not a date') }),
        createMessage({ id: 'good' })
      ]);

      expect(report.processed).toBe(2);
      expect(report.created).toBe(1);
      expect(report.failed).toHaveLength(1);
      expect(report.failed[0].messageId).toBe('bad-date');
      expect(report.failed[0].reason).toMatch(/^malformed message: "receivedAt" must be a valid date/);
    });

    it('should fail a relevant message with no company', async () => {
      const outcome = await createPipeline().processMessage(createMessage({
        id: 'anonymous',
        sender: 'someone@gmail.com',
        subject: 'Your application was received',
        body: 'thanks for applying.'
      }));

      expect(outcome).toEqual({
        kind: 'failed',
        messageId: 'anonymous',
        reason: 'No company could be extracted from message anonymous'
      });
    });

    it('should turn store errors into failed outcomes', async () => {
      jest.spyOn(applications, 'upsert').mockRejectedValueOnce(new Error('disk I/O error'));

      const report = await createPipeline().run([createMessage({ id: 'm-1' }), createMessage({ id: 'm-2' })]);

      expect(report.failed).toEqual([{ messageId: 'm-1', reason: 'disk I/O error' }]);
      expect(report.created).toBe(1);
    });
  });

  describe('cancellation', () => {
    it('should not start when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      const report = await createPipeline().run(acmeLifecycle(), { signal: controller.signal });

      expect(report).toEqual({ ...emptyReport(), cancelled: true });
      expect(await applications.listAll()).toHaveLength(0);
    });

    it('should finish the in-flight message and stop before the next one', async () => {
      const controller = new AbortController();
      const hasMessage = applications.hasMessage.bind(applications);
      jest.spyOn(applications, 'hasMessage').mockImplementationOnce(async messageId => {
        controller.abort();
        return hasMessage(messageId);
      });

      const report = await createPipeline().run(acmeLifecycle(), { signal: controller.signal });

      expect(report.processed).toBe(1);
      expect(report.created).toBe(1);
      expect(report.cancelled).toBe(true);
      const [record] = await applications.listAll();
      expect(record.sourceMessageIds).toEqual(['acme-1']);
    });
  });

  it('should return an empty report for an empty batch', async () => {
    expect(await createPipeline().run([])).toEqual(emptyReport());
  });
});
