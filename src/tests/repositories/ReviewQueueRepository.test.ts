import { Database } from 'sqlite';
import { ReviewQueueRepository } from '../../repositories/ReviewQueueRepository';
import { closeTestDatabase, createMessage, createTestDatabase } from '../helpers/fixtures';

describe('ReviewQueueRepository', () => {
  let db: Database;
  let repository: ReviewQueueRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    repository = new ReviewQueueRepository(db);
  });

  afterEach(async () => {
    await closeTestDatabase(db);
  });

  it('should store a flagged message as pending', async () => {
    const message = createMessage({ id: 'r-1', subject: 'Quick update', body: 'Newsletter' });

    await repository.enqueue(message, 0.42);

    const item = await repository.get('r-1');
    expect(item).toMatchObject({
      messageId: 'r-1',
      sender: message.sender,
      subject: 'Quick update',
      body: 'Newsletter',
      score: 0.42,
      receivedAt: message.receivedAt,
      state: 'pending'
    });
    expect(item?.resolvedAt).toBeUndefined();
  });

  it('should return null for an unknown message', async () => {
    expect(await repository.get('missing')).toBeNull();
  });

  it('should keep an earlier decision when a message is flagged again', async () => {
    const message = createMessage({ id: 'r-1' });
    await repository.enqueue(message, 0.4);
    await repository.resolve('r-1', 'dismissed');

    await repository.enqueue(message, 0.45);

    const item = await repository.get('r-1');
    expect(item?.state).toBe('dismissed');
    expect(item?.score).toBe(0.45);
  });

  it('should list items by state, newest message first', async () => {
    await repository.enqueue(createMessage({ id: 'old', receivedAt: new Date('2024-01-01T00:00:00Z') }), 0.4);
    await repository.enqueue(createMessage({ id: 'new', receivedAt: new Date('2024-02-01T00:00:00Z') }), 0.4);
    await repository.enqueue(createMessage({ id: 'done', receivedAt: new Date('2024-03-01T00:00:00Z') }), 0.4);
    await repository.resolve('done', 'accepted');

    const pending = await repository.listByState();
    expect(pending.map(item => item.messageId)).toEqual(['new', 'old']);

    const accepted = await repository.listByState('accepted');
    expect(accepted.map(item => item.messageId)).toEqual(['done']);
    expect(accepted[0].resolvedAt).toBeInstanceOf(Date);
  });

  it('should only resolve pending items', async () => {
    await repository.enqueue(createMessage({ id: 'r-1' }), 0.4);

    expect(await repository.resolve('r-1', 'accepted')).toBe(true);
    expect(await repository.resolve('r-1', 'dismissed')).toBe(false);
    expect(await repository.resolve('missing', 'dismissed')).toBe(false);
    expect((await repository.get('r-1'))?.state).toBe('accepted');
  });
});
