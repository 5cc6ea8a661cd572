import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import request from 'supertest';
import express from 'express';
import { Database } from 'sqlite';
import { ReviewQueueRepository } from '../../repositories/ReviewQueueRepository';
import { closeTestDatabase, createMessage, createTestApp, createTestDatabase } from '../helpers/fixtures';

describe('ReviewController', () => {
  let db: Database;
  let app: express.Express;
  let reviewQueue: ReviewQueueRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    app = createTestApp(db).app;
    reviewQueue = new ReviewQueueRepository(db);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await reviewQueue.enqueue(createMessage({
      id: 'initech-1',
      sender: 'Initech Recruiting <recruiting@initech.com>',
      subject: 'Quick update',
      body: 'Here is the monthly newsletter.',
      receivedAt: new Date('2024-03-05T08:00:00Z')
    }), 0.41);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await closeTestDatabase(db);
  });

  it('should list pending items', async () => {
    const response = await request(app).get('/api/review');

    expect(response.status).toBe(200);
    expect(response.body.total).toBe(1);
    expect(response.body.items[0]).toMatchObject({
      messageId: 'initech-1',
      subject: 'Quick update',
      score: 0.41,
      state: 'pending',
      receivedAt: '2024-03-05T08:00:00.000Z'
    });
  });

  it('should accept an item into the tracker', async () => {
    const response = await request(app).post('/api/review/initech-1/accept');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      status: 'accepted',
      outcome: { kind: 'created', messageId: 'initech-1', recordId: expect.any(String) }
    });

    const applications = await request(app).get('/api/applications');
    expect(applications.body.applications[0]).toMatchObject({ companyName: 'Initech', sourceMessageIds: ['initech-1'] });
  });

  it('should return 409 for an item already decided', async () => {
    await request(app).post('/api/review/initech-1/dismiss');

    const response = await request(app).post('/api/review/initech-1/accept');

    expect(response.status).toBe(409);
    expect(response.body).toEqual({ error: 'Already resolved', message: 'Review item initech-1 was already dismissed' });
  });

  it('should dismiss an item', async () => {
    const response = await request(app).post('/api/review/initech-1/dismiss');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'dismissed' });
    expect((await request(app).get('/api/review')).body).toEqual({ items: [], total: 0 });
  });

  it('should return 404 for an unknown item', async () => {
    const response = await request(app).post('/api/review/missing/dismiss');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Not Found', message: 'No review item for message missing' });
  });

  it('should return 422 when no company can be extracted', async () => {
    await reviewQueue.enqueue(createMessage({
      id: 'anonymous',
      sender: 'someone@gmail.com',
      subject: 'Quick update',
      body: 'Nothing to see.'
    }), 0.4);

    const response = await request(app).post('/api/review/anonymous/accept');

    expect(response.status).toBe(422);
    expect(response.body).toEqual({
      error: 'Unprocessable message',
      message: 'No company could be extracted from message anonymous'
    });
    expect((await reviewQueue.get('anonymous'))?.state).toBe('pending');
  });
});
