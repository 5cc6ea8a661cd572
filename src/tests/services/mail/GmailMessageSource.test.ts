import { describe, it, expect, jest } from '@jest/globals';
import { gmail_v1 } from 'googleapis';
import { GmailMessageSource, GmailMessagesApi, DEFAULT_GMAIL_QUERY, RateLimiter } from '../../../services/mail/GmailMessageSource';
import { AdapterIngestionError } from '../../../models/errors';

function encode(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

function gmailMessage(id: string, subject: string): gmail_v1.Schema$Message {
  return {
    id,
    internalDate: String(Date.UTC(2024, 2, 1)),
    payload: {
      mimeType: 'text/plain',
      headers: [
        { name: 'From', value: 'Acme Careers <jobs@acme.com>' },
        { name: 'Subject', value: subject }
      ],
      body: { data: encode(`Body of ${id}`) }
    }
  };
}

class FakeGmail implements GmailMessagesApi {
  readonly listCalls: gmail_v1.Params$Resource$Users$Messages$List[] = [];
  readonly getCalls: string[] = [];

  constructor(
    private readonly pages: gmail_v1.Schema$ListMessagesResponse[],
    private readonly store: Record<string, gmail_v1.Schema$Message>,
    private readonly failure?: Error
  ) {}

  async list(params: gmail_v1.Params$Resource$Users$Messages$List): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }> {
    if (this.failure) {
      throw this.failure;
    }
    this.listCalls.push(params);
    return { data: this.pages[this.listCalls.length - 1] ?? {} };
  }

  async get(params: gmail_v1.Params$Resource$Users$Messages$Get): Promise<{ data: gmail_v1.Schema$Message }> {
    const id = params.id ?? '';
    this.getCalls.push(id);
    return { data: this.store[id] ?? {} };
  }
}

describe('GmailMessageSource', () => {
  const since = new Date('2024-02-01T00:00:00Z');
  const store = {
    a: gmailMessage('a', 'Application received'),
    b: gmailMessage('b', 'Interview invitation'),
    c: gmailMessage('c', 'Application update')
  };

  it('should search after the checkpoint and fetch every listed message', async () => {
    const gmail = new FakeGmail([{ messages: [{ id: 'a' }, { id: 'b' }] }], store);
    const source = new GmailMessageSource(gmail);

    const { messages, unreadable, truncated } = await source.fetchMessages(since);

    expect(gmail.listCalls[0]).toMatchObject({
      userId: 'me',
      q: `${DEFAULT_GMAIL_QUERY} after:${since.getTime() / 1000}`,
      maxResults: 100
    });
    expect(gmail.getCalls).toEqual(['a', 'b']);
    expect(messages.map(message => [message.id, message.subject, message.body])).toEqual([
      ['a', 'Application received', 'Body of a'],
      ['b', 'Interview invitation', 'Body of b']
    ]);
    expect(unreadable).toEqual([]);
    expect(truncated).toBe(false);
  });

  it('should follow page tokens to the last page', async () => {
    const gmail = new FakeGmail([
      { messages: [{ id: 'c' }], nextPageToken: 'page-2' },
      { messages: [{ id: 'b' }], nextPageToken: 'page-3' },
      { messages: [{ id: 'a' }] }
    ], store);
    const source = new GmailMessageSource(gmail, { query: 'label:jobs', pageSize: 1 });

    const { messages, truncated } = await source.fetchMessages(since);

    expect(gmail.listCalls.map(call => call.pageToken)).toEqual([undefined, 'page-2', 'page-3']);
    expect(gmail.listCalls[0].q).toBe(`label:jobs after:${since.getTime() / 1000}`);
    expect(messages.map(message => message.id)).toEqual(['c', 'b', 'a']);
    expect(truncated).toBe(false);
  });

  it('should keep the oldest matches when more than the cap are listed', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    // Gmail lists newest first
    const gmail = new FakeGmail([
      { messages: [{ id: 'c' }, { id: 'b' }], nextPageToken: 'page-2' },
      { messages: [{ id: 'a' }] }
    ], store);
    const source = new GmailMessageSource(gmail, { pageSize: 2, maxMessages: 2 });

    const { messages, truncated } = await source.fetchMessages(since);

    expect(gmail.listCalls).toHaveLength(2);
    expect(gmail.getCalls).toEqual(['b', 'a']);
    expect(messages.map(message => message.id)).toEqual(['b', 'a']);
    expect(truncated).toBe(true);
    warnSpy.mockRestore();
  });

  it('should report messages without a payload as unreadable', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const gmail = new FakeGmail([{ messages: [{ id: 'a' }, { id: 'gone' }] }], store);

    const { messages, unreadable } = await new GmailMessageSource(gmail).fetchMessages(since);

    expect(messages.map(message => message.id)).toEqual(['a']);
    expect(unreadable).toEqual(['gone']);
    expect(warnSpy).toHaveBeenCalledWith('⚠️ [GMAIL] Message gone has no payload, skipping');
    warnSpy.mockRestore();
  });

  it('should stop fetching once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const gmail = new FakeGmail([{ messages: [{ id: 'a' }] }], store);

    const batch = await new GmailMessageSource(gmail).fetchMessages(since, controller.signal);

    expect(batch).toEqual({ messages: [], unreadable: [], truncated: false });
    expect(gmail.getCalls).toEqual([]);
  });

  it('should wrap API failures in AdapterIngestionError', async () => {
    const gmail = new FakeGmail([], store, new Error('invalid_grant'));

    const fetching = new GmailMessageSource(gmail).fetchMessages(since);

    await expect(fetching).rejects.toThrow(AdapterIngestionError);
    await expect(fetching).rejects.toThrow('Gmail fetch failed: invalid_grant');
  });
});

describe('RateLimiter', () => {
  it('should let requests through until the window is full', async () => {
    const limiter = new RateLimiter(3, 60_000);
    const started = Date.now();

    await limiter.waitForSlot();
    await limiter.waitForSlot();
    await limiter.waitForSlot();

    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('should wait for the window to move once it is full', async () => {
    const limiter = new RateLimiter(1, 50);
    const started = Date.now();

    await limiter.waitForSlot();
    await limiter.waitForSlot();

    expect(Date.now() - started).toBeGreaterThanOrEqual(50);
  });
});
