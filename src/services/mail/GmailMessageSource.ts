/**
 * Gmail-backed MailSource: searches for application mail and fetches full messages
 */

import { google, gmail_v1 } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import { GmailConfig } from '../../config';
import { MailBatch, RawMessage } from '../../types/models';
import { AdapterIngestionError, errorMessage } from '../../models/errors';
import { MailSource } from './MailSource';
import { MessageParser } from './MessageParser';

export const DEFAULT_GMAIL_QUERY =
  'subject:("application" OR "applied" OR "applying" OR "interview" OR "your candidacy") -in:spam -in:trash';

/**
 * The two Gmail calls the source makes
 */
export interface GmailMessagesApi {
  list(params: gmail_v1.Params$Resource$Users$Messages$List): Promise<{ data: gmail_v1.Schema$ListMessagesResponse }>;
  get(params: gmail_v1.Params$Resource$Users$Messages$Get): Promise<{ data: gmail_v1.Schema$Message }>;
}

export function gmailMessagesApi(gmail: gmail_v1.Gmail): GmailMessagesApi {
  return {
    list: params => gmail.users.messages.list(params),
    get: params => gmail.users.messages.get(params)
  };
}

export interface GmailSourceOptions {
  query?: string;
  pageSize?: number;
  maxMessages?: number;
}

export class GmailMessageSource implements MailSource {
  readonly name = 'gmail';
  private readonly rateLimiter = new RateLimiter();
  private readonly query: string;
  private readonly pageSize: number;
  private readonly maxMessages: number;

  constructor(
    private readonly messagesApi: GmailMessagesApi,
    options: GmailSourceOptions = {},
    private readonly parser: MessageParser = new MessageParser()
  ) {
    this.query = options.query || DEFAULT_GMAIL_QUERY;
    this.pageSize = options.pageSize || 100;
    this.maxMessages = options.maxMessages || 500;
  }

  /**
   * Builds a source authenticated with a stored refresh token
   */
  static fromConfig(config: GmailConfig): GmailMessageSource {
    const authClient: OAuth2Client = new google.auth.OAuth2(config.clientId, config.clientSecret, config.redirectUri);
    authClient.setCredentials({ refresh_token: config.refreshToken });
    const gmail = google.gmail({ version: 'v1', auth: authClient });
    return new GmailMessageSource(gmailMessagesApi(gmail), { query: config.query });
  }

  async fetchMessages(since: Date, signal?: AbortSignal): Promise<MailBatch> {
    try {
      const { ids, truncated } = await this.listMessageIds(since, signal);
      console.log(`📥 [GMAIL] ${ids.length} candidate messages since ${since.toISOString()}`);
      if (truncated) {
        console.warn(`⚠️ [GMAIL] More than ${this.maxMessages} matches; newer mail is left for the next run`);
      }

      const messages: RawMessage[] = [];
      const unreadable: string[] = [];
      const batchSize = 10;
      for (let i = 0; i < ids.length; i += batchSize) {
        if (signal?.aborted) {
          break;
        }
        const batchIds = ids.slice(i, i + batchSize);
        const batch = await Promise.all(batchIds.map(id => this.fetchMessage(id)));
        batch.forEach((message, index) => {
          if (message) {
            messages.push(message);
          } else {
            unreadable.push(batchIds[index]);
          }
        });
      }

      return { messages, unreadable, truncated };
    } catch (error) {
      if (error instanceof AdapterIngestionError) {
        throw error;
      }
      throw new AdapterIngestionError(`Gmail fetch failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Every match after `since`, then the oldest `maxMessages` of them. Gmail
   * lists newest first, so the tail of the listing is the oldest mail.
   */
  private async listMessageIds(since: Date, signal?: AbortSignal): Promise<{ ids: string[]; truncated: boolean }> {
    const query = `${this.query} after:${Math.floor(since.getTime() / 1000)}`;
    const ids: string[] = [];
    let pageToken: string | undefined;

    do {
      await this.rateLimiter.waitForSlot();
      const response = await this.messagesApi.list({
        userId: 'me',
        q: query,
        maxResults: this.pageSize,
        pageToken,
        includeSpamTrash: false
      });

      for (const message of response.data.messages || []) {
        if (message.id) {
          ids.push(message.id);
        }
      }
      pageToken = response.data.nextPageToken || undefined;
    } while (pageToken && !signal?.aborted);

    const truncated = ids.length > this.maxMessages;
    return {
      ids: truncated ? ids.slice(ids.length - this.maxMessages) : ids,
      truncated
    };
  }

  private async fetchMessage(id: string): Promise<RawMessage | null> {
    await this.rateLimiter.waitForSlot();
    const response = await this.messagesApi.get({
      userId: 'me',
      id,
      format: 'full'
    });

    const parsed = this.parser.parseMessage(response.data);
    if (!parsed) {
      console.warn(`⚠️ [GMAIL] Message ${id} has no payload, skipping`);
    }
    return parsed;
  }
}

/**
 * Rate limiter to respect Gmail API quotas
 */
export class RateLimiter {
  private requests: number[] = [];

  constructor(
    private readonly maxRequestsPerWindow: number = 10,
    private readonly windowMs: number = 1000
  ) {}

  async waitForSlot(): Promise<void> {
    const now = Date.now();

    // Remove requests older than the window
    this.requests = this.requests.filter(time => now - time < this.windowMs);

    if (this.requests.length >= this.maxRequestsPerWindow) {
      const oldestRequest = Math.min(...this.requests);
      const waitTime = this.windowMs - (now - oldestRequest) + 10;

      if (waitTime > 0) {
        await new Promise(resolve => setTimeout(resolve, waitTime));
        return this.waitForSlot();
      }
    }

    this.requests.push(now);
  }
}
