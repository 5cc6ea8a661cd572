import { MailBatch } from '../../types/models';

/**
 * Anything that can hand the pipeline a batch of raw messages.
 * Implementations wrap their own failures in AdapterIngestionError. When more
 * mail matches than one batch holds, the oldest is handed over first.
 */
export interface MailSource {
  readonly name: string;
  fetchMessages(since: Date, signal?: AbortSignal): Promise<MailBatch>;
}
