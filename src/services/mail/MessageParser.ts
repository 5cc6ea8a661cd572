/**
 * MessageParser turns Gmail API messages into RawMessage values
 */

import { gmail_v1 } from 'googleapis';
import { RawMessage } from '../../types/models';

interface BodyParts {
  text: string;
  html: string;
}

export class MessageParser {
  /**
   * Parses a full-format Gmail message. Returns null when it has no id or payload.
   */
  parseMessage(message: gmail_v1.Schema$Message): RawMessage | null {
    if (!message.id || !message.payload) {
      return null;
    }

    const headers = this.extractHeaders(message.payload);
    const body = this.extractBody(message.payload);
    const internalDate = Number.parseInt(message.internalDate || '', 10);
    const receivedAt = Number.isFinite(internalDate)
      ? new Date(internalDate)
      : new Date(headers.get('date') || Date.now());

    return {
      id: message.id,
      threadId: message.threadId || undefined,
      sender: headers.get('from') || '',
      subject: headers.get('subject') || '',
      // Plain text when present; the normalizer strips HTML otherwise
      body: body.text || body.html || message.snippet || '',
      receivedAt
    };
  }

  /**
   * Extracts headers from Gmail message payload, keyed by lower-cased name
   */
  private extractHeaders(payload: gmail_v1.Schema$MessagePart): Map<string, string> {
    const headers = new Map<string, string>();

    if (payload.headers) {
      for (const header of payload.headers) {
        if (header.name && header.value) {
          headers.set(header.name.toLowerCase(), header.value);
        }
      }
    }

    return headers;
  }

  private extractBody(payload: gmail_v1.Schema$MessagePart): BodyParts {
    const result: BodyParts = { text: '', html: '' };

    // Single part message
    if (payload.body?.data) {
      const content = this.decodeBase64Url(payload.body.data);
      if (payload.mimeType === 'text/html') {
        result.html = content;
      } else {
        result.text = content;
      }
      return result;
    }

    if (payload.parts) {
      this.extractBodyFromParts(payload.parts, result);
    }

    return result;
  }

  /**
   * Recursively collects text/plain and text/html parts, skipping attachments
   */
  private extractBodyFromParts(parts: gmail_v1.Schema$MessagePart[], result: BodyParts): void {
    for (const part of parts) {
      if (part.filename) {
        continue;
      }
      if (part.mimeType === 'text/plain' && part.body?.data) {
        result.text += this.decodeBase64Url(part.body.data);
      } else if (part.mimeType === 'text/html' && part.body?.data) {
        result.html += this.decodeBase64Url(part.body.data);
      } else if (part.parts) {
        this.extractBodyFromParts(part.parts, result);
      }
    }
  }

  /**
   * Decodes base64url encoded data
   */
  decodeBase64Url(data: string): string {
    const base64 = data.replace(/-/g, '+').replace(/_/g, '/');
    const padded = base64 + '='.repeat((4 - base64.length % 4) % 4);

    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(padded)) {
      console.error('❌ [GMAIL] Skipping part with invalid base64url data');
      return '';
    }

    return Buffer.from(padded, 'base64').toString('utf-8');
  }
}
