/**
 * Turns raw subject/body pairs into clean text for the classifier and extractor
 */

import * as cheerio from 'cheerio';
import { NormalizedText } from '../../types/models';

const HTML_TAG_PATTERN = /<\s*(html|body|div|p|br|span|table|td|tr|a|b|strong|em|i|ul|ol|li|h[1-6]|img|style|head|meta|font|center)\b[^>]*>/i;
const BLOCK_ELEMENTS = 'p, div, li, tr, td, h1, h2, h3, h4, h5, h6, table, ul, ol, section, article, header, footer';

const ENTITIES: Array<[RegExp, string]> = [
  [/&nbsp;/gi, ' '],
  [/&lt;/gi, '<'],
  [/&gt;/gi, '>'],
  [/&quot;/gi, '"'],
  [/&#39;|&apos;/gi, "'"],
  [/&amp;/gi, '&']
];

export function looksLikeHtml(body: string): boolean {
  return HTML_TAG_PATTERN.test(body);
}

export function decodeEntities(text: string): string {
  return ENTITIES.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), text);
}

/**
 * Render HTML to text, keeping a line break at every block boundary
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $('head, style, script, noscript, blockquote, .gmail_quote').remove();
  $('br').replaceWith('\n');
  $(BLOCK_ELEMENTS).each((_, element) => {
    $(element).append('\n');
  });
  return $('body').text();
}

function isForwardHeader(lines: string[], index: number): boolean {
  if (!/^from:\s/i.test(lines[index].trim())) {
    return false;
  }
  return lines
    .slice(index + 1, index + 5)
    .some(line => /^(sent|date):\s/i.test(line.trim()));
}

function isReplyAttribution(lines: string[], index: number): boolean {
  const line = lines[index].trim();
  if (!/^on\s/i.test(line)) {
    return false;
  }
  if (/wrote:\s*$/i.test(line)) {
    return true;
  }
  const next = lines[index + 1];
  return next !== undefined && /^wrote:\s*$/i.test(next.trim());
}

/**
 * Remove quoted replies, forwarded headers and signatures
 */
export function stripQuotedReply(text: string): string {
  const lines = text.split(/\r?\n/);
  const kept: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const trimmed = line.trim();

    if (trimmed.startsWith('>')) {
      continue;
    }
    if (
      isReplyAttribution(lines, i) ||
      /^-{2,}\s*original message\s*-{2,}$/i.test(trimmed) ||
      isForwardHeader(lines, i) ||
      /^--\s*$/.test(line)
    ) {
      break;
    }
    kept.push(line);
  }

  return kept.join('\n');
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Normalize an email into subject/body text plus a lower-cased copy.
 * Pure and never throws.
 */
export function normalize(subject: string, body: string): NormalizedText {
  const plainBody = looksLikeHtml(body) ? htmlToText(body) : decodeEntities(body);
  const cleanBody = collapseWhitespace(stripQuotedReply(plainBody));
  const cleanSubject = collapseWhitespace(decodeEntities(subject));
  const text = [cleanSubject, cleanBody].filter(part => part.length > 0).join(' ');

  return {
    subject: cleanSubject,
    body: cleanBody,
    text,
    lowered: text.toLowerCase()
  };
}
