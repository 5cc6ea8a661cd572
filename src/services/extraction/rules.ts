/**
 * Ordered extraction rules. Each rule is a pure function returning a value or
 * undefined; the first rule with a value wins.
 */

import { NormalizedText, StatusKeyword } from '../../types/models';
import { ParsedAddress, registrableLabel } from '../../utils/address';
import senderDomains from './senderDomains.json';

export interface ExtractionContext {
  normalized: NormalizedText;
  sender: ParsedAddress;
}

export type FieldRule<T> = (context: ExtractionContext) => T | undefined;

export function firstMatch<T>(rules: ReadonlyArray<FieldRule<T>>, context: ExtractionContext): T | undefined {
  for (const rule of rules) {
    const value = rule(context);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

// ---- Company ----

const SENDER_SUFFIXES = /\s+(careers|recruiting|recruitment|talent acquisition|talent|hiring|team|hr|jobs|people)\s*$/i;

const GENERIC_SENDER_NAMES = /^(no[- ]?reply|do[- ]?not[- ]?reply|recruiting|recruitment|careers|talent|hr|jobs|hiring|notifications?|info|support|admin|hello|team|mailer|updates?|alerts?)$/i;

const NOT_A_COMPANY = new Set([
  'the', 'a', 'an', 'your', 'our', 'this', 'that', 'us', 'we', 'you', 'i',
  'thank', 'thanks', 'hi', 'hello', 'dear', 'application', 'confirmation',
  'update', 'status', 're', 'fwd', 'fw', 'interview', 'position', 'role'
]);

function isIgnoredDomain(domain: string): boolean {
  const matches = (candidate: string) => domain === candidate || domain.endsWith(`.${candidate}`);
  return senderDomains.genericProviders.some(matches) || senderDomains.atsDomains.some(matches);
}

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function cleanCompanyName(name: string): string | undefined {
  let cleaned = name.replace(/\s+/g, ' ').trim();
  // "Acme Careers Team" -> "Acme"
  while (SENDER_SUFFIXES.test(cleaned)) {
    cleaned = cleaned.replace(SENDER_SUFFIXES, '').trim();
  }
  cleaned = cleaned.replace(/^(the)\s+/i, '').replace(/[\s.,;:!?'"-]+$/, '').trim();

  if (cleaned.length < 2 || cleaned.length > 80) {
    return undefined;
  }
  if (NOT_A_COMPANY.has(cleaned.toLowerCase())) {
    return undefined;
  }
  return cleaned;
}

const PHRASE_STOP_WORDS = /^(req|requisition|job|position|role|id|for|and|we|i|you|your|our)$/i;

/**
 * Leading run of capitalized words in `fragment`, stopping at sentence
 * punctuation or a field label such as "Position:"
 */
export function leadingProperNoun(fragment: string, maxWords = 6): string | undefined {
  const words = fragment.trim().split(/\s+/);
  const taken: string[] = [];

  for (const raw of words) {
    if (raw.endsWith(':')) {
      break;
    }
    const word = raw.replace(/[.,;!?)"']+$/, '');
    if (PHRASE_STOP_WORDS.test(word)) {
      break;
    }
    const isName = /^[A-Z0-9][A-Za-z0-9&'.-]*$/.test(word) || (word === '&' && taken.length > 0);
    if (!isName) {
      break;
    }
    taken.push(word);
    if (word !== raw || taken.length >= maxWords) {
      break;
    }
  }

  while (taken.length > 0 && taken[taken.length - 1] === '&') {
    taken.pop();
  }
  return taken.length > 0 ? taken.join(' ') : undefined;
}

const companyFromSender: FieldRule<string> = ({ sender }) => {
  if (!sender.domain || isIgnoredDomain(sender.domain)) {
    return undefined;
  }
  const fromName = sender.displayName && !GENERIC_SENDER_NAMES.test(sender.displayName.trim())
    ? cleanCompanyName(sender.displayName)
    : undefined;
  if (fromName) {
    return fromName;
  }
  const label = registrableLabel(sender.domain);
  return label.length >= 2 ? titleCase(label) : undefined;
};

function companyAfter(pattern: RegExp): FieldRule<string> {
  return ({ normalized }) => {
    const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
    const matcher = new RegExp(pattern.source, flags);
    for (const part of [normalized.subject, normalized.body]) {
      for (const match of part.matchAll(matcher)) {
        const start = (match.index ?? 0) + match[0].length;
        const phrase = leadingProperNoun(part.slice(start).replace(/^(the)\s+/i, ''));
        const company = phrase ? cleanCompanyName(phrase) : undefined;
        if (company) {
          return company;
        }
      }
    }
    return undefined;
  };
}

const companyFromApplyPhrase = companyAfter(/\b(?:applying to|application to|applied to|interest in)\s+/i);

// Case-sensitive on purpose: "at" / "with" followed by a capitalized name
const companyFromAtWith = companyAfter(/\b(?:at|with)\s+(?=[A-Z])/);

const companyFromField: FieldRule<string> = ({ normalized }) => {
  const match = normalized.body.match(/\bcompany(?:\s+name)?\s*[:\-]\s*/i);
  if (!match || match.index === undefined) {
    return undefined;
  }
  const phrase = leadingProperNoun(normalized.body.slice(match.index + match[0].length));
  return phrase ? cleanCompanyName(phrase) : undefined;
};

export const COMPANY_RULES: ReadonlyArray<FieldRule<string>> = [
  companyFromSender,
  companyFromApplyPhrase,
  companyFromAtWith,
  companyFromField
];

// ---- Title ----

const GENERIC_TITLE = /^(thank you|thanks|application|confirmation|update|status|their interest|your interest|our team|the team|this|that|it|dear|hi|hello|regarding|re|fwd|fw)\b/i;

const TITLE_CHARS = "[A-Za-z0-9 /&+#(),'-]";

export function cleanTitle(candidate: string): string | undefined {
  const title = candidate.replace(/\s+/g, ' ').replace(/^(the|a|an)\s+/i, '').replace(/[\s,'-]+$/, '').trim();
  if (title.length < 3 || title.length > 100 || GENERIC_TITLE.test(title)) {
    return undefined;
  }
  return title;
}

// Subject and body separately: a subject has no terminating punctuation
function titleFrom(pattern: RegExp): FieldRule<string> {
  return ({ normalized }) => {
    for (const part of [normalized.subject, normalized.body]) {
      const match = part.match(pattern);
      const title = match ? cleanTitle(match[1]) : undefined;
      if (title) {
        return title;
      }
    }
    return undefined;
  };
}

export const TITLE_RULES: ReadonlyArray<FieldRule<string>> = [
  titleFrom(new RegExp(
    `\\bapplication for (?:the\\s+)?(?:position of\\s+)?(${TITLE_CHARS}{3,100}?)(?=\\s+(?:position|role|at|with|has|is|was)\\b|[.;:!|]|$)`,
    'i'
  )),
  titleFrom(new RegExp(`\\b(?:for|as) (?:the|a|an)\\s+(${TITLE_CHARS}{3,100}?)\\s+(?:position|role)\\b`, 'i')),
  titleFrom(new RegExp(
    `\\b(?:position|role|job title)\\s*:\\s*(${TITLE_CHARS}{3,100}?)(?=\\s+(?:at|with|in|is|company|location|req|job)\\b|[.;:!|]|$)`,
    'i'
  ))
];

// ---- Job id ----

const JOB_ID_PATTERNS: RegExp[] = [
  /\b(?:job\s*id|job\s*req|req(?:uisition)?(?:\s*id)?)\b\s*[:#]?\s*#?\s*([A-Za-z0-9][A-Za-z0-9\-_/]*)/gi,
  /#\s?([A-Za-z0-9][A-Za-z0-9\-_/]*)/g
];

const jobIdFromText: FieldRule<string> = ({ normalized }) => {
  for (const pattern of JOB_ID_PATTERNS) {
    for (const match of normalized.text.matchAll(pattern)) {
      const candidate = match[1].replace(/[-_/]+$/, '');
      if (/\d/.test(candidate)) {
        return candidate;
      }
    }
  }
  return undefined;
};

export const JOB_ID_RULES: ReadonlyArray<FieldRule<string>> = [jobIdFromText];

// ---- Status keyword ----

// Evaluation order matters: rejection wording beats "received" boilerplate
export const STATUS_PATTERNS: ReadonlyArray<[StatusKeyword, RegExp[]]> = [
  ['rejected', [
    /not (?:be )?moving forward/,
    // Bare "unfortunately" also opens reschedules and delays
    /unfortunately[^.!?]*\b(?:not|unable)\b[^.!?]*\b(?:move|moving|proceed|progress|selected|offer)/,
    /regret to inform/,
    /(?:move|moving|go|going|proceed|proceeding) (?:forward|ahead) with other candidates/,
    /(?:pursue|pursuing) other candidates/,
    /other candidates whose/,
    /not (?:been )?selected/,
    /decided not to proceed/,
    /position has been filled/,
    /(?:will not|won't) be moving forward/
  ]],
  ['withdrawn', [
    /\bwithdr(?:awn|ew|awal)\b/
  ]],
  ['offer', [
    /offer letter/,
    /job offer/,
    /pleased to offer/,
    /extend (?:you )?an offer/,
    /offer of employment/
  ]],
  ['assessment', [
    /\bassessment/,
    /coding challenge/,
    /take-home/,
    /online test/,
    /hackerrank/,
    /codesignal/,
    /codility/
  ]],
  ['interview', [
    /\binterview/,
    /phone screen/,
    /schedule a call/
  ]],
  ['viewed', [
    /viewed your application/,
    /application (?:was|has been) viewed/
  ]],
  ['received', [
    /thank you for (?:applying|your application|submitting)/,
    /thanks for applying/,
    /application (?:has been )?received/,
    /we (?:have )?received your application/,
    /application confirmation/,
    /successfully (?:applied|submitted)/,
    /submission has been received/
  ]]
];

const statusFromKeywords: FieldRule<StatusKeyword> = ({ normalized }) => {
  for (const [keyword, patterns] of STATUS_PATTERNS) {
    if (patterns.some(pattern => pattern.test(normalized.lowered))) {
      return keyword;
    }
  }
  return undefined;
};

export const STATUS_RULES: ReadonlyArray<FieldRule<StatusKeyword>> = [statusFromKeywords];
