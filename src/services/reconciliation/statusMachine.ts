import { ApplicationStatus, StatusKeyword } from '../../types/models';

export const KEYWORD_STATUS: Record<StatusKeyword, ApplicationStatus> = {
  received: 'Applied',
  viewed: 'Viewed',
  interview: 'Interview',
  assessment: 'Assessment',
  offer: 'Offer',
  rejected: 'Rejected',
  withdrawn: 'Withdrawn'
};

const HAPPY_PATH: ApplicationStatus[] = ['Applied', 'Viewed', 'Interview', 'Assessment', 'Offer'];

export const INITIAL_STATUS: ApplicationStatus = 'Applied';

export function isTerminal(status: ApplicationStatus): boolean {
  return status === 'Rejected' || status === 'Withdrawn';
}

/**
 * Position on the happy path; terminal states rank above all of it
 */
export function rank(status: ApplicationStatus): number {
  return isTerminal(status) ? HAPPY_PATH.length : HAPPY_PATH.indexOf(status);
}

export function statusForKeyword(keyword: StatusKeyword | undefined): ApplicationStatus | undefined {
  return keyword ? KEYWORD_STATUS[keyword] : undefined;
}

/**
 * Forward-only transition. Terminal states absorb everything, a terminal
 * candidate always applies, otherwise only a higher rank moves the record.
 */
export function nextStatus(current: ApplicationStatus, candidate: ApplicationStatus | undefined): ApplicationStatus {
  if (candidate === undefined || isTerminal(current)) {
    return current;
  }
  if (isTerminal(candidate)) {
    return candidate;
  }
  return rank(candidate) > rank(current) ? candidate : current;
}

export function canTransition(from: ApplicationStatus, to: ApplicationStatus): boolean {
  return from !== to && nextStatus(from, to) === to;
}
