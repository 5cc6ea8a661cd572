import { ApplicationStatus, DedupKey, Extraction } from '../../types/models';
import { buildDedupKey } from './dedupKey';
import { INITIAL_STATUS, isTerminal, nextStatus, statusForKeyword } from './statusMachine';

/**
 * What the store knows about an existing record when choosing a match
 */
export interface MatchCandidate {
  id: string;
  dedupKey: string;
  titleKey?: string;
  jobId: string;
  status: ApplicationStatus;
  lastUpdated: Date;
}

export interface RecordState {
  status: ApplicationStatus;
  applicationDate: Date;
  lastUpdated: Date;
}

export interface ReconciledState extends RecordState {
  statusChanged: boolean;
  previousStatus: ApplicationStatus;
}

function newestFirst(a: MatchCandidate, b: MatchCandidate): number {
  return b.lastUpdated.getTime() - a.lastUpdated.getTime();
}

/**
 * Dedup and lifecycle rules shared by the store and the pipeline
 */
export class ReconciliationEngine {
  keyFor(extraction: Extraction): DedupKey {
    return buildDedupKey(extraction);
  }

  /**
   * Pick the record an extraction belongs to among the records of its company.
   * Exact key first; without a job id, same title; without either, the
   * freshest open record of the company, then the freshest record at all.
   */
  selectMatch<T extends MatchCandidate>(key: DedupKey, companyRecords: T[]): T | undefined {
    const exact = companyRecords.find(candidate => candidate.dedupKey === key.value);
    if (exact) {
      return exact;
    }
    if (key.jobKey) {
      return undefined;
    }

    const ordered = [...companyRecords].sort(newestFirst);
    if (key.titleKey) {
      return ordered.find(candidate => candidate.titleKey === key.titleKey);
    }
    return ordered.find(candidate => !isTerminal(candidate.status)) ?? ordered[0];
  }

  /**
   * State of a brand new record: starts Applied, then takes the creating message's keyword
   */
  initialState(extraction: Extraction): RecordState {
    return {
      status: nextStatus(INITIAL_STATUS, statusForKeyword(extraction.statusKeyword)),
      applicationDate: extraction.observedDate,
      lastUpdated: extraction.observedDate
    };
  }

  /**
   * Fold one more message into an existing record
   */
  apply(current: RecordState, extraction: Extraction): ReconciledState {
    const observed = extraction.observedDate.getTime();
    const status = nextStatus(current.status, statusForKeyword(extraction.statusKeyword));

    return {
      status,
      previousStatus: current.status,
      statusChanged: status !== current.status,
      applicationDate: new Date(Math.min(current.applicationDate.getTime(), observed)),
      lastUpdated: new Date(Math.max(current.lastUpdated.getTime(), observed))
    };
  }
}
