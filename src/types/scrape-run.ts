import type { ExhibitorRecord } from './exhibitor.js';
import type { ScrapeError } from './errors.js';

export type TotalPagesSource = 'record-count' | 'pagination-scan' | 'default';

/**
 * Mutable state of one run. Owned by the engine; the pagination controller
 * moves `currentPage`, `totalPages` and `consecutiveFailures`, the engine
 * appends to `aggregate`.
 */
export interface RunState {
  totalPages: number;
  currentPage: number;
  consecutiveFailures: number;
  aggregate: ExhibitorRecord[];
}

export interface PageState {
  pageIndex: number;
  recordsFound: ExhibitorRecord[];
  extractionAttempts: number;
}

/**
 * Result of one page-level operation. `empty` is an expected outcome, not an error.
 */
export type PageOutcome =
  | { kind: 'success'; records: ExhibitorRecord[] }
  | { kind: 'empty' }
  | { kind: 'error'; error: ScrapeError };

export type PageSource = 'table' | 'scroll-retry' | 'direct-request';

export interface PageReport {
  pageIndex: number;
  recordCount: number;
  extractionAttempts: number;
  /** Which path produced the records, absent when none did */
  source?: PageSource;
  error?: string;
}

export type RunStatus = 'exhausted' | 'aborted' | 'failed';

export interface RunResult {
  status: RunStatus;
  records: readonly ExhibitorRecord[];
  totalPages: number;
  totalPagesSource?: TotalPagesSource;
  pagesVisited: number;
  consecutiveFailures: number;
  pages: readonly PageReport[];
  durationMs: number;
  error?: string;
}

export function createRunState(): RunState {
  return {
    totalPages: 0,
    currentPage: 1,
    consecutiveFailures: 0,
    aggregate: []
  };
}
