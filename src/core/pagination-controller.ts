import { logger } from '../utils/logger.js';
import { toScrapeError } from '../utils/error-handlers.js';
import { ScrapeError, ScrapeErrorType, errorMessage } from '../types/errors.js';
import { awaitCondition, dataRowSelector, elementHasText, freshDataRowsPresent, realSleep } from './readiness-gate.js';
import type { Sleep } from './readiness-gate.js';
import type { RenderHandle } from '../types/render-handle.js';
import type { ListingSite } from '../scrapers/types.js';
import type { RunState, TotalPagesSource } from '../types/scrape-run.js';

const log = logger.createContext('pagination');

export const MAX_CONSECUTIVE_FAILURES = 3;
export const DEFAULT_TOTAL_PAGES = 5;

export type PaginationState = 'init' | 'determining-count' | 'advancing' | 'exhausted' | 'aborted';

/**
 * Recovery strategies for a page whose table came up empty, in the order
 * they are tried. Aggressiveness N enables the first N.
 */
export const RECOVERY_STRATEGIES = ['scroll-retry', 'direct-request'] as const;
export type RecoveryStrategy = typeof RECOVERY_STRATEGIES[number];
export const MAX_AGGRESSIVENESS = RECOVERY_STRATEGIES.length;

export type AdvanceStrategy = 'click' | 'page-function';

export type AdvanceResult =
  | {
      ok: true;
      strategy: AdvanceStrategy;
      /** Fresh rows were seen before returning */
      confirmed: boolean;
      /** First data row text before the advance, null when there was none */
      previousFirstRow: string | null;
      /** Set when no fresh rows were seen */
      timeout?: ScrapeError;
    }
  | { ok: false; error: ScrapeError };

export interface PaginationTiming {
  pollIntervalMs: number;
  /** How long to wait for the total record count to render */
  totalRecordsTimeoutMs: number;
  /** How long to wait for rows after a pagination action */
  advanceTimeoutMs: number;
  /** Pause between scrolling a page link into view and clicking it */
  clickSettleMs: number;
  /** Pause after a confirmed advance */
  advanceSettleMs: number;
  sleep?: Sleep;
  now?: () => number;
}

export interface PaginationControllerOptions {
  maxPages?: number;
  defaultPages?: number;
  aggressiveness?: number;
  timing: PaginationTiming;
}

export function pagesForRecordCount(totalRecords: number, pageSize: number): number {
  return Math.ceil(totalRecords / pageSize);
}

/**
 * Parse a displayed record count such as "97" or "1,204".
 * Returns null for anything that is not a whole number.
 */
export function parseRecordCount(text: string): number | null {
  const cleaned = text.trim().replace(/[,\s]/g, '');
  if (!/^\d+$/.test(cleaned)) return null;
  return parseInt(cleaned, 10);
}

/**
 * Drives page discovery and page-to-page movement over one render handle and
 * keeps the consecutive failure count that decides when a run gives up.
 */
export class PaginationController {
  private _state: PaginationState = 'init';
  private readonly sleep: Sleep;
  private readonly aggressiveness: number;

  constructor(
    private readonly handle: RenderHandle,
    private readonly site: ListingSite,
    private readonly run: RunState,
    private readonly options: PaginationControllerOptions
  ) {
    this.sleep = options.timing.sleep ?? realSleep;
    this.aggressiveness = Math.max(0, Math.min(MAX_AGGRESSIVENESS, options.aggressiveness ?? MAX_AGGRESSIVENESS));
  }

  get state(): PaginationState {
    return this._state;
  }

  get currentPage(): number {
    return this.run.currentPage;
  }

  get totalPages(): number {
    return this.run.totalPages;
  }

  get consecutiveFailures(): number {
    return this.run.consecutiveFailures;
  }

  recoveryPlan(): readonly RecoveryStrategy[] {
    return RECOVERY_STRATEGIES.slice(0, this.aggressiveness);
  }

  /**
   * Estimate the page count from the displayed total, falling back to the
   * highest page number in the pagination markup, then to the default.
   * `maxPages` caps whichever source wins.
   */
  async determineTotalPages(): Promise<{ totalPages: number; source: TotalPagesSource }> {
    this._state = 'determining-count';

    let estimate = await this.pagesFromRecordCount();
    let source: TotalPagesSource = 'record-count';

    if (estimate === null) {
      estimate = await this.pagesFromPaginationScan();
      source = 'pagination-scan';
    }

    if (estimate === null) {
      estimate = this.options.defaultPages ?? DEFAULT_TOTAL_PAGES;
      source = 'default';
      log.normal(`Could not determine page count, using default of ${estimate}`);
    }

    const { maxPages } = this.options;
    if (maxPages !== undefined && maxPages < estimate) {
      log.normal(`Limiting to ${maxPages} pages (of ${estimate})`);
      estimate = maxPages;
    }

    this.run.totalPages = estimate;
    this.run.currentPage = 1;
    this._state = estimate >= 1 ? 'advancing' : 'exhausted';
    log.normal(`Total pages: ${estimate} (from ${source})`);

    return { totalPages: estimate, source };
  }

  private async pagesFromRecordCount(): Promise<number | null> {
    const { timing } = this.options;
    const rendered = await awaitCondition(elementHasText(this.handle, this.site.totalRecordsId), {
      timeoutMs: timing.totalRecordsTimeoutMs,
      intervalMs: timing.pollIntervalMs,
      sleep: this.sleep,
      now: timing.now
    });
    if (!rendered) {
      log.verbose(`#${this.site.totalRecordsId} did not render`);
      return null;
    }

    try {
      const [element] = await this.handle.find('id', this.site.totalRecordsId);
      const text = element ? await element.text() : '';
      const totalRecords = parseRecordCount(text);
      if (totalRecords === null || totalRecords === 0) {
        log.verbose(`Unusable record count "${text.trim()}"`);
        return null;
      }

      log.normal(`Total records: ${totalRecords}`);
      return pagesForRecordCount(totalRecords, this.site.pageSize);
    } catch (error) {
      log.warn(`Could not read record count: ${errorMessage(error)}`);
      return null;
    }
  }

  private async pagesFromPaginationScan(): Promise<number | null> {
    const { itemSelector, pageAttribute } = this.site.pagination;
    try {
      const items = await this.handle.find('css', itemSelector);
      let highest = 0;
      for (const item of items) {
        const value = await item.attribute(pageAttribute);
        if (value && /^\d+$/.test(value)) {
          highest = Math.max(highest, parseInt(value, 10));
        }
      }
      if (highest === 0) return null;

      log.normal(`Estimated ${highest} pages from pagination`);
      return highest;
    } catch (error) {
      log.warn(`Pagination scan failed: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Move the rendered listing to `target` (one-based). Click its pagination
   * link and wait for fresh rows; when the link is missing, the click throws
   * or no fresh rows arrive, call the page's own pagination function instead.
   * The page-function path succeeds even if rows never change (`confirmed`
   * false), since a lazily rendered page may only fill in after a scroll.
   * Fails only when no navigation could be performed. Never throws.
   */
  async advance(target: number): Promise<AdvanceResult> {
    const { timing } = this.options;
    const previousFirstRow = await this.firstRowText();

    if (await this.clickPageLink(target)) {
      if (await this.waitForFreshRows(previousFirstRow)) {
        await this.sleep(timing.advanceSettleMs);
        log.verbose(`Advanced to page ${target} via click`);
        return { ok: true, strategy: 'click', confirmed: true, previousFirstRow };
      }
      log.warn(`Rows for page ${target} did not render within ${timing.advanceTimeoutMs}ms of the click`);
    }

    try {
      await this.callPageFunction(target);
    } catch (error) {
      const scrapeError = toScrapeError(error, ScrapeErrorType.NAVIGATION, target);
      log.warn(`Could not navigate to page ${target}: ${scrapeError.message}`);
      return { ok: false, error: scrapeError };
    }

    const confirmed = await this.waitForFreshRows(previousFirstRow);
    await this.sleep(timing.advanceSettleMs);
    if (confirmed) {
      log.verbose(`Advanced to page ${target} via ${this.site.pagination.pageFunction}()`);
      return { ok: true, strategy: 'page-function', confirmed, previousFirstRow };
    }

    const timeout = new ScrapeError(
      ScrapeErrorType.TIMEOUT,
      `Rows for page ${target} did not render within ${timing.advanceTimeoutMs}ms`,
      { pageIndex: target }
    );
    log.warn(`${timeout.message}, continuing`);
    return { ok: true, strategy: 'page-function', confirmed, previousFirstRow, timeout };
  }

  private waitForFreshRows(previousFirstRow: string | null): Promise<boolean> {
    const { timing } = this.options;
    return awaitCondition(freshDataRowsPresent(this.handle, this.site, previousFirstRow), {
      timeoutMs: timing.advanceTimeoutMs,
      intervalMs: timing.pollIntervalMs,
      sleep: this.sleep,
      now: timing.now
    });
  }

  private async clickPageLink(target: number): Promise<boolean> {
    const { itemSelector, pageAttribute, controlClass } = this.site.pagination;
    const selector = `${itemSelector}[${pageAttribute}="${target}"]:not(.${controlClass})`;

    try {
      const [link] = await this.handle.find('css', selector);
      if (!link) {
        log.verbose(`No pagination link for page ${target}`);
        return false;
      }

      await link.scrollIntoView();
      await this.sleep(this.options.timing.clickSettleMs);
      await link.click();
      return true;
    } catch (error) {
      log.warn(`Clicking page ${target} failed: ${errorMessage(error)}`);
      return false;
    }
  }

  // The page function takes a zero-based page number
  private async callPageFunction(target: number): Promise<void> {
    log.verbose(`Using ${this.site.pagination.pageFunction}() to navigate to page ${target}`);
    await this.handle.runScript(`${this.site.pagination.pageFunction}(${target - 1})`);
  }

  private async firstRowText(): Promise<string | null> {
    try {
      const [row] = await this.handle.find('css', dataRowSelector(this.site));
      return row ? await row.text() : null;
    } catch {
      return null;
    }
  }

  /**
   * Close out the current page. Any record resets the failure count; none
   * adds one. Moves to the next page, or to `aborted`/`exhausted`.
   */
  recordPageOutcome(recordCount: number): PaginationState {
    if (recordCount > 0) {
      this.run.consecutiveFailures = 0;
    } else {
      this.run.consecutiveFailures++;
      log.verbose(`Page ${this.run.currentPage} failed (${this.run.consecutiveFailures} consecutive)`);
    }

    this.run.currentPage++;

    if (this.run.consecutiveFailures >= MAX_CONSECUTIVE_FAILURES) {
      this._state = 'aborted';
      log.warn(`Stopped after ${this.run.consecutiveFailures} consecutive failed pages`);
    } else if (this.run.currentPage > this.run.totalPages) {
      this._state = 'exhausted';
    }

    return this._state;
  }
}
