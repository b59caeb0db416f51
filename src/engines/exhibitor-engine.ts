import { logger, formatTime, LogLevel } from '../utils/logger.js';
import { toScrapeError } from '../utils/error-handlers.js';
import { ScrapeErrorType } from '../types/errors.js';
import { DEFAULT_TIMING } from '../config/scrape-config.js';
import { PaginationController } from '../core/pagination-controller.js';
import { awaitCondition, classPresent, elementExists, freshDataRowsPresent, realSleep } from '../core/readiness-gate.js';
import { describeTableState, extractRecords } from '../core/row-extractor.js';
import { fetchPageViaDirectRequest } from '../core/fallback-acquirer.js';
import { createRunState } from '../types/scrape-run.js';
import type { Sleep } from '../core/readiness-gate.js';
import type { RecoveryStrategy } from '../core/pagination-controller.js';
import type { ScrapeTimingConfig } from '../config/scrape-config.js';
import type { ListingSite } from '../scrapers/types.js';
import type { RenderHandle, RenderHandleFactory } from '../types/render-handle.js';
import type {
  PageOutcome,
  PageReport,
  PageSource,
  PageState,
  RunResult,
  RunState,
  RunStatus,
  TotalPagesSource
} from '../types/scrape-run.js';

const log = logger.createContext('exhibitor-engine');

export const SCROLL_TO_BOTTOM = 'window.scrollTo(0, document.body.scrollHeight)';
export const SCROLL_TO_TOP = 'window.scrollTo(0, 0)';

export interface ScrapeRunOptions {
  /** Upper bound on the number of pages visited */
  maxPages?: number;
  /** Page count to assume when the page does not reveal one */
  defaultPages?: number;
  /** Number of recovery strategies tried on an empty page (0-2) */
  aggressiveness?: number;
  timing?: Partial<ScrapeTimingConfig>;
}

export interface EngineClock {
  sleep: Sleep;
  now: () => number;
}

interface RunContext {
  handle: RenderHandle;
  timing: ScrapeTimingConfig;
}

/**
 * How far the rendered table can be trusted for the current page. Rows whose
 * first line equals `staleFirstRow` still belong to the page before.
 */
interface TableView {
  staleFirstRow: string | null;
}

/**
 * Runs one scrape over a listing site: acquire a render handle, find the page
 * count, then gate, extract, recover and advance page by page. The handle is
 * released on every exit path and whatever was collected is returned.
 */
export class ExhibitorScrapeEngine {
  private readonly clock: EngineClock;

  constructor(
    private readonly site: ListingSite,
    private readonly openHandle: RenderHandleFactory,
    clock: Partial<EngineClock> = {}
  ) {
    this.clock = {
      sleep: clock.sleep ?? realSleep,
      now: clock.now ?? Date.now
    };
  }

  async run(options: ScrapeRunOptions = {}): Promise<RunResult> {
    const startTime = this.clock.now();
    const timing: ScrapeTimingConfig = { ...DEFAULT_TIMING, ...options.timing };
    const state = createRunState();
    const pages: PageReport[] = [];

    let handle: RenderHandle | undefined;
    let status: RunStatus = 'exhausted';
    let totalPagesSource: TotalPagesSource | undefined;
    let failure: string | undefined;

    try {
      try {
        handle = await this.openHandle();
      } catch (error) {
        const scrapeError = toScrapeError(error, ScrapeErrorType.BROWSER);
        log.error(`Could not start browser: ${scrapeError.message}`);
        status = 'failed';
        failure = scrapeError.message;
        return this.snapshot(status, state, pages, startTime, totalPagesSource, failure);
      }

      const context: RunContext = { handle, timing };
      await this.loadFirstPage(context);

      const controller = new PaginationController(handle, this.site, state, {
        maxPages: options.maxPages,
        defaultPages: options.defaultPages,
        aggressiveness: options.aggressiveness,
        timing: { ...timing, sleep: this.clock.sleep, now: this.clock.now }
      });

      totalPagesSource = (await controller.determineTotalPages()).source;

      while (controller.state === 'advancing') {
        const pageIndex = controller.currentPage;
        const label = `Page ${pageIndex}/${controller.totalPages}`;
        logger.processing(label, 'scraping...');

        let advanceError: string | undefined;
        let advanceTimeout: string | undefined;
        let staleFirstRow: string | null = null;
        if (pageIndex > 1) {
          const advanced = await controller.advance(pageIndex);
          if (!advanced.ok) {
            advanceError = advanced.error.message;
            log.warn(`Navigation to page ${pageIndex} failed, trying direct request only`);
          } else if (!advanced.confirmed) {
            staleFirstRow = advanced.previousFirstRow;
            advanceTimeout = advanced.timeout?.message;
          }
        }

        const table: TableView | undefined = advanceError === undefined ? { staleFirstRow } : undefined;
        const { page, source, error } = await this.scrapePage(context, pageIndex, controller.recoveryPlan(), table);
        state.aggregate.push(...page.recordsFound);
        pages.push({
          pageIndex,
          recordCount: page.recordsFound.length,
          extractionAttempts: page.extractionAttempts,
          source,
          error: error ?? advanceError ?? (page.recordsFound.length === 0 ? advanceTimeout : undefined)
        });

        if (page.recordsFound.length > 0) {
          logger.success(label, `${page.recordsFound.length} exhibitors via ${source} (total: ${state.aggregate.length})`);
        } else {
          logger.failure(label, 'no data found');
        }

        if (controller.recordPageOutcome(page.recordsFound.length) === 'advancing') {
          await this.clock.sleep(timing.betweenPagesMs);
        }
      }

      status = controller.state === 'aborted' ? 'aborted' : 'exhausted';
    } catch (error) {
      const scrapeError = toScrapeError(error);
      log.error(`Fatal error during scraping: ${scrapeError.message}`);
      status = 'failed';
      failure = scrapeError.message;
    } finally {
      if (handle) {
        try {
          await handle.close();
        } catch (error) {
          log.error('Failed to release browser:', toScrapeError(error).message);
        }
      }
    }

    return this.snapshot(status, state, pages, startTime, totalPagesSource, failure);
  }

  private async loadFirstPage({ handle, timing }: RunContext): Promise<void> {
    log.normal(`Navigating to ${this.site.url}`);
    await handle.navigate(this.site.url);

    log.normal('Waiting for table data to load...');
    const tableReady = await this.gate(classPresent(handle, this.site.tableClass), timing.tableTimeoutMs, timing);
    const bodyReady = tableReady &&
      await this.gate(elementExists(handle, this.site.tableBodyId), timing.tableBodyTimeoutMs, timing);

    if (bodyReady) {
      log.normal('Page loaded');
    } else {
      log.warn('Timeout waiting for table to load, continuing anyway');
    }
    await this.clock.sleep(timing.initialSettleMs);
  }

  /**
   * Extract one page: the rendered table first, then each allowed recovery
   * strategy until one yields records. Without a table view (navigation
   * failed) only the direct request is tried.
   */
  private async scrapePage(
    context: RunContext,
    pageIndex: number,
    recovery: readonly RecoveryStrategy[],
    table: TableView | undefined
  ): Promise<{ page: PageState; source?: PageSource; error?: string }> {
    const page: PageState = { pageIndex, recordsFound: [], extractionAttempts: 0 };
    let lastError: string | undefined;

    const attempt = async (source: PageSource, run: () => Promise<PageOutcome>) => {
      page.extractionAttempts++;
      const outcome = await run();
      if (outcome.kind === 'success') {
        page.recordsFound = outcome.records;
        return source;
      }
      if (outcome.kind === 'error') {
        lastError = outcome.error.message;
        log.warn(`${source} on page ${pageIndex} failed: ${outcome.error.message}`);
      } else {
        log.verbose(`${source} on page ${pageIndex} found no rows`);
      }
      return undefined;
    };

    let source: PageSource | undefined;
    if (table) {
      source = await attempt('table', () => this.extractFromTable(context, pageIndex, table));
    }

    for (const strategy of recovery) {
      if (source) break;
      if (strategy === 'scroll-retry') {
        if (!table) continue;
        source = await attempt('scroll-retry', () => this.scrollAndRetry(context, pageIndex, table));
      } else {
        source = await attempt('direct-request', () => this.directRequest(context, pageIndex));
      }
    }

    return { page, source, error: source ? undefined : lastError };
  }

  private async extractFromTable(
    { handle, timing }: RunContext,
    pageIndex: number,
    { staleFirstRow }: TableView
  ): Promise<PageOutcome> {
    try {
      if (logger.getLevel() >= LogLevel.DEBUG) {
        await describeTableState(handle, this.site);
      }

      const bodyReady = await this.gate(elementExists(handle, this.site.tableBodyId), timing.tableBodyTimeoutMs, timing);
      if (!bodyReady) return { kind: 'empty' };

      const rowsReady = await this.gate(freshDataRowsPresent(handle, this.site, staleFirstRow), timing.rowsTimeoutMs, timing);
      if (!rowsReady) {
        log.verbose(staleFirstRow === null
          ? 'Timeout waiting for data rows'
          : `Table still shows the rows before page ${pageIndex}`);
        return { kind: 'empty' };
      }

      await this.clock.sleep(timing.extractSettleMs);
      const records = await extractRecords(handle, this.site);
      return records.length > 0 ? { kind: 'success', records } : { kind: 'empty' };
    } catch (error) {
      return { kind: 'error', error: toScrapeError(error, ScrapeErrorType.EXTRACTION, pageIndex) };
    }
  }

  // Scrolling to the bottom and back nudges lazily rendered tables
  private async scrollAndRetry(context: RunContext, pageIndex: number, table: TableView): Promise<PageOutcome> {
    const { handle, timing } = context;
    try {
      await handle.runScript(SCROLL_TO_BOTTOM);
      await this.clock.sleep(timing.scrollSettleMs);
      await handle.runScript(SCROLL_TO_TOP);
      await this.clock.sleep(timing.scrollSettleMs);
    } catch (error) {
      return { kind: 'error', error: toScrapeError(error, ScrapeErrorType.NAVIGATION, pageIndex) };
    }
    return this.extractFromTable(context, pageIndex, table);
  }

  private async directRequest({ handle }: RunContext, pageIndex: number): Promise<PageOutcome> {
    const records = await fetchPageViaDirectRequest(handle, this.site, pageIndex - 1);
    return records.length > 0 ? { kind: 'success', records } : { kind: 'empty' };
  }

  private gate(predicate: () => Promise<boolean>, timeoutMs: number, timing: ScrapeTimingConfig): Promise<boolean> {
    return awaitCondition(predicate, {
      timeoutMs,
      intervalMs: timing.pollIntervalMs,
      sleep: this.clock.sleep,
      now: this.clock.now
    });
  }

  private snapshot(
    status: RunStatus,
    state: RunState,
    pages: PageReport[],
    startTime: number,
    totalPagesSource: TotalPagesSource | undefined,
    error: string | undefined
  ): RunResult {
    const durationMs = this.clock.now() - startTime;
    log.normal(`Run ${status} after ${formatTime(durationMs)} with ${state.aggregate.length} exhibitors`);

    return Object.freeze({
      status,
      records: Object.freeze(state.aggregate.map(record => Object.freeze({ ...record }))),
      totalPages: state.totalPages,
      totalPagesSource,
      pagesVisited: pages.length,
      consecutiveFailures: state.consecutiveFailures,
      pages: Object.freeze([...pages]),
      durationMs,
      error
    });
  }
}
