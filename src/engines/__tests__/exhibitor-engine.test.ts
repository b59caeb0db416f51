import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import { ExhibitorScrapeEngine, SCROLL_TO_BOTTOM, SCROLL_TO_TOP } from '../exhibitor-engine.js';
import { FakeRenderHandle, VirtualClock, rowsNamed, withoutNameMarker } from '../../../tests/fake-render-handle.js';
import type { FakeListingOptions } from '../../../tests/fake-render-handle.js';
import { logger, LogLevel } from '../../utils/logger.js';
import site from '../../scrapers/wetex.ae.js';

beforeAll(() => {
  logger.setLevel(LogLevel.QUIET);
});

function setup(listing: Omit<FakeListingOptions, 'site'>) {
  const handle = new FakeRenderHandle({ site, ...listing });
  const clock = new VirtualClock();
  const engine = new ExhibitorScrapeEngine(site, async () => handle, clock);
  return { handle, clock, engine };
}

describe('ExhibitorScrapeEngine', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel(LogLevel.QUIET);
  });

  it('uses the direct request for a page that never renders rows', async () => {
    const page1 = rowsNamed('Page1', 20);
    const page3 = rowsNamed('Page3', 20);
    const { engine, handle } = setup({
      pages: [page1, [], page3],
      directPages: [page1, rowsNamed('Fallback', 15), page3],
      totalRecordsText: '55'
    });

    const result = await engine.run();

    expect(result.status).toBe('exhausted');
    expect(result.records).toHaveLength(55);
    expect(result.consecutiveFailures).toBe(0);
    expect(result.totalPages).toBe(3);
    expect(result.totalPagesSource).toBe('record-count');
    expect(result.records[0].name).toBe('Page1 1');
    expect(result.records[20].name).toBe('Fallback 1');
    expect(result.records[54].name).toBe('Page3 20');
    expect(result.pages.map(p => [p.pageIndex, p.recordCount, p.source])).toEqual([
      [1, 20, 'table'],
      [2, 15, 'direct-request'],
      [3, 20, 'table']
    ]);
    expect(handle.closed).toBe(true);
  });

  it('recovers a page whose rendered rows yield nothing after a confirmed advance', async () => {
    const page1 = rowsNamed('Page1', 20);
    const page3 = rowsNamed('Page3', 20);
    const { engine, handle } = setup({
      pages: [page1, withoutNameMarker(rowsNamed('Unmarked', 15)), page3],
      directPages: [page1, rowsNamed('Fallback', 15), page3],
      totalRecordsText: '55'
    });

    const result = await engine.run();

    expect(result.status).toBe('exhausted');
    expect(result.records).toHaveLength(55);
    expect(result.consecutiveFailures).toBe(0);
    expect(result.pages[1]).toEqual({
      pageIndex: 2,
      recordCount: 15,
      extractionAttempts: 3,
      source: 'direct-request',
      error: undefined
    });
    expect(handle.clicks).toEqual([2, 3]);
    expect(handle.scripts.filter(script => script.startsWith('SetPageNumber'))).toEqual([]);
    expect(handle.scripts.slice(0, 2)).toEqual([SCROLL_TO_BOTTOM, SCROLL_TO_TOP]);
  });

  it('scrolls a lazily rendered later page into view after navigating', async () => {
    const { engine, handle } = setup({
      pages: [rowsNamed('P1', 20), rowsNamed('P2', 20)],
      lazyPages: [2],
      directRequestStatus: 500,
      totalRecordsText: '40'
    });

    const result = await engine.run();

    expect(result.status).toBe('exhausted');
    expect(result.records).toHaveLength(40);
    expect(result.records[20].name).toBe('P2 1');
    expect(result.pages[1]).toEqual({
      pageIndex: 2,
      recordCount: 20,
      extractionAttempts: 2,
      source: 'scroll-retry',
      error: undefined
    });
    expect(handle.scripts).toEqual(['SetPageNumber(1)', SCROLL_TO_BOTTOM, SCROLL_TO_TOP]);
  });

  it('does not read the previous page again when navigation has no effect', async () => {
    const { engine } = setup({
      pages: [rowsNamed('Same', 20), rowsNamed('Same', 20)],
      directRequestStatus: 500,
      totalRecordsText: '40'
    });

    const result = await engine.run();

    expect(result.status).toBe('exhausted');
    expect(result.records).toHaveLength(20);
    expect(result.consecutiveFailures).toBe(1);
    expect(result.pages[1]).toEqual({
      pageIndex: 2,
      recordCount: 0,
      extractionAttempts: 3,
      source: undefined,
      error: 'Rows for page 2 did not render within 10000ms'
    });
  });

  it('tries only the direct request when navigation is impossible', async () => {
    const page1 = rowsNamed('Page1', 20);
    const { engine, handle } = setup({
      pages: [page1, []],
      directPages: [page1, rowsNamed('Direct', 10)],
      paginationNums: ['1'],
      hasPageFunction: false,
      totalRecordsText: '30'
    });

    const result = await engine.run();

    expect(result.records).toHaveLength(30);
    expect(result.pages[1]).toEqual({
      pageIndex: 2,
      recordCount: 10,
      extractionAttempts: 1,
      source: 'direct-request',
      error: 'ReferenceError: SetPageNumber is not defined'
    });
    expect(handle.scripts).not.toContain(SCROLL_TO_BOTTOM);
  });

  it('logs the table state before reading a page at debug level', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    logger.setLevel(LogLevel.DEBUG);
    const { engine } = setup({ pages: [rowsNamed('A', 2)], totalRecordsText: '2' });

    await engine.run();

    const lines = logSpy.mock.calls.map(([line]) => String(line));
    expect(lines.filter(line => line.startsWith('[row-extractor] Table state: body found, 2 rows, 2 data rows'))).toHaveLength(1);
  });

  it('stops after three consecutive empty pages and keeps earlier records', async () => {
    const { engine, handle } = setup({
      pages: [rowsNamed('Page1', 20), [], [], [], rowsNamed('Page5', 20)],
      totalRecordsText: '100'
    });

    const result = await engine.run();

    expect(result.status).toBe('aborted');
    expect(result.totalPages).toBe(5);
    expect(result.records).toHaveLength(20);
    expect(result.records.every(r => r.name.startsWith('Page1 '))).toBe(true);
    expect(result.consecutiveFailures).toBe(3);
    expect(result.pagesVisited).toBe(4);
    expect(handle.clicks).toEqual([2, 3, 4]);
    expect(handle.closed).toBe(true);
  });

  it('recovers a lazily rendered page by scrolling', async () => {
    const { engine, handle } = setup({
      pages: [rowsNamed('Lazy', 5)],
      lazyPages: [1],
      totalRecordsText: '5'
    });

    const result = await engine.run();

    expect(result.status).toBe('exhausted');
    expect(result.records).toHaveLength(5);
    expect(result.pages[0]).toEqual({
      pageIndex: 1,
      recordCount: 5,
      extractionAttempts: 2,
      source: 'scroll-retry',
      error: undefined
    });
    expect(handle.scripts).toEqual([SCROLL_TO_BOTTOM, SCROLL_TO_TOP]);
  });

  it('tries no recovery at aggressiveness 0', async () => {
    const { engine, handle } = setup({
      pages: [rowsNamed('Lazy', 5)],
      lazyPages: [1],
      totalRecordsText: '5'
    });

    const result = await engine.run({ aggressiveness: 0 });

    expect(result.status).toBe('exhausted');
    expect(result.records).toEqual([]);
    expect(result.consecutiveFailures).toBe(1);
    expect(handle.scripts).toEqual([]);
  });

  it('visits at most maxPages pages', async () => {
    const { engine, handle } = setup({
      pages: [rowsNamed('A', 20), rowsNamed('B', 20), rowsNamed('C', 20), rowsNamed('D', 20), rowsNamed('E', 17)],
      totalRecordsText: '97'
    });

    const result = await engine.run({ maxPages: 2 });

    expect(result.status).toBe('exhausted');
    expect(result.totalPages).toBe(2);
    expect(result.records).toHaveLength(40);
    expect(handle.clicks).toEqual([2]);
  });

  it('reports a browser that cannot start as a failed run', async () => {
    const engine = new ExhibitorScrapeEngine(site, async () => {
      throw new Error('Executable does not exist');
    }, new VirtualClock());

    const result = await engine.run();

    expect(result.status).toBe('failed');
    expect(result.records).toEqual([]);
    expect(result.pagesVisited).toBe(0);
    expect(result.error).toBe('Executable does not exist');
  });

  it('releases the handle when the run throws', async () => {
    const { engine, handle } = setup({ pages: [rowsNamed('A', 3)], totalRecordsText: '3' });
    vi.spyOn(handle, 'navigate').mockRejectedValue(new Error('Target closed'));

    const result = await engine.run();

    expect(result.status).toBe('failed');
    expect(result.error).toBe('Target closed');
    expect(handle.closed).toBe(true);
  });

  it('still returns results when closing the handle fails', async () => {
    const { engine, handle } = setup({ pages: [rowsNamed('A', 3)], totalRecordsText: '3' });
    vi.spyOn(handle, 'close').mockRejectedValue(new Error('Browser has been closed'));

    const result = await engine.run();

    expect(result.status).toBe('exhausted');
    expect(result.records).toHaveLength(3);
  });

  it('returns a frozen snapshot', async () => {
    const { engine } = setup({ pages: [rowsNamed('A', 2)], totalRecordsText: '2' });

    const result = await engine.run();

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.records)).toBe(true);
    expect(Object.isFrozen(result.records[0])).toBe(true);
  });
});
