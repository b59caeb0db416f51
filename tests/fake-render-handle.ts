import { SCROLL_TO_BOTTOM, SCROLL_TO_TOP } from '../src/engines/exhibitor-engine.js';
import { dataRowSelector } from '../src/core/readiness-gate.js';
import type { ElementHandle, RenderHandle, SelectorKind } from '../src/types/render-handle.js';
import type { ListingSite } from '../src/scrapers/types.js';
import type { Sleep } from '../src/core/readiness-gate.js';

/**
 * In-process stand-in for a browser showing a paginated, asynchronously
 * rendered listing. Selectors are matched against the strings the scraper
 * builds from the site definition, not parsed as real CSS.
 */

export interface FakeCell {
  className: string;
  text: string;
}

export interface FakeRow {
  className: string;
  cells: FakeCell[];
  /** Reading this row's cells throws */
  broken?: boolean;
}

export interface FakeListingOptions {
  site: ListingSite;
  /** Rows rendered in the table body, per one-based page (index 0 is page 1) */
  pages: FakeRow[][];
  /** Rows served by the direct-request endpoint, per zero-based page; defaults to `pages` */
  directPages?: FakeRow[][];
  directRequestStatus?: number;
  /** Text of the total record element; null removes the element */
  totalRecordsText?: string | null;
  /** Page numbers carried by pagination links; defaults to 1..pages.length */
  paginationNums?: string[];
  /** Polls of the data rows that come back empty after each page change */
  renderDelayPolls?: number;
  /** Pages (one-based) whose rows only render after a scroll to the bottom */
  lazyPages?: number[];
  hasPageFunction?: boolean;
  failClicks?: boolean;
  /** Table markup is missing entirely */
  noTable?: boolean;
}

export function exhibitorRow(
  name: string,
  stand = '',
  country = '',
  sector = '',
  activity = '',
  hall = ''
): FakeRow {
  return {
    className: 'm19-table__content-table-row',
    cells: [
      { className: 'm19-table__content-table-cell fixed-col', text: ` ${name} ` },
      { className: 'm19-table__content-table-cell hidden-col', text: 'internal-id' },
      { className: 'm19-table__content-table-cell', text: stand },
      { className: 'm19-table__content-table-cell', text: country },
      { className: 'm19-table__content-table-cell', text: sector },
      { className: 'm19-table__content-table-cell', text: activity },
      { className: 'm19-table__content-table-cell', text: hall }
    ]
  };
}

export function headerRow(): FakeRow {
  return {
    className: 'm19-table__content-table-head',
    cells: [
      { className: 'm19-table__content-table-cell fixed-col', text: 'Exhibitor Name' },
      { className: 'm19-table__content-table-cell', text: 'Stand No' }
    ]
  };
}

export function rowsNamed(prefix: string, count: number, country = 'UAE'): FakeRow[] {
  return Array.from({ length: count }, (_, i) => exhibitorRow(`${prefix} ${i + 1}`, `S${i + 1}`, country));
}

/** The same rows with the name cell's marker class removed */
export function withoutNameMarker(rows: FakeRow[]): FakeRow[] {
  return rows.map(row => ({
    ...row,
    cells: row.cells.map(cell => ({ ...cell, className: cell.className.replace(' fixed-col', '') }))
  }));
}

export function rowHtml(row: FakeRow): string {
  const cells = row.cells.map(cell => `<td class="${cell.className}">${cell.text}</td>`).join('');
  return `<tr class="${row.className}">${cells}</tr>`;
}

function hasClass(className: string, token: string): boolean {
  return className.split(/\s+/).includes(token);
}

class FakeElement implements ElementHandle {
  constructor(
    private readonly textValue: string,
    private readonly attributes: Record<string, string>,
    private readonly children: (kind: SelectorKind, selector: string) => FakeElement[] = () => [],
    private readonly onClick: () => void = () => undefined,
    private readonly htmlValue: () => string = () => textValue
  ) {}

  async text(): Promise<string> {
    return this.textValue;
  }

  async attribute(name: string): Promise<string | null> {
    return this.attributes[name] ?? null;
  }

  async click(): Promise<void> {
    this.onClick();
  }

  async html(): Promise<string> {
    return this.htmlValue();
  }

  async scrollIntoView(): Promise<void> {}

  async find(kind: SelectorKind, selector: string): Promise<ElementHandle[]> {
    return this.children(kind, selector);
  }
}

export class FakeRenderHandle implements RenderHandle {
  currentPage = 1;
  closed = false;
  readonly navigations: string[] = [];
  readonly scripts: string[] = [];
  readonly clicks: number[] = [];
  private pendingPolls = 0;
  private scrolledPages = new Set<number>();

  constructor(private readonly options: FakeListingOptions) {}

  private get site(): ListingSite {
    return this.options.site;
  }

  async navigate(url: string): Promise<void> {
    this.navigations.push(url);
    this.showPage(1);
  }

  async runScript(source: string): Promise<unknown> {
    this.scripts.push(source);

    if (source === SCROLL_TO_BOTTOM) {
      this.scrolledPages.add(this.currentPage);
      return undefined;
    }
    if (source === SCROLL_TO_TOP) return undefined;

    const pageCall = new RegExp(`^${this.site.pagination.pageFunction}\\((\\d+)\\)$`).exec(source);
    if (pageCall) {
      if (this.options.hasPageFunction === false) {
        throw new Error(`ReferenceError: ${this.site.pagination.pageFunction} is not defined`);
      }
      this.showPage(parseInt(pageCall[1], 10) + 1);
      return undefined;
    }

    const request = new RegExp(`${this.site.directRequest.pageParam}=(\\d+)`).exec(source);
    if (source.includes('XMLHttpRequest') && request) {
      const status = this.options.directRequestStatus ?? 200;
      if (status !== 200) return { ok: false, status };

      const pageIndex = parseInt(request[1], 10);
      const rows = (this.options.directPages ?? this.options.pages)[pageIndex] ?? [];
      return {
        ok: true,
        rows: rows
          .filter(row => hasClass(row.className, this.site.dataRowClass))
          .map(row => row.cells.map(cell => ({ className: cell.className, text: cell.text.trim() })))
      };
    }

    throw new Error(`Unsupported script: ${source.slice(0, 40)}`);
  }

  async find(kind: SelectorKind, selector: string): Promise<ElementHandle[]> {
    const { site } = this;

    if (kind === 'id' && selector === site.tableBodyId) {
      return this.options.noTable ? [] : [this.tableBody()];
    }
    if (kind === 'id' && selector === site.totalRecordsId) {
      const text = this.options.totalRecordsText;
      return text === undefined || text === null ? [] : [new FakeElement(text, { id: site.totalRecordsId })];
    }
    if (kind === 'css' && selector === `.${site.tableClass}`) {
      return this.options.noTable ? [] : [new FakeElement('', { class: site.tableClass })];
    }
    if (kind === 'css' && selector === dataRowSelector(site)) {
      return this.options.noTable ? [] : this.dataRows();
    }
    if (kind === 'css' && selector === site.pagination.itemSelector) {
      return this.paginationItems().map(item => item.element);
    }
    if (kind === 'css' && selector.startsWith(site.pagination.itemSelector)) {
      const target = /="(\d+)"\]/.exec(selector)?.[1];
      return this.paginationItems().filter(item => item.num === target && !item.control).map(item => item.element);
    }
    return [];
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private showPage(page: number): void {
    this.currentPage = page;
    this.pendingPolls = this.options.renderDelayPolls ?? 0;
  }

  private visibleRows(): FakeRow[] {
    if (this.pendingPolls > 0) {
      this.pendingPolls--;
      return [];
    }
    return this.renderedRows();
  }

  // Current rows without counting as a poll
  private renderedRows(): FakeRow[] {
    if (this.pendingPolls > 0) return [];
    const lazy = this.options.lazyPages?.includes(this.currentPage) ?? false;
    if (lazy && !this.scrolledPages.has(this.currentPage)) return [];
    return this.options.pages[this.currentPage - 1] ?? [];
  }

  private dataRows(): FakeElement[] {
    return this.visibleRows()
      .filter(row => hasClass(row.className, this.site.dataRowClass))
      .map(row => this.rowElement(row));
  }

  private tableBody(): FakeElement {
    return new FakeElement(
      '',
      { id: this.site.tableBodyId },
      (kind, selector) => {
        if (kind !== 'css') return [];
        if (selector === `tr.${this.site.dataRowClass}`) return this.dataRows();
        if (selector === 'tr') return this.visibleRows().map(row => this.rowElement(row));
        return [];
      },
      undefined,
      () => this.renderedRows().map(rowHtml).join('')
    );
  }

  private rowElement(row: FakeRow): FakeElement {
    return new FakeElement(
      row.cells.map(cell => cell.text).join('\t'),
      { class: row.className },
      (kind, selector) => {
        if (row.broken) throw new Error('stale element reference');
        if (kind !== 'css') return [];
        const cells = selector === 'td'
          ? row.cells
          : selector === `.${this.site.cellClass}`
            ? row.cells.filter(cell => hasClass(cell.className, this.site.cellClass))
            : [];
        return cells.map(cell => new FakeElement(cell.text, { class: cell.className }));
      }
    );
  }

  private paginationItems(): { num: string; control: boolean; element: FakeElement }[] {
    const { pagination } = this.site;
    const nums = this.options.paginationNums ??
      this.options.pages.map((_, i) => String(i + 1));

    const links = nums.map(num => ({
      num,
      control: false,
      element: new FakeElement(num, { [pagination.pageAttribute]: num }, undefined, () => {
        if (this.options.failClicks) throw new Error('element click intercepted');
        this.clicks.push(parseInt(num, 10));
        this.showPage(parseInt(num, 10));
      })
    }));

    if (links.length === 0) return [];

    // The "next" control carries the following page number too
    const next = String(this.currentPage + 1);
    const control = {
      num: next,
      control: true,
      element: new FakeElement('›', { [pagination.pageAttribute]: next, class: pagination.controlClass })
    };

    return [...links, control];
  }
}

/**
 * Clock whose sleeps advance time instantly.
 */
export class VirtualClock {
  private time = 0;
  readonly sleeps: number[] = [];

  now = (): number => this.time;

  sleep: Sleep = async (ms) => {
    this.sleeps.push(ms);
    this.time += ms;
  };
}
