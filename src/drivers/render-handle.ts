import type { ElementHandle as PlaywrightElement, Page } from 'playwright';
import { logger } from '../utils/logger.js';
import type { ElementHandle, RenderHandle, SelectorKind } from '../types/render-handle.js';

const log = logger.createContext('render-handle');

export interface PlaywrightRenderHandleOptions {
  navigationTimeoutMs?: number;
  /** Extra teardown run after the page closes (browser, profile directory) */
  onClose?: () => Promise<void>;
}

export function toPlaywrightSelector(kind: SelectorKind, selector: string): string {
  switch (kind) {
    case 'css':
      return `css=${selector}`;
    case 'id':
      return `id=${selector}`;
    case 'xpath':
      return `xpath=${selector}`;
  }
}

class PlaywrightElementHandle implements ElementHandle {
  constructor(private element: PlaywrightElement<Element>) {}

  async text(): Promise<string> {
    return this.element.innerText();
  }

  async attribute(name: string): Promise<string | null> {
    return this.element.getAttribute(name);
  }

  async html(): Promise<string> {
    return this.element.innerHTML();
  }

  // Dispatched in page context so overlays and off-screen positions don't block it
  async click(): Promise<void> {
    await this.element.evaluate((el) => {
      if (el instanceof HTMLElement) el.click();
    });
  }

  async scrollIntoView(): Promise<void> {
    await this.element.evaluate((el) => el.scrollIntoView(true));
  }

  async find(kind: SelectorKind, selector: string): Promise<ElementHandle[]> {
    const found = await this.element.$$(toPlaywrightSelector(kind, selector));
    return found.map(el => new PlaywrightElementHandle(el));
  }
}

/**
 * Render handle over a single Playwright page
 */
export class PlaywrightRenderHandle implements RenderHandle {
  private closed = false;

  constructor(
    private page: Page,
    private options: PlaywrightRenderHandleOptions = {}
  ) {}

  async navigate(url: string): Promise<void> {
    log.verbose(`Navigating to ${url}`);
    await this.page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: this.options.navigationTimeoutMs ?? 60000
    });
  }

  async runScript(source: string): Promise<unknown> {
    const result: unknown = await this.page.evaluate(source);
    return result;
  }

  async find(kind: SelectorKind, selector: string): Promise<ElementHandle[]> {
    const found = await this.page.$$(toPlaywrightSelector(kind, selector));
    return found.map(el => new PlaywrightElementHandle(el));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await this.page.close();
    } finally {
      if (this.options.onClose) {
        await this.options.onClose();
      }
    }
  }
}
