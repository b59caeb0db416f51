import { setTimeout as delay } from 'timers/promises';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../types/errors.js';
import type { RenderHandle } from '../types/render-handle.js';
import type { ListingSite } from '../scrapers/types.js';

const log = logger.createContext('readiness-gate');

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface GateOptions {
  timeoutMs: number;
  intervalMs: number;
  sleep?: Sleep;
  /** Clock used to measure the timeout; defaults to Date.now */
  now?: () => number;
}

/**
 * Poll `predicate` until it holds or `timeoutMs` elapses. Resolves false on
 * timeout instead of throwing. A predicate that throws counts as not ready.
 * The predicate is always evaluated at least once.
 */
export async function awaitCondition(
  predicate: () => Promise<boolean>,
  options: GateOptions
): Promise<boolean> {
  const sleep = options.sleep ?? realSleep;
  const now = options.now ?? Date.now;
  const deadline = now() + options.timeoutMs;

  for (;;) {
    try {
      if (await predicate()) return true;
    } catch (error) {
      log.debug(`Predicate threw, treating as not ready: ${errorMessage(error)}`);
    }

    if (now() >= deadline) return false;
    await sleep(options.intervalMs);
  }
}

export function elementExists(handle: RenderHandle, id: string): () => Promise<boolean> {
  return async () => (await handle.find('id', id)).length > 0;
}

export function classPresent(handle: RenderHandle, className: string): () => Promise<boolean> {
  return async () => (await handle.find('css', `.${className}`)).length > 0;
}

export function dataRowSelector(site: ListingSite): string {
  return `#${site.tableBodyId} tr.${site.dataRowClass}`;
}

/**
 * Data rows are rendered and the first one is not `staleFirstRow`, the row
 * text of a page already left behind. A null `staleFirstRow` accepts any rows.
 */
export function freshDataRowsPresent(
  handle: RenderHandle,
  site: ListingSite,
  staleFirstRow: string | null
): () => Promise<boolean> {
  const selector = dataRowSelector(site);
  return async () => {
    const [row] = await handle.find('css', selector);
    if (!row) return false;
    return staleFirstRow === null || (await row.text()) !== staleFirstRow;
  };
}

/**
 * Waits until the element's text is non-blank.
 */
export function elementHasText(handle: RenderHandle, id: string): () => Promise<boolean> {
  return async () => {
    const [element] = await handle.find('id', id);
    if (!element) return false;
    return (await element.text()).trim() !== '';
  };
}
