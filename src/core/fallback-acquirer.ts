import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { ScrapeErrorType } from '../types/errors.js';
import { toScrapeError } from '../utils/error-handlers.js';
import { classifyCells } from './row-extractor.js';
import type { ExhibitorRecord } from '../types/exhibitor.js';
import type { RenderHandle } from '../types/render-handle.js';
import type { ListingSite } from '../scrapers/types.js';

const log = logger.createContext('fallback');

const DirectRequestPayloadSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    rows: z.array(z.array(z.object({
      className: z.string(),
      text: z.string()
    })))
  }),
  z.object({
    ok: z.literal(false),
    status: z.number()
  })
]);

export type DirectRequestPayload = z.infer<typeof DirectRequestPayloadSchema>;

export function buildListingUrl(site: ListingSite, pageIndexZeroBased: number): string {
  const { directRequest } = site;
  const params = new URLSearchParams({
    [directRequest.pageParam]: String(pageIndexZeroBased),
    [directRequest.sizeParam]: String(site.pageSize),
    ...directRequest.fixedParams
  });
  return `${directRequest.path}?${params.toString()}`;
}

/**
 * Script run in page context: a synchronous same-origin request for the
 * listing fragment, parsed in a detached element. Resolves to the class and
 * text of every cell of every data row, or the HTTP status on failure.
 */
export function buildDirectRequestScript(site: ListingSite, pageIndexZeroBased: number): string {
  const url = JSON.stringify(buildListingUrl(site, pageIndexZeroBased));
  const rowSelector = JSON.stringify(`tr.${site.dataRowClass}`);
  const cellSelector = JSON.stringify(`.${site.cellClass}`);

  return `(() => {
  const xhr = new XMLHttpRequest();
  xhr.open('GET', ${url}, false);
  xhr.send();
  if (xhr.status !== 200) return { ok: false, status: xhr.status };
  const fragment = document.createElement('div');
  fragment.innerHTML = xhr.responseText;
  const rows = Array.from(fragment.querySelectorAll(${rowSelector}));
  return {
    ok: true,
    rows: rows.map((row) => Array.from(row.querySelectorAll(${cellSelector})).map((cell) => ({
      className: cell.getAttribute('class') || '',
      text: (cell.textContent || '').trim()
    })))
  };
})()`;
}

/**
 * Best-effort secondary path for a page whose rendered table came up empty.
 * Every failure resolves to an empty list.
 */
export async function fetchPageViaDirectRequest(
  handle: RenderHandle,
  site: ListingSite,
  pageIndexZeroBased: number
): Promise<ExhibitorRecord[]> {
  log.verbose(`Requesting page ${pageIndexZeroBased + 1} directly from ${site.directRequest.path}`);

  let raw: unknown;
  try {
    raw = await handle.runScript(buildDirectRequestScript(site, pageIndexZeroBased));
  } catch (error) {
    const scrapeError = toScrapeError(error, ScrapeErrorType.FETCH, pageIndexZeroBased + 1);
    log.warn(`Direct request failed (${scrapeError.type}): ${scrapeError.message}`);
    return [];
  }

  const parsed = DirectRequestPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn('Direct request returned an unexpected payload');
    return [];
  }

  const payload = parsed.data;
  if (!payload.ok) {
    log.warn(`Direct request returned HTTP ${payload.status}`);
    return [];
  }

  const records: ExhibitorRecord[] = [];
  for (const cells of payload.rows) {
    const record = classifyCells(cells, site.markers);
    if (record) records.push(record);
  }

  log.verbose(`Direct request yielded ${records.length} records`);
  return records;
}
