import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { ScrapeError, ScrapeErrorType, errorMessage } from '../types/errors.js';
import type { ListingSite } from '../scrapers/types.js';

const log = logger.createContext('site-loader');

export const DEFAULT_SITE = 'wetex.ae';

const ListingSiteSchema: z.ZodType<ListingSite> = z.object({
  domain: z.string().min(1),
  url: z.string().url(),
  tableClass: z.string().min(1),
  tableBodyId: z.string().min(1),
  dataRowClass: z.string().min(1),
  cellClass: z.string().min(1),
  markers: z.object({
    fixed: z.string().min(1),
    hidden: z.string().min(1)
  }),
  totalRecordsId: z.string().min(1),
  pagination: z.object({
    itemSelector: z.string().min(1),
    pageAttribute: z.string().min(1),
    controlClass: z.string().min(1),
    pageFunction: z.string().regex(/^[A-Za-z_$][\w$.]*$/, 'must be a function name')
  }),
  directRequest: z.object({
    path: z.string().startsWith('/'),
    pageParam: z.string().min(1),
    sizeParam: z.string().min(1),
    fixedParams: z.record(z.string(), z.string())
  }),
  pageSize: z.number().int().positive()
});

/**
 * Load and validate the listing site definition for a domain
 * (a module under src/scrapers/ with a default export).
 */
export async function loadSite(domain: string = DEFAULT_SITE): Promise<ListingSite> {
  let imported: unknown;
  try {
    const module: { default?: unknown } = await import(`../scrapers/${domain}.js`);
    imported = module.default;
  } catch (error) {
    throw new ScrapeError(ScrapeErrorType.CONFIG, `No site definition for ${domain}: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = ListingSiteSchema.safeParse(imported);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ScrapeError(ScrapeErrorType.CONFIG, `Invalid site definition for ${domain}: ${issues}`);
  }

  log.debug(`Loaded site definition for ${domain}`);
  return parsed.data;
}
