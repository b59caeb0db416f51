import { z } from 'zod';
import { LOG_LEVEL_NAMES, normalizeLogLevelName } from '../utils/logger.js';
import { ScrapeError, ScrapeErrorType } from '../types/errors.js';
import { MAX_AGGRESSIVENESS } from '../core/pagination-controller.js';

const TimingSchema = z.object({
  pollIntervalMs: z.number().int().positive().default(250),
  // Initial load
  tableTimeoutMs: z.number().int().nonnegative().default(15000),
  tableBodyTimeoutMs: z.number().int().nonnegative().default(10000),
  initialSettleMs: z.number().int().nonnegative().default(5000),
  totalRecordsTimeoutMs: z.number().int().nonnegative().default(10000),
  // Per page
  rowsTimeoutMs: z.number().int().nonnegative().default(15000),
  extractSettleMs: z.number().int().nonnegative().default(1000),
  advanceTimeoutMs: z.number().int().nonnegative().default(10000),
  clickSettleMs: z.number().int().nonnegative().default(500),
  advanceSettleMs: z.number().int().nonnegative().default(1000),
  scrollSettleMs: z.number().int().nonnegative().default(2000),
  betweenPagesMs: z.number().int().nonnegative().default(2000)
});

export const ScrapeConfigSchema = z.object({
  site: z.string().min(1).default('wetex.ae'),
  maxPages: z.number().int().positive().optional(),
  defaultPages: z.number().int().positive().default(5),
  headless: z.boolean().default(true),
  blockImages: z.boolean().default(true),
  aggressiveness: z.number().int().min(0).max(MAX_AGGRESSIVENESS).default(MAX_AGGRESSIVENESS),
  outputDir: z.string().min(1).default('output'),
  logLevel: z.enum(LOG_LEVEL_NAMES).default('normal'),
  timing: TimingSchema.default({})
});

export type ScrapeConfig = z.infer<typeof ScrapeConfigSchema>;
export type ScrapeTimingConfig = z.infer<typeof TimingSchema>;
export type ScrapeConfigInput = z.input<typeof ScrapeConfigSchema>;

type Env = Record<string, string | undefined>;

function envInt(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ScrapeError(ScrapeErrorType.CONFIG, `${name} must be an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function envBool(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (['1', 'true', 'yes'].includes(raw)) return true;
  if (['0', 'false', 'no'].includes(raw)) return false;
  throw new ScrapeError(ScrapeErrorType.CONFIG, `${name} must be true or false, got "${env[name]}"`);
}

// Undefined entries must not mask a lower-precedence value
function definedOnly(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

/**
 * Build the run configuration. Precedence: overrides (CLI), then environment,
 * then defaults.
 */
export function loadScrapeConfig(env: Env = process.env, overrides: ScrapeConfigInput = {}): ScrapeConfig {
  const fromEnv = definedOnly({
    site: env.SCRAPE_SITE || undefined,
    maxPages: envInt(env, 'SCRAPE_MAX_PAGES'),
    headless: envBool(env, 'SCRAPE_HEADLESS'),
    aggressiveness: envInt(env, 'SCRAPE_AGGRESSIVENESS'),
    outputDir: env.SCRAPE_OUTPUT_DIR || undefined,
    logLevel: env.LOG_LEVEL ? normalizeLogLevelName(env.LOG_LEVEL) || undefined : undefined
  });

  const merged = { ...fromEnv, ...definedOnly({ ...overrides }) };

  const parsed = ScrapeConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'config'}: ${i.message}`).join('; ');
    throw new ScrapeError(ScrapeErrorType.CONFIG, `Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export const DEFAULT_TIMING: ScrapeTimingConfig = TimingSchema.parse({});
