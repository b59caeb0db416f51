/**
 * Categories of scrape failures. Everything except `config` and a `browser`
 * failure at handle acquisition is recoverable at page scope.
 */
export enum ScrapeErrorType {
  /** A readiness gate or advance confirmation timed out */
  TIMEOUT = 'timeout',
  /** Page load or pagination navigation failed */
  NAVIGATION = 'navigation',
  /** Reading rows or cells failed */
  EXTRACTION = 'extraction',
  /** The in-page direct request failed or returned an unusable payload */
  FETCH = 'fetch',
  /** The browser, context or page went away */
  BROWSER = 'browser',
  /** Invalid configuration */
  CONFIG = 'config',
  UNKNOWN = 'unknown',
}

export class ScrapeError extends Error {
  readonly type: ScrapeErrorType;
  readonly pageIndex?: number;

  constructor(type: ScrapeErrorType, message: string, options: { pageIndex?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ScrapeError';
    this.type = type;
    this.pageIndex = options.pageIndex;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
