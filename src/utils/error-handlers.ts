import { logger } from './logger.js';
import { ScrapeError, ScrapeErrorType, errorMessage } from '../types/errors.js';

const log = logger.createContext('error-handlers');

/**
 * Install global process error handlers so a late browser disconnect does not
 * take the CLI down. Call once at startup.
 */
export function installGlobalErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    const message = errorMessage(reason);
    if (isBrowserError(message)) {
      log.error('Unhandled browser error (non-fatal):', message);
      return;
    }

    log.error('Unhandled Promise Rejection:', reason);
  });

  process.on('uncaughtException', (err: Error, origin: string) => {
    if (isBrowserError(err.message)) {
      log.error('Uncaught browser error (non-fatal):', err.message);
      return;
    }

    // The process is in an undefined state
    log.error('FATAL: Uncaught Exception:', err);
    log.error('Origin:', origin);
    process.exit(1);
  });

  log.debug('Global error handlers installed');
}

/**
 * Check if an error is related to the browser, context or page being closed
 */
export function isBrowserError(message: string | null | undefined): boolean {
  if (!message) return false;

  const lowerMessage = message.toLowerCase();
  return lowerMessage.includes('target page, context or browser has been closed') ||
         lowerMessage.includes('browser has been closed') ||
         lowerMessage.includes('context has been closed') ||
         lowerMessage.includes('target closed') ||
         lowerMessage.includes('disconnected') ||
         lowerMessage.includes('connection closed') ||
         lowerMessage.includes('browser is closed') ||
         lowerMessage.includes('execution context was destroyed') ||
         lowerMessage.includes('page has been closed');
}

/**
 * Classify an unknown throw. Existing ScrapeErrors pass through untouched;
 * anything else is wrapped with `fallbackType` unless it is a browser error.
 */
export function toScrapeError(
  error: unknown,
  fallbackType: ScrapeErrorType = ScrapeErrorType.UNKNOWN,
  pageIndex?: number
): ScrapeError {
  if (error instanceof ScrapeError) return error;

  const message = errorMessage(error);
  const type = isBrowserError(message) ? ScrapeErrorType.BROWSER : fallbackType;
  return new ScrapeError(type, message, { pageIndex, cause: error });
}
