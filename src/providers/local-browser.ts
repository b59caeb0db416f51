import { chromium } from 'playwright';
import type { BrowserContext, Page } from 'playwright';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { PlaywrightRenderHandle } from '../drivers/render-handle.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../types/errors.js';
import type { RenderHandle } from '../types/render-handle.js';

const log = logger.createContext('local-browser');

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const CHROMIUM_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
  '--disable-extensions',
  '--disable-software-rasterizer',
  '--disable-plugins',
  '--disable-popup-blocking',
  '--disable-translate'
];

export interface LocalBrowserOptions {
  /** Defaults to true */
  headless?: boolean;
  blockImages?: boolean;
  navigationTimeoutMs?: number;
}

/**
 * Launch a local Chromium with a throwaway profile directory and wrap its page
 * as a render handle. Closing the handle closes the browser and removes the
 * profile directory.
 */
export async function createLocalRenderHandle(options: LocalBrowserOptions = {}): Promise<RenderHandle> {
  const headless = options.headless ?? true;
  const userDataDir = await mkdtemp(path.join(tmpdir(), 'exhibitor_chrome_'));

  const removeProfile = async () => {
    await rm(userDataDir, { recursive: true, force: true });
    log.debug(`Removed profile directory ${userDataDir}`);
  };

  let context: BrowserContext;
  try {
    context = await chromium.launchPersistentContext(userDataDir, {
      headless,
      args: headless ? [...CHROMIUM_ARGS, '--disable-gpu'] : CHROMIUM_ARGS,
      ignoreDefaultArgs: ['--enable-automation'],
      viewport: { width: 1920, height: 1080 },
      userAgent: USER_AGENT
    });
  } catch (error) {
    await removeProfile();
    throw error;
  }

  context.on('close', () => {
    log.debug('Browser context closed');
  });

  let page: Page;
  try {
    if (options.blockImages ?? true) {
      await context.route('**/*', (route) =>
        route.request().resourceType() === 'image' ? route.abort() : route.continue()
      );
    }
    page = context.pages()[0] ?? await context.newPage();
  } catch (error) {
    log.error(`Browser setup failed: ${errorMessage(error)}`);
    try {
      await context.close();
    } catch (closeError) {
      log.warn(`Could not close browser after setup failure: ${errorMessage(closeError)}`);
    } finally {
      await removeProfile();
    }
    throw error;
  }
  log.normal(`Chromium launched (${headless ? 'headless' : 'headed'})`);
  log.verbose(`Using profile directory ${userDataDir}`);

  return new PlaywrightRenderHandle(page, {
    navigationTimeoutMs: options.navigationTimeoutMs,
    onClose: async () => {
      try {
        await context.close();
        log.normal('Browser closed');
      } finally {
        await removeProfile();
      }
    }
  });
}
