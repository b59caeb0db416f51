#!/usr/bin/env node

/**
 * CLI for the exhibitor scraper
 * Usage:
 *   npm run scrape -- [--max-pages 3] [--headed] [--output-dir output]
 */

import path from 'path';
import { ExhibitorScrapeEngine } from '../src/engines/exhibitor-engine.js';
import { createLocalRenderHandle } from '../src/providers/local-browser.js';
import { loadSite } from '../src/drivers/site-loader.js';
import { saveCsv, saveJson, CSV_FILENAME, JSON_FILENAME } from '../src/drivers/export.js';
import { loadScrapeConfig } from '../src/config/scrape-config.js';
import { logger, parseLogLevel } from '../src/utils/logger.js';
import { parseArgs, USAGE } from '../src/utils/cli-args.js';
import { printRunSummary } from '../src/utils/run-summary.js';
import { installGlobalErrorHandlers } from '../src/utils/error-handlers.js';
import { errorMessage } from '../src/types/errors.js';

// Install global error handlers to survive late browser disconnections
installGlobalErrorHandlers();

const log = logger.createContext('scrape-cli');

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));

  if (options.help) {
    console.log(USAGE);
    return 0;
  }
  if (command !== 'scrape') {
    console.error(`Unknown command: ${command}\n\n${USAGE}`);
    return 1;
  }

  const { help: _help, ...overrides } = options;
  const config = loadScrapeConfig(process.env, overrides);
  logger.setLevel(parseLogLevel(config.logLevel));

  const site = await loadSite(config.site);
  log.normal(`Exhibitor scraper: ${site.domain}`);
  logger.separator();

  const engine = new ExhibitorScrapeEngine(site, () =>
    createLocalRenderHandle({ headless: config.headless, blockImages: config.blockImages })
  );

  const result = await engine.run({
    maxPages: config.maxPages,
    defaultPages: config.defaultPages,
    aggressiveness: config.aggressiveness,
    timing: config.timing
  });

  printRunSummary(result);

  if (result.error) {
    log.error(`Run failed: ${result.error}`);
  }
  if (result.records.length === 0) {
    log.error('No data was scraped');
    return 1;
  }

  await saveCsv(result.records, path.join(config.outputDir, CSV_FILENAME));
  await saveJson(result.records, path.join(config.outputDir, JSON_FILENAME));
  logger.quiet(`\n✅ Scraped ${result.records.length} exhibitors (${result.status})`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
