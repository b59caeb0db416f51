import { logger } from './logger.js';
import type { ExhibitorRecord } from '../types/exhibitor.js';
import type { RunResult } from '../types/scrape-run.js';

export interface CountryCount {
  country: string;
  count: number;
}

export interface RunSummary {
  total: number;
  topCountries: CountryCount[];
  samples: ExhibitorRecord[];
}

/**
 * Countries by descending frequency; ties keep first-seen order. A blank
 * country is reported as "Unknown".
 */
export function topCountries(records: readonly ExhibitorRecord[], limit = 5): CountryCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const country = record.country || 'Unknown';
    counts.set(country, (counts.get(country) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([country, count]) => ({ country, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export function summarizeRun(records: readonly ExhibitorRecord[]): RunSummary {
  return {
    total: records.length,
    topCountries: topCountries(records),
    samples: records.slice(0, 3)
  };
}

export function printRunSummary(result: RunResult): void {
  const summary = summarizeRun(result.records);

  if (summary.total === 0) {
    logger.quiet('\n⚠ No exhibitors found');
    return;
  }

  logger.separator();
  logger.quiet('SCRAPING SUMMARY');
  logger.separator();
  logger.quiet(`Total exhibitors scraped: ${summary.total}`);
  logger.quiet(`Pages visited: ${result.pagesVisited}/${result.totalPages} (${result.status})`);

  logger.normal('\nTop Countries:');
  for (const { country, count } of summary.topCountries) {
    logger.normal(`  • ${country}: ${count} exhibitors`);
  }

  logger.normal('\nSample Exhibitors (first 3):');
  summary.samples.forEach((record, i) => {
    logger.normal(`\n  ${i + 1}. ${record.name}`);
    logger.normal(`     Stand: ${record.standNumber} | Hall: ${record.hall}`);
    logger.normal(`     Country: ${record.country}`);
    logger.normal(`     Sector: ${record.sector}`);
  });
}
