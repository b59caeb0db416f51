import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger.js';
import { EXPORT_COLUMNS, toExportRow } from '../types/exhibitor.js';
import type { ExhibitorRecord } from '../types/exhibitor.js';

const log = logger.createContext('export');

export const CSV_FILENAME = 'wetex_exhibitors.csv';
export const JSON_FILENAME = 'wetex_exhibitors.json';

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Header row plus one line per record, CRLF line endings.
 */
export function toCsv(records: readonly ExhibitorRecord[]): string {
  const header = EXPORT_COLUMNS.map(([column]) => csvField(column)).join(',');
  const lines = records.map(record =>
    EXPORT_COLUMNS.map(([, field]) => csvField(record[field])).join(',')
  );
  return [header, ...lines].join('\r\n') + '\r\n';
}

export function toJson(records: readonly ExhibitorRecord[]): string {
  return JSON.stringify(records.map(toExportRow), null, 2) + '\n';
}

async function write(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf-8');
}

/**
 * Write records as CSV. Returns false (and writes nothing) when there are none.
 */
export async function saveCsv(records: readonly ExhibitorRecord[], filePath: string): Promise<boolean> {
  if (records.length === 0) {
    log.warn('No data to save');
    return false;
  }
  await write(filePath, toCsv(records));
  log.normal(`Data saved to ${filePath}`);
  return true;
}

export async function saveJson(records: readonly ExhibitorRecord[], filePath: string): Promise<boolean> {
  if (records.length === 0) {
    log.warn('No data to save');
    return false;
  }
  await write(filePath, toJson(records));
  log.normal(`Data saved to ${filePath}`);
  return true;
}
