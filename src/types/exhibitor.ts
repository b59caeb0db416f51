import { z } from 'zod';

export const ExhibitorRecordSchema = z.object({
  name: z.string().trim().min(1),
  standNumber: z.string().default(''),
  country: z.string().default(''),
  sector: z.string().default(''),
  businessActivity: z.string().default(''),
  hall: z.string().default(''),
});

export type ExhibitorRecord = z.infer<typeof ExhibitorRecordSchema>;

/**
 * Fields filled by position from the non-hidden, non-fixed cells of a row,
 * in column order. The name always comes from the fixed column.
 */
export const POSITIONAL_FIELDS = [
  'standNumber',
  'country',
  'sector',
  'businessActivity',
  'hall',
] as const satisfies ReadonlyArray<keyof ExhibitorRecord>;

export type PositionalField = typeof POSITIONAL_FIELDS[number];

// Column headers for CSV/JSON output, in output order
export const EXPORT_COLUMNS = [
  ['Exhibitor Name', 'name'],
  ['Stand No', 'standNumber'],
  ['Country', 'country'],
  ['Sector', 'sector'],
  ['Business Activity', 'businessActivity'],
  ['Hall', 'hall'],
] as const satisfies ReadonlyArray<readonly [string, keyof ExhibitorRecord]>;

export type ExportColumn = typeof EXPORT_COLUMNS[number][0];
export type ExportRow = Record<ExportColumn, string>;

export function emptyRecord(): ExhibitorRecord {
  return {
    name: '',
    standNumber: '',
    country: '',
    sector: '',
    businessActivity: '',
    hall: '',
  };
}

export function toExportRow(record: ExhibitorRecord): ExportRow {
  return {
    'Exhibitor Name': record.name,
    'Stand No': record.standNumber,
    'Country': record.country,
    'Sector': record.sector,
    'Business Activity': record.businessActivity,
    'Hall': record.hall,
  };
}
