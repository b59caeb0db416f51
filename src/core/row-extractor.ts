import { logger } from '../utils/logger.js';
import { errorMessage } from '../types/errors.js';
import { POSITIONAL_FIELDS, emptyRecord } from '../types/exhibitor.js';
import type { ExhibitorRecord } from '../types/exhibitor.js';
import type { RenderHandle } from '../types/render-handle.js';
import type { CellMarkers, ListingSite } from '../scrapers/types.js';

const log = logger.createContext('row-extractor');

/**
 * What the classifier needs from a cell: its raw class attribute and text.
 */
export interface CellSnapshot {
  className: string;
  text: string;
}

function hasClass(className: string, token: string): boolean {
  return className.split(/\s+/).includes(token);
}

/**
 * Map one row's cells to a record. The fixed cell is the name wherever it
 * sits; hidden cells are dropped; the rest fill POSITIONAL_FIELDS in order.
 * Returns null when the row has no name.
 */
export function classifyCells(cells: readonly CellSnapshot[], markers: CellMarkers): ExhibitorRecord | null {
  const record = emptyRecord();
  let position = 0;

  for (const cell of cells) {
    const text = cell.text.trim();

    if (hasClass(cell.className, markers.fixed)) {
      record.name = text;
    } else if (!hasClass(cell.className, markers.hidden)) {
      const field = POSITIONAL_FIELDS[position];
      if (field) {
        record[field] = text;
      }
      position++;
    }
  }

  return record.name ? record : null;
}

/**
 * Extract records from the data rows currently rendered in the table body.
 * An absent table body or no data rows gives an empty list; a row that fails
 * to read is skipped.
 */
export async function extractRecords(handle: RenderHandle, site: ListingSite): Promise<ExhibitorRecord[]> {
  const [tableBody] = await handle.find('id', site.tableBodyId);
  if (!tableBody) {
    log.debug(`Table body #${site.tableBodyId} not found`);
    return [];
  }

  const rows = await tableBody.find('css', `tr.${site.dataRowClass}`);
  const records: ExhibitorRecord[] = [];

  for (const [index, row] of rows.entries()) {
    try {
      const cells = await row.find('css', `.${site.cellClass}`);
      const snapshots: CellSnapshot[] = [];
      for (const cell of cells) {
        snapshots.push({
          className: (await cell.attribute('class')) ?? '',
          text: await cell.text()
        });
      }

      const record = classifyCells(snapshots, site.markers);
      if (record) {
        records.push(record);
      } else {
        log.debug(`Row ${index + 1} has no name, skipped`);
      }
    } catch (error) {
      log.warn(`Error processing row ${index + 1}: ${errorMessage(error)}`);
    }
  }

  log.verbose(`Extracted ${records.length} of ${rows.length} data rows`);
  return records;
}

export interface TableState {
  bodyFound: boolean;
  /** Every `tr` in the table body, header rows included */
  rowCount: number;
  dataRowCount: number;
  firstRowCellCount: number;
  /** First 50 characters of the first data row's first cell */
  firstCellText: string;
  htmlLength: number;
}

/**
 * Log what the table body holds right now. Rows present but no data rows
 * usually means the row or cell marker classes have changed on the site.
 * Returns null when the table could not be inspected.
 */
export async function describeTableState(handle: RenderHandle, site: ListingSite): Promise<TableState | null> {
  try {
    const [tableBody] = await handle.find('id', site.tableBodyId);
    const state: TableState = {
      bodyFound: tableBody !== undefined,
      rowCount: 0,
      dataRowCount: 0,
      firstRowCellCount: 0,
      firstCellText: '',
      htmlLength: 0
    };

    if (tableBody) {
      state.rowCount = (await tableBody.find('css', 'tr')).length;
      const dataRows = await tableBody.find('css', `tr.${site.dataRowClass}`);
      state.dataRowCount = dataRows.length;

      const [firstRow] = dataRows;
      if (firstRow) {
        const cells = await firstRow.find('css', 'td');
        state.firstRowCellCount = cells.length;
        const [firstCell] = cells;
        if (firstCell) {
          state.firstCellText = (await firstCell.text()).trim().slice(0, 50);
        }
      }
      state.htmlLength = (await tableBody.html()).length;
    }

    log.debug(
      `Table state: body ${state.bodyFound ? 'found' : 'missing'}, ` +
      `${state.rowCount} rows, ${state.dataRowCount} data rows, ` +
      `first row ${state.firstRowCellCount} cells ("${state.firstCellText}"), ` +
      `${state.htmlLength} chars of HTML`
    );
    return state;
  } catch (error) {
    log.debug(`Could not inspect table: ${errorMessage(error)}`);
    return null;
  }
}
