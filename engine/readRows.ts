// engine/readRows.ts
//
// CSV text and JSON rows → RawTable.

import { parse } from 'csv-parse/sync';
import { ErrorCodes, ErrorCodeDescriptions } from './errorCodes';
import { collectColumns, isBlankRecord, isPlainObject, trimKeys } from './normalizeFields';
import type { LoadResult, RawRecord } from './types';

function emptyData(detail: string): LoadResult {
  return {
    ok: false,
    error_code: ErrorCodes.EMPTY_DATA,
    message: `${ErrorCodeDescriptions[ErrorCodes.EMPTY_DATA]} (${detail})`
  };
}

/**
 * JSON rows (already transport-validated) → RawTable.
 * Column names are trimmed; nested or non-scalar values become null;
 * rows with no value at all are skipped.
 */
export function readJsonRows(rows: readonly unknown[]): LoadResult {
  const records: RawRecord[] = rows
    .filter(isPlainObject)
    .map(trimKeys)
    .filter((r) => !isBlankRecord(r));

  if (records.length === 0) return emptyData('no rows');

  return {
    ok: true,
    table: { columns: collectColumns(records), rows: records, sheet_name: null }
  };
}

/**
 * CSV with a header row → RawTable.
 * Cells are trimmed; empty cells become null; blank lines are skipped.
 */
export function readCsv(csvText: string): LoadResult {
  if (!csvText || csvText.trim().length === 0) return emptyData('empty CSV text');

  let parsed: unknown;
  try {
    parsed = parse(csvText, {
      bom: true,
      columns: (header: string[]) => header.map((h) => h.trim()),
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true
    });
  } catch (err) {
    return {
      ok: false,
      error_code: ErrorCodes.FILE_UNREADABLE,
      message: `${ErrorCodeDescriptions[ErrorCodes.FILE_UNREADABLE]} ${err instanceof Error ? err.message : String(err)}`
    };
  }

  if (!Array.isArray(parsed)) return emptyData('CSV produced no records');

  const result = readJsonRows(parsed);
  if (!result.ok) return emptyData('CSV has a header but no data rows');
  return result;
}
