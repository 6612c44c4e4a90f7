// engine/readWorkbook.ts
//
// Read a task-tracking workbook (.xlsx) into a RawTable.

import ExcelJS from 'exceljs';
import { SHEET_PREFERENCE } from './constants';
import { ErrorCodes, ErrorCodeDescriptions } from './errorCodes';
import { isoDateFromDate } from './parseDate';
import { toCellValue, toSafeTrimmedString } from './normalizeFields';
import type { CellValue, LoadResult, RawRecord } from './types';

type FormulaResult = ExcelJS.CellFormulaValue['result'];

function fromFormulaResult(result: FormulaResult): CellValue {
  if (result === undefined) return null;
  if (result instanceof Date) return isoDateFromDate(result);
  if (typeof result === 'object') return null; // #N/A, #DIV/0!, ...
  return toCellValue(result);
}

/**
 * Convert one exceljs cell value to a CellValue.
 * - date cells → YYYY-MM-DD (exceljs stores them as UTC midnight)
 * - formulas → cached result
 * - rich text / hyperlinks → their plain text
 * - error cells → null
 */
export function fromExcelValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return isoDateFromDate(value);
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    return toCellValue(value);
  }
  if ('richText' in value) return toCellValue(value.richText.map((part) => part.text).join(''));
  if ('hyperlink' in value) return toCellValue(value.text);
  if ('error' in value) return null;
  if ('result' in value) return fromFormulaResult(value.result);
  return null;
}

/** First sheet named in SHEET_PREFERENCE, otherwise the first sheet. */
export function selectWorksheet(workbook: ExcelJS.Workbook): ExcelJS.Worksheet | undefined {
  for (const name of SHEET_PREFERENCE) {
    const sheet = workbook.getWorksheet(name);
    if (sheet) return sheet;
  }
  return workbook.worksheets[0];
}

interface HeaderCell {
  col: number;
  name: string;
}

function readHeader(sheet: ExcelJS.Worksheet): HeaderCell[] {
  const header: HeaderCell[] = [];
  sheet.getRow(1).eachCell((cell, colNumber) => {
    const name = toSafeTrimmedString(fromExcelValue(cell.value));
    if (name) header.push({ col: colNumber, name });
  });
  return header;
}

/**
 * Parse the workbook bytes into a RawTable.
 * - Header row is row 1; names are trimmed, blank header cells are ignored.
 * - Completely empty data rows are skipped.
 * - Load is all-or-nothing: any failure returns { ok: false } and no rows.
 */
export async function readWorkbook(data: ArrayBuffer): Promise<LoadResult> {
  const workbook = new ExcelJS.Workbook();

  try {
    await workbook.xlsx.load(data);
  } catch (err) {
    return {
      ok: false,
      error_code: ErrorCodes.FILE_UNREADABLE,
      message: `${ErrorCodeDescriptions[ErrorCodes.FILE_UNREADABLE]} ${err instanceof Error ? err.message : String(err)}`
    };
  }

  const worksheet = selectWorksheet(workbook);
  if (!worksheet) {
    return {
      ok: false,
      error_code: ErrorCodes.NO_WORKSHEET,
      message: ErrorCodeDescriptions[ErrorCodes.NO_WORKSHEET]
    };
  }

  const header = readHeader(worksheet);
  const rows: RawRecord[] = [];

  for (let rowIndex = 2; rowIndex <= worksheet.rowCount; rowIndex++) {
    const row = worksheet.getRow(rowIndex);
    const record: RawRecord = {};
    let hasValue = false;

    for (const { col, name } of header) {
      const value = fromExcelValue(row.getCell(col).value);
      record[name] = value;
      if (value !== null) hasValue = true;
    }

    if (hasValue) rows.push(record);
  }

  if (header.length === 0 || rows.length === 0) {
    return {
      ok: false,
      error_code: ErrorCodes.EMPTY_DATA,
      message: `${ErrorCodeDescriptions[ErrorCodes.EMPTY_DATA]} (sheet "${worksheet.name}")`
    };
  }

  return {
    ok: true,
    table: {
      columns: header.map((h) => h.name),
      rows,
      sheet_name: worksheet.name
    }
  };
}
