// engine/parseDate.ts
// Multi-format date-cell parsing for the KPI Dashboard engine

import {
  DATE_COMPACT_YYYYMMDD,
  DATE_YYYY_MM_DD,
  DATE_YYYY_MM_DD_SLASH,
  DATE_YYYY_MM_DD_DOT,
  DATE_NN_NN_YYYY_SLASH,
  DATE_ISO_DATETIME,
  DATE_DD_MM_YYYY_DASH,
  DATE_DD_MM_YYYY_DOT,
  DATE_YYYY_MM_DD_SPACE,
  DATE_YYYY_TEXT_MONTH_DD,
  DATE_DD_TEXT_MONTH_YYYY,
  DATE_TEXT_MONTH_DD_YYYY
} from './regex';

import type { CellValue, IsoDate } from './types';

type PartOrder = 'ymd' | 'dmy' | 'mdy';

interface DateFormat {
  label: string;
  pattern: RegExp;
  order: PartOrder;
}

/**
 * Explicit formats, tried in this order; the first full match that is also a
 * real calendar date wins. DD/MM/YYYY is tried before MM/DD/YYYY, so
 * "03/07/2025" is 3 July and "12/31/2025" falls through to month-first.
 */
export const EXPLICIT_DATE_FORMATS: readonly DateFormat[] = [
  { label: 'YYYYMMDD', pattern: DATE_COMPACT_YYYYMMDD, order: 'ymd' },
  { label: 'YYYY-MM-DD', pattern: DATE_YYYY_MM_DD, order: 'ymd' },
  { label: 'YYYY/MM/DD', pattern: DATE_YYYY_MM_DD_SLASH, order: 'ymd' },
  { label: 'YYYY.MM.DD', pattern: DATE_YYYY_MM_DD_DOT, order: 'ymd' },
  { label: 'DD/MM/YYYY', pattern: DATE_NN_NN_YYYY_SLASH, order: 'dmy' },
  { label: 'MM/DD/YYYY', pattern: DATE_NN_NN_YYYY_SLASH, order: 'mdy' }
];

const FALLBACK_NUMERIC_FORMATS: readonly DateFormat[] = [
  { label: 'ISO datetime', pattern: DATE_ISO_DATETIME, order: 'ymd' },
  { label: 'DD-MM-YYYY', pattern: DATE_DD_MM_YYYY_DASH, order: 'dmy' },
  { label: 'DD.MM.YYYY', pattern: DATE_DD_MM_YYYY_DOT, order: 'dmy' },
  { label: 'YYYY MM DD', pattern: DATE_YYYY_MM_DD_SPACE, order: 'ymd' }
];

const MONTH_INDEX: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12
};

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Build a YYYY-MM-DD string, or null when the parts are not a real date.
 * Rejects JS rollover (2025-02-31 → 2025-03-03).
 */
export function makeIsoDate(y: number, m1: number, d: number): IsoDate | null {
  if (!Number.isInteger(y) || !Number.isInteger(m1) || !Number.isInteger(d)) return null;
  if (m1 < 1 || m1 > 12) return null;
  if (d < 1 || d > 31) return null;

  const dt = new Date(Date.UTC(y, m1 - 1, d));
  if (dt.getUTCFullYear() !== y) return null;
  if (dt.getUTCMonth() !== m1 - 1) return null;
  if (dt.getUTCDate() !== d) return null;

  return `${String(y).padStart(4, '0')}-${pad2(m1)}-${pad2(d)}`;
}

/** Calendar date of a JS Date in UTC (exceljs hands date cells over as UTC midnight). */
export function isoDateFromDate(value: Date): IsoDate | null {
  if (Number.isNaN(value.getTime())) return null;
  return makeIsoDate(value.getUTCFullYear(), value.getUTCMonth() + 1, value.getUTCDate());
}

function applyFormat(raw: string, format: DateFormat): IsoDate | null {
  const m = format.pattern.exec(raw);
  if (!m) return null;

  const a = Number(m[1]);
  const b = Number(m[2]);
  const c = Number(m[3]);

  switch (format.order) {
    case 'ymd':
      return makeIsoDate(a, b, c);
    case 'dmy':
      return makeIsoDate(c, b, a);
    case 'mdy':
      return makeIsoDate(c, a, b);
  }
}

function monthFromWord(word: string): number | null {
  return MONTH_INDEX[word.slice(0, 3).toLowerCase()] ?? null;
}

function parseTextMonth(raw: string): IsoDate | null {
  let m = DATE_YYYY_TEXT_MONTH_DD.exec(raw);
  if (m) {
    const month = monthFromWord(m[2]);
    return month ? makeIsoDate(Number(m[1]), month, Number(m[3])) : null;
  }

  m = DATE_DD_TEXT_MONTH_YYYY.exec(raw);
  if (m) {
    const month = monthFromWord(m[2]);
    return month ? makeIsoDate(Number(m[3]), month, Number(m[1])) : null;
  }

  m = DATE_TEXT_MONTH_DD_YYYY.exec(raw);
  if (m) {
    const month = monthFromWord(m[1]);
    return month ? makeIsoDate(Number(m[3]), month, Number(m[2])) : null;
  }

  return null;
}

/**
 * Parse a single date cell into YYYY-MM-DD.
 *
 * Order:
 *  1. exactly 8 digits (optionally ".0") → YYYYMMDD, null if not a real date
 *  2. explicit formats (EXPLICIT_DATE_FORMATS), first full match wins
 *  3. permissive fallback: ISO datetime, DD-MM-YYYY, DD.MM.YYYY, YYYY MM DD,
 *     textual months
 *
 * Total: unparseable input yields null, never throws.
 */
export function parseDate(value: CellValue | undefined): IsoDate | null {
  if (value === null || value === undefined || typeof value === 'boolean') return null;

  const raw = String(value).trim();
  if (!raw) return null;

  const compact = DATE_COMPACT_YYYYMMDD.exec(raw);
  if (compact) {
    return makeIsoDate(Number(compact[1]), Number(compact[2]), Number(compact[3]));
  }

  for (const format of EXPLICIT_DATE_FORMATS) {
    const parsed = applyFormat(raw, format);
    if (parsed) return parsed;
  }

  for (const format of FALLBACK_NUMERIC_FORMATS) {
    const parsed = applyFormat(raw, format);
    if (parsed) return parsed;
  }

  return parseTextMonth(raw);
}

/** First day of the month containing the given date. */
export function monthBucketOf(date: IsoDate): IsoDate {
  return `${date.slice(0, 7)}-01`;
}
