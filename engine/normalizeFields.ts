// engine/normalizeFields.ts
// Cell and header normalization helpers for the KPI Dashboard engine

// ---- Types (imported first) ----
import type { SourceField } from './config';
import type { CellValue, ColumnCapabilities, RawRecord } from './types';

// ---- Constants ----
import { aliasesLower } from './constants';
import { DECIMAL_NUMBER, TRAILING_PERCENT } from './regex';

// ---- Runtime imports ----
import { isoDateFromDate } from './parseDate';

// ------------------------------------------------------------
// Core string helper
// ------------------------------------------------------------

/**
 * Safely convert any unknown value to a trimmed string.
 * Never returns null/undefined; always returns a string (possibly empty).
 */
export function toSafeTrimmedString(value: unknown): string {
  return (value ?? '').toString().trim();
}

export function toTextOrNull(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  const s = toSafeTrimmedString(value);
  return s === '' ? null : s;
}

// ------------------------------------------------------------
// Numeric coercion
// ------------------------------------------------------------

/**
 * Coerce a cell to a finite number, or null.
 * - numbers pass through (NaN / ±Infinity → null)
 * - strings are trimmed; a trailing "%" is dropped ("92%" → 92)
 * - only plain decimal text counts ("0x1A", "0b11", "1_000" → null)
 * - empty strings, booleans and text → null
 */
export function toNumberOrNull(value: CellValue | undefined): number | null {
  if (value === null || value === undefined || typeof value === 'boolean') return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;

  const s = value.trim().replace(TRAILING_PERCENT, '');
  if (!DECIMAL_NUMBER.test(s)) return null;

  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

// ------------------------------------------------------------
// Cell values from transport / parsers
// ------------------------------------------------------------

/**
 * Narrow an arbitrary JSON/CSV value to a CellValue.
 * Dates become YYYY-MM-DD; blank strings and non-scalars become null.
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const s = value.trim();
    return s === '' ? null : s;
  }
  if (value instanceof Date) return isoDateFromDate(value);
  return null;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function isBlankRecord(row: RawRecord): boolean {
  return Object.values(row).every((v) => v === null);
}

/** Copy a row with trimmed column names; later duplicates of a trimmed name win. */
export function trimKeys(row: Record<string, unknown>): RawRecord {
  const result: RawRecord = {};
  for (const [key, value] of Object.entries(row)) {
    const k = key.trim();
    if (!k) continue;
    result[k] = toCellValue(value);
  }
  return result;
}

// ------------------------------------------------------------
// Column capabilities
// ------------------------------------------------------------

function resolveColumn(field: SourceField, columns: readonly string[]): string | null {
  const wanted = aliasesLower(field);
  for (const alias of wanted) {
    const hit = columns.find((c) => c.trim().toLowerCase() === alias);
    if (hit !== undefined) return hit;
  }
  return null;
}

/**
 * Bind every source field to the header that carries it, once per table.
 * Matching is on trimmed, lowercased names; aliases are tried in config order.
 */
export function detectColumns(columns: readonly string[]): ColumnCapabilities {
  const resolved: Record<SourceField, string | null> = {
    member: resolveColumn('member', columns),
    ref_number: resolveColumn('ref_number', columns),
    date_completed: resolveColumn('date_completed', columns),
    work_duration: resolveColumn('work_duration', columns),
    target_hours: resolveColumn('target_hours', columns),
    actual_hours: resolveColumn('actual_hours', columns),
    efficiency: resolveColumn('efficiency', columns),
    quality: resolveColumn('quality', columns),
    revision: resolveColumn('revision', columns),
    status: resolveColumn('status', columns),
    project: resolveColumn('project', columns)
  };

  return {
    columns: resolved,
    onTime: resolved.date_completed !== null && resolved.work_duration !== null,
    derivedEfficiency: resolved.target_hours !== null && resolved.actual_hours !== null
  };
}

/** Union of the (trimmed) keys of all rows, in first-seen order. */
export function collectColumns(rows: readonly RawRecord[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return Array.from(seen);
}
