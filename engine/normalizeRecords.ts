// engine/normalizeRecords.ts
// Row Normalizer: RawTable → NormalizedSnapshot
//
// Two passes:
//  1. column pass – scale each percentage column by its own divisor
//  2. row pass    – derive every NormalizedRecord from its own row, the column
//                   capabilities and its scaled fractions (no other cross-row state)

import type {
  CellValue,
  ColumnCapabilities,
  FractionScales,
  IsoDate,
  NormalizedRecord,
  NormalizedSnapshot,
  ParseIssueCounts,
  ParseIssueField,
  RawRecord,
  RawTable,
  TaskId
} from './types';
import type { SourceField } from './config';

import { EFFICIENCY_SOURCES, MONTH_BUCKET_SOURCES } from './constants';
import { detectColumns, toNumberOrNull, toTextOrNull } from './normalizeFields';
import { monthBucketOf, parseDate } from './parseDate';
import { parseDateRange } from './parseRange';
import { scaleFractionColumn } from './scaleFraction';

function cell(row: RawRecord, caps: ColumnCapabilities, field: SourceField): CellValue {
  const column = caps.columns[field];
  if (column === null) return null;
  return row[column] ?? null;
}

function hours(row: RawRecord, caps: ColumnCapabilities, field: 'target_hours' | 'actual_hours'): number | null {
  const n = toNumberOrNull(cell(row, caps, field));
  // Effort is non-negative; anything below zero is treated as unparseable.
  return n !== null && n >= 0 ? n : null;
}

function readTaskId(row: RawRecord, caps: ColumnCapabilities, rowIndex: number): TaskId {
  if (caps.columns.ref_number === null) return rowIndex;
  const v = cell(row, caps, 'ref_number');
  if (v === null) return null;
  return typeof v === 'boolean' ? String(v) : v;
}

function resolveEfficiency(
  target: number | null,
  actual: number | null,
  supplied: number | null,
  caps: ColumnCapabilities
): number | null {
  for (const source of EFFICIENCY_SOURCES) {
    if (source === 'derived_hours') {
      if (caps.derivedEfficiency && target !== null && actual !== null) {
        // Zero actual hours: no ratio, and no fallback to the supplied column.
        return actual === 0 ? null : target / actual;
      }
    } else if (source === 'efficiency_column' && supplied !== null) {
      return supplied;
    }
  }
  return null;
}

function resolveMonthBucket(dates: Record<'window_end' | 'window_start' | 'completed_date', IsoDate | null>): IsoDate | null {
  for (const source of MONTH_BUCKET_SOURCES) {
    const d = dates[source];
    if (d) return monthBucketOf(d);
  }
  return null;
}

/** The row's already-scaled percentage values. */
export interface RowFractions {
  quality: number | null;
  revision: number | null;
  efficiency: number | null;
}

/**
 * Normalize one row. Pure: depends only on the row, its position, the column
 * capabilities and the row's scaled fractions.
 */
export function normalizeRecord(
  row: RawRecord,
  rowIndex: number,
  caps: ColumnCapabilities,
  fractions: RowFractions
): NormalizedRecord {
  const completed_date = parseDate(cell(row, caps, 'date_completed'));

  const range = parseDateRange(cell(row, caps, 'work_duration'));
  const window_start = range.start;
  // A range without an end falls back to the completion date.
  const window_end =
    range.end ?? (caps.columns.work_duration !== null ? completed_date : null);

  const target_hours = hours(row, caps, 'target_hours');
  const actualParsed = hours(row, caps, 'actual_hours');

  const on_time =
    caps.onTime && completed_date !== null && window_end !== null
      ? completed_date <= window_end
      : null;

  return {
    row_index: rowIndex,
    member: toTextOrNull(cell(row, caps, 'member')),
    task_id: readTaskId(row, caps, rowIndex),

    completed_date,
    window_start,
    window_end,
    month_bucket: resolveMonthBucket({ window_end, window_start, completed_date }),

    target_hours,
    actual_hours: actualParsed ?? 0,

    quality_fraction: fractions.quality,
    revision_fraction: fractions.revision,
    efficiency_fraction: resolveEfficiency(target_hours, actualParsed, fractions.efficiency, caps),

    on_time,
    status: toTextOrNull(cell(row, caps, 'status')),
    project: toTextOrNull(cell(row, caps, 'project'))
  };
}

type FractionField = 'quality' | 'revision' | 'efficiency';

export interface ScaledFractionColumns {
  values: Record<FractionField, Array<number | null>>;
  scales: FractionScales;
}

/** Collect each percentage column, decide its divisor once and scale it. */
export function scaleFractionColumns(rows: readonly RawRecord[], caps: ColumnCapabilities): ScaledFractionColumns {
  const scale = (field: FractionField) =>
    scaleFractionColumn(rows.map((row) => toNumberOrNull(cell(row, caps, field))));

  const quality = scale('quality');
  const revision = scale('revision');
  const efficiency = scale('efficiency');

  return {
    values: { quality: quality.values, revision: revision.values, efficiency: efficiency.values },
    scales: { quality: quality.divisor, revision: revision.divisor, efficiency: efficiency.divisor }
  };
}

// ------------------------------------------------------------
// Parse-issue accounting (logging only; never drops a row)
// ------------------------------------------------------------

function emptyIssueCounts(): ParseIssueCounts {
  return {
    completed_date: 0,
    work_duration: 0,
    target_hours: 0,
    actual_hours: 0,
    efficiency: 0,
    quality: 0,
    revision: 0
  };
}

function countIssues(
  row: RawRecord,
  caps: ColumnCapabilities,
  record: NormalizedRecord,
  counts: ParseIssueCounts
): void {
  const bump = (field: ParseIssueField, source: SourceField, parsedOk: boolean) => {
    if (!parsedOk && toTextOrNull(cell(row, caps, source)) !== null) counts[field] += 1;
  };

  bump('completed_date', 'date_completed', record.completed_date !== null);
  bump('work_duration', 'work_duration', record.window_start !== null);
  bump('target_hours', 'target_hours', record.target_hours !== null);
  bump('actual_hours', 'actual_hours', hours(row, caps, 'actual_hours') !== null);
  bump('efficiency', 'efficiency', toNumberOrNull(cell(row, caps, 'efficiency')) !== null);
  bump('quality', 'quality', record.quality_fraction !== null);
  bump('revision', 'revision', record.revision_fraction !== null);
}

/**
 * Normalize a whole table. Every input row yields exactly one record, in input
 * order; records with no resolvable date keep a null month_bucket.
 */
export function normalizeTable(table: RawTable): NormalizedSnapshot {
  const capabilities = detectColumns(table.columns);
  const fractions = scaleFractionColumns(table.rows, capabilities);
  const parse_issues = emptyIssueCounts();

  const records = table.rows.map((row, index) => {
    const record = normalizeRecord(row, index, capabilities, {
      quality: fractions.values.quality[index],
      revision: fractions.values.revision[index],
      efficiency: fractions.values.efficiency[index]
    });
    countIssues(row, capabilities, record, parse_issues);
    return record;
  });

  return {
    capabilities,
    records,
    fraction_scales: fractions.scales,
    parse_issues,
    sheet_name: table.sheet_name
  };
}
