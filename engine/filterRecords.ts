// engine/filterRecords.ts
// Member / month / status selection over a normalized snapshot.

import { makeIsoDate, monthBucketOf, parseDate } from './parseDate';
import { toSafeTrimmedString } from './normalizeFields';
import type { FilterOptions, IsoDate, NormalizedRecord, RecordFilter } from './types';

const YEAR_MONTH = /^(\d{4})-(\d{1,2})$/;

/** "2025-07" or any parseable date → "2025-07-01"; null when neither. */
export function toMonthBucket(raw: string): IsoDate | null {
  const s = toSafeTrimmedString(raw);
  const ym = YEAR_MONTH.exec(s);
  if (ym) return makeIsoDate(Number(ym[1]), Number(ym[2]), 1);

  const date = parseDate(s);
  return date ? monthBucketOf(date) : null;
}

/** Sorted distinct members and month buckets, for the filter controls. */
export function listFilterOptions(records: readonly NormalizedRecord[]): FilterOptions {
  const members = new Set<string>();
  const months = new Set<IsoDate>();

  for (const r of records) {
    if (r.member !== null) members.add(r.member);
    if (r.month_bucket !== null) months.add(r.month_bucket);
  }

  return {
    members: Array.from(members).sort(),
    months: Array.from(months).sort()
  };
}

/**
 * Apply a selection. An absent or empty list selects everything for that
 * dimension. A month selection drops records without a month_bucket.
 * Statuses match case-insensitively.
 */
export function filterRecords(
  records: readonly NormalizedRecord[],
  filter: RecordFilter = {}
): NormalizedRecord[] {
  const members = filter.members?.length ? new Set(filter.members.map(toSafeTrimmedString)) : null;

  const months = filter.months?.length
    ? new Set(
        filter.months
          .map(toMonthBucket)
          .filter((m): m is IsoDate => m !== null)
      )
    : null;

  const statuses = filter.statuses?.length
    ? new Set(filter.statuses.map((s) => toSafeTrimmedString(s).toLowerCase()))
    : null;

  return records.filter((r) => {
    if (members && (r.member === null || !members.has(r.member))) return false;
    if (months && (r.month_bucket === null || !months.has(r.month_bucket))) return false;
    if (statuses && (r.status === null || !statuses.has(r.status.toLowerCase()))) return false;
    return true;
  });
}
