// engine/aggregate.ts
// Aggregator: normalized records → per-member-month and per-team-month tables
//
// Both tables are recomputed from whatever subset of records the caller passes
// (filtering happens upstream). Records without a month_bucket are excluded.

import type {
  AggregateStats,
  IsoDate,
  MemberMonthAggregate,
  NormalizedRecord,
  TeamMonthAggregate
} from './types';

interface Accumulator {
  quality: number[];
  revision: number[];
  onTime: number[];
  efficiency: number[];
  hours: number;
  tasks: number;
}

function newAccumulator(): Accumulator {
  return { quality: [], revision: [], onTime: [], efficiency: [], hours: 0, tasks: 0 };
}

function accumulate(acc: Accumulator, r: NormalizedRecord): void {
  if (r.quality_fraction !== null) acc.quality.push(r.quality_fraction);
  if (r.revision_fraction !== null) acc.revision.push(r.revision_fraction);
  if (r.on_time !== null) acc.onTime.push(r.on_time ? 1 : 0);
  if (r.efficiency_fraction !== null) acc.efficiency.push(r.efficiency_fraction);
  acc.hours += r.actual_hours;
  if (r.task_id !== null) acc.tasks += 1;
}

/** Arithmetic mean of the non-null values; null for an empty list (never NaN). */
export function meanOrNull(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

function finish(acc: Accumulator): AggregateStats {
  return {
    quality_mean: meanOrNull(acc.quality),
    revision_mean: meanOrNull(acc.revision),
    on_time_rate: meanOrNull(acc.onTime),
    efficiency_mean: meanOrNull(acc.efficiency),
    actual_hours: acc.hours,
    task_count: acc.tasks
  };
}

function compareText(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;   // null member sorts last
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

/**
 * Group by (month_bucket, member). Records with a null member form their own
 * group so that member totals always add up to the team totals.
 * Sorted by month ascending, then member (null last).
 */
export function aggregateByMemberMonth(records: readonly NormalizedRecord[]): MemberMonthAggregate[] {
  const groups = new Map<string, { month: IsoDate; member: string | null; acc: Accumulator }>();

  for (const r of records) {
    if (r.month_bucket === null) continue;
    const key = JSON.stringify([r.month_bucket, r.member]);
    let group = groups.get(key);
    if (!group) {
      group = { month: r.month_bucket, member: r.member, acc: newAccumulator() };
      groups.set(key, group);
    }
    accumulate(group.acc, r);
  }

  return Array.from(groups.values())
    .map((g) => ({ month_bucket: g.month, member: g.member, ...finish(g.acc) }))
    .sort((a, b) => compareText(a.month_bucket, b.month_bucket) || compareText(a.member, b.member));
}

/** Group by month_bucket only, across every member in the input. */
export function aggregateByTeamMonth(records: readonly NormalizedRecord[]): TeamMonthAggregate[] {
  const groups = new Map<IsoDate, Accumulator>();

  for (const r of records) {
    if (r.month_bucket === null) continue;
    let acc = groups.get(r.month_bucket);
    if (!acc) {
      acc = newAccumulator();
      groups.set(r.month_bucket, acc);
    }
    accumulate(acc, r);
  }

  return Array.from(groups.entries())
    .map(([month_bucket, acc]) => ({ month_bucket, ...finish(acc) }))
    .sort((a, b) => compareText(a.month_bucket, b.month_bucket));
}

/** Latest month present in a member-month table, or null when it is empty. */
export function latestMonth(rows: readonly MemberMonthAggregate[]): IsoDate | null {
  let latest: IsoDate | null = null;
  for (const row of rows) {
    if (latest === null || row.month_bucket > latest) latest = row.month_bucket;
  }
  return latest;
}
