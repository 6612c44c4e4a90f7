// engine/leaderboard.ts
// Per-metric member rankings for the latest month of the member-month table.

import type { LeaderboardMetric } from './config';
import { LEADERBOARD_METRICS } from './constants';
import { latestMonth } from './aggregate';
import type { Leaderboard, LeaderboardEntry, MemberMonthAggregate } from './types';

/**
 * Descending by value, nulls last whatever the metric.
 * Array.prototype.sort is stable, so ties keep member-month table order.
 */
export function rankDescending(entries: readonly LeaderboardEntry[]): LeaderboardEntry[] {
  return entries.slice().sort((a, b) => {
    if (a.value === null && b.value === null) return 0;
    if (a.value === null) return 1;
    if (b.value === null) return -1;
    return b.value - a.value;
  });
}

/**
 * Build the leaderboard. An empty table is not an error: the result is
 * { status: 'NO_DATA' } and no ranking is computed.
 */
export function buildLeaderboard(
  memberMonth: readonly MemberMonthAggregate[],
  metrics: readonly LeaderboardMetric[] = LEADERBOARD_METRICS
): Leaderboard {
  const month = latestMonth(memberMonth);
  if (month === null) return { status: 'NO_DATA' };

  const rows = memberMonth.filter((r) => r.month_bucket === month);

  const rankings: Record<LeaderboardMetric, LeaderboardEntry[]> = {
    quality_mean: [],
    revision_mean: [],
    on_time_rate: [],
    efficiency_mean: [],
    actual_hours: [],
    task_count: []
  };

  for (const metric of metrics) {
    rankings[metric] = rankDescending(rows.map((r) => ({ member: r.member, value: r[metric] })));
  }

  return { status: 'OK', month_bucket: month, rankings };
}
