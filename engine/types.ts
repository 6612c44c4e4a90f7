// engine/types.ts
// Shared TypeScript interfaces for the KPI Dashboard engine
import type { LeaderboardMetric, SourceField } from './config';
import type { LoadErrorCode } from './errorCodes';

// ------------------------------------------------------------
// Raw input
// ------------------------------------------------------------

export type CellValue = string | number | boolean | null;

/**
 * RawRecord – one source row, keyed by trimmed column name.
 * The column set is not fixed; absent columns switch derivations off.
 */
export type RawRecord = Record<string, CellValue>;

export interface RawTable {
  columns: string[];
  rows: RawRecord[];
  sheet_name: string | null;
}

export type LoadResult =
  | { ok: true; table: RawTable }
  | { ok: false; error_code: LoadErrorCode; message: string };

// ------------------------------------------------------------
// Normalized records
// ------------------------------------------------------------

/** Calendar date as YYYY-MM-DD. Lexicographic order equals date order. */
export type IsoDate = string;

export type TaskId = string | number | null;

export interface DateRange {
  start: IsoDate | null;
  end: IsoDate | null;
}

/**
 * Column capabilities, resolved once per table from the header set.
 * - columns: the actual header name bound to each source field (or null)
 * - onTime / derivedEfficiency: derivations that need two columns at once
 */
export interface ColumnCapabilities {
  columns: Record<SourceField, string | null>;
  onTime: boolean;
  derivedEfficiency: boolean;
}

export interface NormalizedRecord {
  row_index: number;
  member: string | null;
  task_id: TaskId;

  completed_date: IsoDate | null;
  window_start: IsoDate | null;
  window_end: IsoDate | null;
  month_bucket: IsoDate | null;

  target_hours: number | null;
  actual_hours: number;

  quality_fraction: number | null;
  revision_fraction: number | null;
  efficiency_fraction: number | null;

  on_time: boolean | null;
  status: string | null;
  project: string | null;
}

export type ParseIssueField =
  | 'completed_date'
  | 'work_duration'
  | 'target_hours'
  | 'actual_hours'
  | 'efficiency'
  | 'quality'
  | 'revision';

export type ParseIssueCounts = Record<ParseIssueField, number>;

// Divisor chosen per percentage column (1 = fractions, 100 = points)
export interface FractionScales {
  quality: number;
  revision: number;
  efficiency: number;
}

export interface NormalizedSnapshot {
  capabilities: ColumnCapabilities;
  records: NormalizedRecord[];
  fraction_scales: FractionScales;
  parse_issues: ParseIssueCounts;
  sheet_name: string | null;
}

// ------------------------------------------------------------
// Aggregates
// ------------------------------------------------------------

export interface AggregateStats {
  quality_mean: number | null;
  revision_mean: number | null;
  on_time_rate: number | null;
  efficiency_mean: number | null;
  actual_hours: number;
  task_count: number;
}

export interface MemberMonthAggregate extends AggregateStats {
  month_bucket: IsoDate;
  member: string | null;
}

export interface TeamMonthAggregate extends AggregateStats {
  month_bucket: IsoDate;
}

export interface LeaderboardEntry {
  member: string | null;
  value: number | null;
}

export type Leaderboard =
  | {
      status: 'OK';
      month_bucket: IsoDate;
      rankings: Record<LeaderboardMetric, LeaderboardEntry[]>;
    }
  | { status: 'NO_DATA' };

// ------------------------------------------------------------
// Filtering / dashboard
// ------------------------------------------------------------

export interface RecordFilter {
  members?: string[];
  months?: string[];
  statuses?: string[];
}

export interface FilterOptions {
  members: string[];
  months: IsoDate[];
}

export type DashboardResult =
  | {
      status: 'OK';
      sheet_name: string | null;
      filter_options: FilterOptions;
      records: NormalizedRecord[];
      member_month: MemberMonthAggregate[];
      team_month: TeamMonthAggregate[];
      leaderboard: Leaderboard;
    }
  | {
      status: 'EMPTY_SELECTION';
      sheet_name: string | null;
      filter_options: FilterOptions;
      message: string;
    };
