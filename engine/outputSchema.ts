// engine/outputSchema.ts
// Single source of truth for the column schema of every table the engine
// returns. Renderers bind to these keys whatever source columns were present.

import type { MemberMonthAggregate, NormalizedRecord, TeamMonthAggregate } from './types';

export type OutputFormat = 'text' | 'date' | 'fraction' | 'number' | 'boolean';

export interface OutputColumn<K extends string> {
  key: K;
  header: string;
  format: OutputFormat;
  width: number;
}

export const RECORD_COLUMNS: readonly OutputColumn<keyof NormalizedRecord>[] = [
  { key: 'row_index', header: 'Row', format: 'number', width: 8 },
  { key: 'member', header: 'Member', format: 'text', width: 24 },
  { key: 'task_id', header: 'Task ID', format: 'text', width: 14 },
  { key: 'project', header: 'Project', format: 'text', width: 28 },
  { key: 'status', header: 'Status', format: 'text', width: 14 },
  { key: 'completed_date', header: 'Date Completed', format: 'date', width: 15 },
  { key: 'window_start', header: 'Window Start', format: 'date', width: 15 },
  { key: 'window_end', header: 'Window End', format: 'date', width: 15 },
  { key: 'month_bucket', header: 'Month', format: 'date', width: 12 },
  { key: 'target_hours', header: 'Target Hours', format: 'number', width: 14 },
  { key: 'actual_hours', header: 'Actual Hours', format: 'number', width: 14 },
  { key: 'quality_fraction', header: 'Quality', format: 'fraction', width: 10 },
  { key: 'revision_fraction', header: 'Revision Rate', format: 'fraction', width: 14 },
  { key: 'efficiency_fraction', header: 'Efficiency', format: 'fraction', width: 12 },
  { key: 'on_time', header: 'On Time', format: 'boolean', width: 10 }
];

export const TEAM_MONTH_COLUMNS: readonly OutputColumn<keyof TeamMonthAggregate>[] = [
  { key: 'month_bucket', header: 'Month', format: 'date', width: 12 },
  { key: 'quality_mean', header: 'Quality Score', format: 'fraction', width: 14 },
  { key: 'revision_mean', header: 'Revision Rate', format: 'fraction', width: 14 },
  { key: 'on_time_rate', header: 'On-time Delivery', format: 'fraction', width: 16 },
  { key: 'efficiency_mean', header: 'Efficiency', format: 'fraction', width: 12 },
  { key: 'actual_hours', header: 'Man-hours', format: 'number', width: 12 },
  { key: 'task_count', header: 'Tasks', format: 'number', width: 8 }
];

export const MEMBER_MONTH_COLUMNS: readonly OutputColumn<keyof MemberMonthAggregate>[] = [
  TEAM_MONTH_COLUMNS[0],
  { key: 'member', header: 'Member', format: 'text', width: 24 },
  ...TEAM_MONTH_COLUMNS.slice(1)
];
