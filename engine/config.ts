// engine/config.ts
// Canonical config for the KPI Dashboard engine.

export type SourceField =
  | 'member'
  | 'ref_number'
  | 'date_completed'
  | 'work_duration'
  | 'target_hours'
  | 'actual_hours'
  | 'efficiency'
  | 'quality'
  | 'revision'
  | 'status'
  | 'project';

export type MonthBucketSource = 'window_end' | 'window_start' | 'completed_date';

export type EfficiencySource = 'derived_hours' | 'efficiency_column';

export type LeaderboardMetric =
  | 'quality_mean'
  | 'revision_mean'
  | 'on_time_rate'
  | 'efficiency_mean'
  | 'actual_hours'
  | 'task_count';

export interface ColumnConfig {
  // Header aliases per source field; first alias present in the sheet wins.
  aliases: Record<SourceField, string[]>;
}

export interface DerivationConfig {
  monthBucketSources: MonthBucketSource[];
  efficiencySources: EfficiencySource[];
  fractionScaleThreshold: number;  // column max above this → percentage points
}

export interface DashboardConfig {
  name: string;
  columns: ColumnConfig;
  sheetPreference: string[];
  derivation: DerivationConfig;
  leaderboardMetrics: LeaderboardMetric[];
}

export const DEFAULT_DASHBOARD_CONFIG: DashboardConfig = {
  name: 'default',
  columns: {
    aliases: {
      member: ['Name', 'Member'],
      ref_number: ['Ref. number'],
      date_completed: ['Date Completed'],
      work_duration: ['Work Duration'],
      target_hours: ['Target Work Hours'],
      actual_hours: ['Actual Work Hours'],
      efficiency: ['Efficiency'],
      quality: ['QS%'],
      revision: ['Revision/s'],
      status: ['Status'],
      project: ['Project Involvement']
    }
  },
  sheetPreference: ['5', '1', 'Sheet1', 'Sheet 1'],
  derivation: {
    monthBucketSources: ['window_end', 'window_start', 'completed_date'],
    // Hours ratio is ground truth; the Efficiency column is only a fallback.
    efficiencySources: ['derived_hours', 'efficiency_column'],
    fractionScaleThreshold: 1.5
  },
  leaderboardMetrics: [
    'quality_mean',
    'revision_mean',
    'on_time_rate',
    'efficiency_mean',
    'actual_hours',
    'task_count'
  ]
};
