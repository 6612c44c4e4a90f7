// engine/dashboardWorkbook.ts
// KPI_Dashboard.xlsx: records, both aggregate tables and the leaderboard.

import ExcelJS from 'exceljs';
import type { LeaderboardMetric } from './config';
import { LEADERBOARD_METRICS } from './constants';
import {
  MEMBER_MONTH_COLUMNS,
  RECORD_COLUMNS,
  TEAM_MONTH_COLUMNS,
  type OutputColumn
} from './outputSchema';
import type {
  CellValue,
  Leaderboard,
  MemberMonthAggregate,
  NormalizedRecord,
  TeamMonthAggregate
} from './types';

const FRACTION_NUM_FMT = '0.0%';

function toExcelValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
}

function addTableSheet<T extends object>(
  workbook: ExcelJS.Workbook,
  name: string,
  columns: readonly OutputColumn<Extract<keyof T, string>>[],
  rows: readonly T[]
): ExcelJS.Worksheet {
  const sheet = workbook.addWorksheet(name);

  sheet.columns = columns.map((c) => ({ header: c.header, key: c.key, width: c.width }));
  sheet.getRow(1).font = { bold: true };

  for (const row of rows) {
    const values: Record<string, CellValue> = {};
    for (const c of columns) values[c.key] = toExcelValue(row[c.key]);
    sheet.addRow(values);
  }

  for (const c of columns) {
    if (c.format === 'fraction') sheet.getColumn(c.key).numFmt = FRACTION_NUM_FMT;
  }

  return sheet;
}

const METRIC_LABELS: Record<LeaderboardMetric, string> = {
  quality_mean: 'Quality Score',
  revision_mean: 'Revision Rate',
  on_time_rate: 'On-time Delivery',
  efficiency_mean: 'Efficiency',
  actual_hours: 'Man-hours',
  task_count: 'Tasks'
};

function addLeaderboardSheet(workbook: ExcelJS.Workbook, leaderboard: Leaderboard): void {
  const sheet = workbook.addWorksheet('Leaderboard');
  sheet.columns = [
    { header: 'Month', key: 'month', width: 12 },
    { header: 'Metric', key: 'metric', width: 18 },
    { header: 'Rank', key: 'rank', width: 8 },
    { header: 'Member', key: 'member', width: 24 },
    { header: 'Value', key: 'value', width: 12 }
  ];
  sheet.getRow(1).font = { bold: true };

  if (leaderboard.status === 'NO_DATA') return;

  for (const metric of LEADERBOARD_METRICS) {
    leaderboard.rankings[metric].forEach((entry, index) => {
      sheet.addRow({
        month: leaderboard.month_bucket,
        metric: METRIC_LABELS[metric],
        rank: index + 1,
        member: entry.member ?? '',
        value: entry.value
      });
    });
  }
}

export interface DashboardWorkbookInput {
  records: NormalizedRecord[];
  member_month: MemberMonthAggregate[];
  team_month: TeamMonthAggregate[];
  leaderboard: Leaderboard;
}

export async function buildDashboardWorkbook(
  input: DashboardWorkbookInput,
  dateISO: string
): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const createdAt = new Date(`${dateISO}T00:00:00.000Z`);
  if (!Number.isNaN(createdAt.getTime())) {
    workbook.created = createdAt;
    workbook.modified = createdAt;
  }

  addTableSheet(workbook, 'Records', RECORD_COLUMNS, input.records);
  addTableSheet(workbook, 'Member_Month', MEMBER_MONTH_COLUMNS, input.member_month);
  addTableSheet(workbook, 'Team_Month', TEAM_MONTH_COLUMNS, input.team_month);
  addLeaderboardSheet(workbook, input.leaderboard);

  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}
