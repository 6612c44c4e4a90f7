import { buildDashboardWorkbook } from '../../engine/dashboardWorkbook';
import { aggregateByMemberMonth, aggregateByTeamMonth } from '../../engine/aggregate';
import { buildLeaderboard } from '../../engine/leaderboard';
import { copyToArrayBuffer, loadWorkbook } from '../helpers/workbook';
import { makeRecord } from '../helpers/records';

const records = [
  makeRecord({ row_index: 0, member: 'Alice', task_id: 'T-1', month_bucket: '2025-07-01', quality_fraction: 0.92, actual_hours: 50, on_time: true }),
  makeRecord({ row_index: 1, member: 'Bob', task_id: 'T-2', month_bucket: '2025-07-01', quality_fraction: 0.8, actual_hours: 16, on_time: false })
];

describe('buildDashboardWorkbook', () => {
  it('writes the four dashboard sheets', async () => {
    const member_month = aggregateByMemberMonth(records);
    const buffer = await buildDashboardWorkbook(
      {
        records,
        member_month,
        team_month: aggregateByTeamMonth(records),
        leaderboard: buildLeaderboard(member_month)
      },
      '2025-08-01'
    );

    const workbook = await loadWorkbook(copyToArrayBuffer(buffer));
    expect(workbook.worksheets.map((s) => s.name)).toEqual(['Records', 'Member_Month', 'Team_Month', 'Leaderboard']);

    const recordSheet = workbook.getWorksheet('Records');
    expect(recordSheet?.getCell(1, 2).value).toBe('Member');
    expect(recordSheet?.getCell(2, 2).value).toBe('Alice');
    expect(recordSheet?.getCell(3, 15).value).toBe(false);

    const team = workbook.getWorksheet('Team_Month');
    expect(team?.getCell(2, 1).value).toBe('2025-07-01');
    expect(team?.getCell(2, 6).value).toBe(66);
    expect(team?.getCell(2, 7).value).toBe(2);

    const leaderboard = workbook.getWorksheet('Leaderboard');
    expect(leaderboard?.getCell(2, 2).value).toBe('Quality Score');
    expect(leaderboard?.getCell(2, 4).value).toBe('Alice');
    expect(leaderboard?.getCell(3, 4).value).toBe('Bob');
  });
});
