import {
  buildDashboard,
  dashboardReply,
  internalErrorReply,
  loadSnapshot,
  runDashboard
} from '../../engine/dashboardService';
import { clearSnapshot } from '../../engine/snapshotStore';
import { silenceLogs } from '../helpers/http';
import { workbookBytes } from '../helpers/workbook';

const ROWS = [
  {
    Name: 'Alice',
    'Ref. number': 'T-1',
    'Date Completed': '20250703',
    'Work Duration': '20250623-20250704',
    'QS%': 92,
    'Revision/s': 5,
    'Target Work Hours': 40,
    'Actual Work Hours': 50,
    Status: 'Done'
  },
  {
    Name: 'Bob',
    'Ref. number': 'T-2',
    'Date Completed': '20250710',
    'Work Duration': '20250701-20250708',
    'QS%': 80,
    'Revision/s': 10,
    'Target Work Hours': 20,
    'Actual Work Hours': 16,
    Status: 'Done'
  },
  {
    Name: 'Alice',
    'Ref. number': 'T-3',
    'Date Completed': '20250612',
    'Work Duration': '20250601-20250615',
    'QS%': 70,
    'Revision/s': 0,
    'Target Work Hours': 10,
    'Actual Work Hours': 10,
    Status: 'In Progress'
  }
];

beforeEach(() => {
  clearSnapshot();
  jest.restoreAllMocks();
  silenceLogs();
});

describe('runDashboard', () => {
  it('builds both aggregate tables and the leaderboard from JSON rows', async () => {
    const outcome = await runDashboard({ kind: 'rows', rows: ROWS });
    if (!outcome.ok || outcome.result.status !== 'OK') throw new Error('expected a dashboard');
    const result = outcome.result;

    expect(result.records).toHaveLength(3);
    expect(result.member_month.map((r) => [r.month_bucket, r.member])).toEqual([
      ['2025-06-01', 'Alice'],
      ['2025-07-01', 'Alice'],
      ['2025-07-01', 'Bob']
    ]);

    const july = result.team_month[1];
    expect(july.month_bucket).toBe('2025-07-01');
    expect(july.quality_mean).toBeCloseTo(0.86);
    expect(july.on_time_rate).toBeCloseTo(0.5);
    expect(july.efficiency_mean).toBeCloseTo(1.025);
    expect(july.actual_hours).toBe(66);
    expect(july.task_count).toBe(2);

    if (result.leaderboard.status !== 'OK') throw new Error('expected rankings');
    expect(result.leaderboard.month_bucket).toBe('2025-07-01');
    expect(result.leaderboard.rankings.efficiency_mean.map((e) => e.member)).toEqual(['Bob', 'Alice']);
    expect(result.leaderboard.rankings.on_time_rate).toEqual([
      { member: 'Alice', value: 1 },
      { member: 'Bob', value: 0 }
    ]);
  });

  it('reads the same data from CSV text', async () => {
    const csv = [
      'Name,Date Completed,Work Duration,QS%,Target Work Hours,Actual Work Hours',
      'Alice,20250703,20250623-20250704,92,40,50',
      'Bob,20250710,20250701-20250708,80,20,16'
    ].join('\n');

    const outcome = await runDashboard({ kind: 'csv', csv_text: csv });
    if (!outcome.ok || outcome.result.status !== 'OK') throw new Error('expected a dashboard');

    const [july] = outcome.result.team_month;
    expect(july.quality_mean).toBeCloseTo(0.86);
    expect(july.actual_hours).toBe(66);
  });

  it('reads a workbook', async () => {
    const data = await workbookBytes((workbook) => {
      const sheet = workbook.addWorksheet('1');
      sheet.addRow(['Name', 'Date Completed', 'Actual Work Hours']);
      sheet.addRow(['Alice', '20250703', 6]);
    });

    const outcome = await runDashboard({ kind: 'workbook', data });
    if (!outcome.ok) throw new Error(outcome.message);
    expect(outcome.result.sheet_name).toBe('1');
  });

  it('returns EMPTY_SELECTION with the available options when nothing matches', async () => {
    const outcome = await runDashboard({ kind: 'rows', rows: ROWS }, { members: ['Nobody'] });

    expect(outcome).toEqual({
      ok: true,
      cached: false,
      result: {
        status: 'EMPTY_SELECTION',
        sheet_name: null,
        filter_options: { members: ['Alice', 'Bob'], months: ['2025-06-01', '2025-07-01'] },
        message: 'No data after filtering.'
      }
    });
  });

  it('filters before aggregating', async () => {
    const outcome = await runDashboard({ kind: 'rows', rows: ROWS }, { statuses: ['done'] });
    if (!outcome.ok || outcome.result.status !== 'OK') throw new Error('expected a dashboard');

    expect(outcome.result.records.map((r) => r.task_id)).toEqual(['T-1', 'T-2']);
    expect(outcome.result.team_month.map((r) => r.month_bucket)).toEqual(['2025-07-01']);
    expect(outcome.result.filter_options.months).toEqual(['2025-06-01', '2025-07-01']);
  });

  it('reports a load failure instead of a partial table', async () => {
    const outcome = await runDashboard({ kind: 'rows', rows: [{}] });
    expect(outcome).toMatchObject({ ok: false, error_code: 'E703' });
  });
});

describe('loadSnapshot', () => {
  it('reuses the snapshot for identical input and replaces it for new input', async () => {
    const first = await loadSnapshot({ kind: 'rows', rows: ROWS });
    const second = await loadSnapshot({ kind: 'rows', rows: ROWS });
    const third = await loadSnapshot({ kind: 'rows', rows: ROWS.slice(0, 1) });
    const fourth = await loadSnapshot({ kind: 'rows', rows: ROWS });

    expect(first).toMatchObject({ ok: true, cached: false });
    expect(second).toMatchObject({ ok: true, cached: true });
    expect(third).toMatchObject({ ok: true, cached: false });
    expect(fourth).toMatchObject({ ok: true, cached: false });
  });

  it('logs a summary of field parse issues', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    await loadSnapshot({ kind: 'rows', rows: [{ Name: 'Alice', 'Date Completed': 'someday' }] });

    expect(warn).toHaveBeenCalledWith(expect.stringContaining('"event":"field_parse_issues"'));
  });
});

describe('buildDashboard', () => {
  it('answers NO_DATA on the leaderboard when no record has a month', async () => {
    const loaded = await loadSnapshot({ kind: 'rows', rows: [{ Name: 'Alice', 'QS%': 90 }] });
    if (!loaded.ok) throw new Error(loaded.message);

    const result = buildDashboard(loaded.snapshot);
    if (result.status !== 'OK') throw new Error('expected a dashboard');
    expect(result.member_month).toEqual([]);
    expect(result.leaderboard).toEqual({ status: 'NO_DATA' });
  });
});

describe('dashboardReply', () => {
  it('maps load failures to 422 with the error code', () => {
    expect(dashboardReply({ ok: false, error_code: 'E701', message: 'unreadable' })).toEqual({
      status: 422,
      body: { error: 'unreadable', error_codes: ['E701'] }
    });
  });

  it('returns the dashboard with the cache flag', async () => {
    const reply = dashboardReply(await runDashboard({ kind: 'rows', rows: ROWS }));
    expect(reply.status).toBe(200);
    expect(reply.body.status).toBe('OK');
    expect(reply.body.cached).toBe(false);
  });

  it('maps internal errors to 500 / E607', () => {
    expect(internalErrorReply()).toEqual({
      status: 500,
      body: { error: 'Internal dashboard engine error.', error_codes: ['E607'] }
    });
  });
});
