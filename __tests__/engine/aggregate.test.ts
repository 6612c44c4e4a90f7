import { aggregateByMemberMonth, aggregateByTeamMonth, latestMonth, meanOrNull } from '../../engine/aggregate';
import { makeRecord } from '../helpers/records';

const JULY = '2025-07-01';
const JUNE = '2025-06-01';

const records = [
  makeRecord({ member: 'Alice', month_bucket: JULY, task_id: 'A1', quality_fraction: 0.9, revision_fraction: 0.1, on_time: true, efficiency_fraction: 0.8, actual_hours: 10 }),
  makeRecord({ member: 'Alice', month_bucket: JULY, task_id: 'A2', quality_fraction: 0.7, on_time: false, actual_hours: 5 }),
  makeRecord({ member: 'Bob', month_bucket: JULY, efficiency_fraction: 1.2, actual_hours: 8 }),
  makeRecord({ member: null, month_bucket: JULY, task_id: 'X', actual_hours: 2 }),
  makeRecord({ member: 'Alice', month_bucket: JUNE, task_id: 'A0', quality_fraction: 0.5, actual_hours: 4 }),
  makeRecord({ member: 'Alice', month_bucket: null, task_id: 'A9', actual_hours: 100 })
];

describe('aggregateByMemberMonth', () => {
  const table = aggregateByMemberMonth(records);

  it('groups by month then member, with the unnamed group last', () => {
    expect(table.map((r) => [r.month_bucket, r.member])).toEqual([
      [JUNE, 'Alice'],
      [JULY, 'Alice'],
      [JULY, 'Bob'],
      [JULY, null]
    ]);
  });

  it('computes means over non-null values only', () => {
    const alice = table[1];
    expect(alice.quality_mean).toBeCloseTo(0.8);
    expect(alice.revision_mean).toBeCloseTo(0.1);
    expect(alice.on_time_rate).toBeCloseTo(0.5);
    expect(alice.efficiency_mean).toBeCloseTo(0.8);
    expect(alice.actual_hours).toBe(15);
    expect(alice.task_count).toBe(2);
  });

  it('reports null means for a group with no values', () => {
    const bob = table[2];
    expect(bob.quality_mean).toBeNull();
    expect(bob.revision_mean).toBeNull();
    expect(bob.on_time_rate).toBeNull();
    expect(bob.efficiency_mean).toBeCloseTo(1.2);
    expect(bob.task_count).toBe(0);
  });
});

describe('aggregateByTeamMonth', () => {
  const team = aggregateByTeamMonth(records);

  it('skips records without a month and sorts by month', () => {
    expect(team.map((r) => r.month_bucket)).toEqual([JUNE, JULY]);
    expect(team[0].actual_hours).toBe(4);
    expect(team[0].task_count).toBe(1);
  });

  it('reconciles with the member-month table', () => {
    const july = team[1];
    const members = aggregateByMemberMonth(records).filter((r) => r.month_bucket === JULY);

    expect(july.task_count).toBe(members.reduce((sum, r) => sum + r.task_count, 0));
    expect(july.actual_hours).toBe(members.reduce((sum, r) => sum + r.actual_hours, 0));
    expect(july.task_count).toBe(3);
    expect(july.actual_hours).toBe(25);
    expect(july.efficiency_mean).toBeCloseTo(1.0);
  });

  it('returns an empty table for no records', () => {
    expect(aggregateByTeamMonth([])).toEqual([]);
  });
});

describe('latestMonth / meanOrNull', () => {
  it('finds the latest month or null', () => {
    expect(latestMonth(aggregateByMemberMonth(records))).toBe(JULY);
    expect(latestMonth([])).toBeNull();
  });

  it('never returns NaN for an empty list', () => {
    expect(meanOrNull([])).toBeNull();
    expect(meanOrNull([1, 2])).toBe(1.5);
  });
});
