// engine/dashboardService.ts
//
// Shared dashboard core used by every /api/dashboard* endpoint:
//   load → normalize (memoized per input) → filter → aggregate → leaderboard
//
// Load failures come back as a typed failure and never as a partial table.
// An empty selection is a normal result with status 'EMPTY_SELECTION'.

import type { ErrorCode, LoadErrorCode } from './errorCodes';
import { ErrorCodes } from './errorCodes';
import { aggregateByMemberMonth, aggregateByTeamMonth } from './aggregate';
import { buildLeaderboard } from './leaderboard';
import { filterRecords, listFilterOptions } from './filterRecords';
import { normalizeTable } from './normalizeRecords';
import { readCsv, readJsonRows } from './readRows';
import { readWorkbook } from './readWorkbook';
import { getSnapshot, saveSnapshot, snapshotKeyForBytes, snapshotKeyForText } from './snapshotStore';
import { logInfo, logWarn } from './log';
import type { DashboardResult, LoadResult, NormalizedSnapshot, RecordFilter } from './types';

export type DashboardInput =
  | { kind: 'rows'; rows: readonly unknown[] }
  | { kind: 'csv'; csv_text: string }
  | { kind: 'workbook'; data: ArrayBuffer };

export type SnapshotOutcome =
  | { ok: true; snapshot: NormalizedSnapshot; cached: boolean }
  | { ok: false; error_code: LoadErrorCode; message: string };

export type DashboardOutcome =
  | { ok: true; result: DashboardResult; cached: boolean }
  | { ok: false; error_code: LoadErrorCode; message: string };

function snapshotKey(input: DashboardInput): string {
  switch (input.kind) {
    case 'rows':
      return snapshotKeyForText(`rows:${JSON.stringify(input.rows)}`);
    case 'csv':
      return snapshotKeyForText(`csv:${input.csv_text}`);
    case 'workbook':
      return snapshotKeyForBytes(input.data);
  }
}

async function readInput(input: DashboardInput): Promise<LoadResult> {
  switch (input.kind) {
    case 'rows':
      return readJsonRows(input.rows);
    case 'csv':
      return readCsv(input.csv_text);
    case 'workbook':
      return readWorkbook(input.data);
  }
}

/**
 * Normalized snapshot for an input, reusing the memoized one when the input
 * is byte-identical to the previous load.
 */
export async function loadSnapshot(input: DashboardInput): Promise<SnapshotOutcome> {
  const key = snapshotKey(input);
  const memo = getSnapshot(key);
  if (memo) return { ok: true, snapshot: memo, cached: true };

  const loaded = await readInput(input);
  if (!loaded.ok) {
    logWarn('load_failed', { input_kind: input.kind, error_code: loaded.error_code, message: loaded.message });
    return loaded;
  }

  const snapshot = normalizeTable(loaded.table);
  saveSnapshot(key, snapshot);

  const issueTotal = Object.values(snapshot.parse_issues).reduce((a, b) => a + b, 0);
  if (issueTotal > 0) {
    logWarn('field_parse_issues', { input_kind: input.kind, parse_issues: snapshot.parse_issues });
  }
  logInfo('snapshot_normalized', {
    input_kind: input.kind,
    sheet_name: snapshot.sheet_name,
    rows_count: snapshot.records.length,
    fraction_scales: snapshot.fraction_scales
  });

  return { ok: true, snapshot, cached: false };
}

/**
 * Filter a snapshot and compute both aggregate tables and the leaderboard.
 * Pure and synchronous; a fresh pass on every call.
 */
export function buildDashboard(snapshot: NormalizedSnapshot, filter: RecordFilter = {}): DashboardResult {
  const filter_options = listFilterOptions(snapshot.records);
  const records = filterRecords(snapshot.records, filter);

  if (records.length === 0) {
    return {
      status: 'EMPTY_SELECTION',
      sheet_name: snapshot.sheet_name,
      filter_options,
      message: 'No data after filtering.'
    };
  }

  const member_month = aggregateByMemberMonth(records);
  const team_month = aggregateByTeamMonth(records);

  return {
    status: 'OK',
    sheet_name: snapshot.sheet_name,
    filter_options,
    records,
    member_month,
    team_month,
    leaderboard: buildLeaderboard(member_month)
  };
}

export async function runDashboard(input: DashboardInput, filter: RecordFilter = {}): Promise<DashboardOutcome> {
  const loaded = await loadSnapshot(input);
  if (!loaded.ok) return loaded;
  return { ok: true, result: buildDashboard(loaded.snapshot, filter), cached: loaded.cached };
}

// ------------------------------------------------------------
// HTTP mapping (kept free of framework types)
// ------------------------------------------------------------

export interface HttpReply {
  status: number;
  body: Record<string, unknown>;
}

export function dashboardReply(outcome: DashboardOutcome): HttpReply {
  if (!outcome.ok) {
    return {
      status: 422,
      body: { error: outcome.message, error_codes: [outcome.error_code] }
    };
  }
  return { status: 200, body: { ...outcome.result, cached: outcome.cached } };
}

export function internalErrorReply(): HttpReply {
  const codes: ErrorCode[] = [ErrorCodes.INTERNAL_ENGINE_ERROR];
  return { status: 500, body: { error: 'Internal dashboard engine error.', error_codes: codes } };
}
