// engine/validateTransport.ts
// Transport-level validation for the dashboard endpoints
//
// Responsibilities:
//  - Parse the JSON body when it arrives as a string, enforce the size limit
//  - Validate the top-level request structure of each endpoint
//  - Validate the optional filter shape
//  - Do NOT look at cell contents (that is the normalizer's job)

import { ErrorCodes, ErrorCodeDescriptions, type ErrorCode } from './errorCodes';
import { MAX_DASHBOARD_BODY_BYTES, MAX_DASHBOARD_ROWS } from './constants';
import { isPlainObject } from './normalizeFields';
import type { RecordFilter } from './types';

export interface TransportError {
  errorStatus: number;
  errorBody: {
    error: string;
    error_codes: ErrorCode[];
  };
}

export type TransportResult<T> = ({ ok: true } & T) | ({ ok: false } & TransportError);

function fail(errorStatus: number, code: ErrorCode, error: string = ErrorCodeDescriptions[code]): { ok: false } & TransportError {
  return { ok: false, errorStatus, errorBody: { error, error_codes: [code] } };
}

function approxSize(rawBody: unknown): number {
  if (typeof rawBody === 'string') return rawBody.length;
  if (rawBody == null) return 0;
  try {
    return JSON.stringify(rawBody).length;
  } catch {
    return 0;
  }
}

/**
 * Body as an object: strings are JSON-parsed, oversize bodies rejected (413).
 */
export function parseRequestBody(rawBody: unknown): TransportResult<{ body: Record<string, unknown> }> {
  if (approxSize(rawBody) > MAX_DASHBOARD_BODY_BYTES) {
    return fail(413, ErrorCodes.INVALID_REQUEST_STRUCTURE, 'Request body too large for dashboard engine.');
  }

  let parsed: unknown = rawBody;
  if (typeof rawBody === 'string') {
    try {
      parsed = JSON.parse(rawBody);
    } catch {
      return fail(400, ErrorCodes.INVALID_JSON_BODY);
    }
  }

  if (!isPlainObject(parsed)) {
    return fail(400, ErrorCodes.INVALID_REQUEST_STRUCTURE);
  }

  return { ok: true, body: parsed };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Optional { members?, months?, statuses? } of string arrays.
 * Absent filter → {} (select everything).
 */
export function validateFilter(raw: unknown): TransportResult<{ filter: RecordFilter }> {
  if (raw === undefined || raw === null) return { ok: true, filter: {} };
  if (!isPlainObject(raw)) return fail(400, ErrorCodes.INVALID_FILTER);

  const filter: RecordFilter = {};
  for (const key of ['members', 'months', 'statuses'] as const) {
    const v = raw[key];
    if (v === undefined || v === null) continue;
    if (!isStringArray(v)) {
      return fail(400, ErrorCodes.INVALID_FILTER, `filter.${key} must be an array of strings.`);
    }
    filter[key] = v;
  }
  return { ok: true, filter };
}

/**
 * { rows: object[], filter? }
 *  - rows must exist, be an array, be non-empty and contain plain objects only
 */
export function validateRowsRequest(
  body: Record<string, unknown>
): TransportResult<{ rows: Record<string, unknown>[]; filter: RecordFilter }> {
  const rows = body.rows;

  if (!Array.isArray(rows)) return fail(400, ErrorCodes.INVALID_ROWS_ARRAY);
  if (rows.length === 0) return fail(400, ErrorCodes.EMPTY_ROWS_ARRAY);
  if (rows.length > MAX_DASHBOARD_ROWS) {
    return fail(400, ErrorCodes.INVALID_REQUEST_STRUCTURE, `Too many rows (max ${MAX_DASHBOARD_ROWS}).`);
  }

  const objects: Record<string, unknown>[] = [];
  for (const r of rows) {
    if (!isPlainObject(r)) return fail(400, ErrorCodes.INVALID_TRANSPORT_PAYLOAD);
    objects.push(r);
  }

  const filterCheck = validateFilter(body.filter);
  if (!filterCheck.ok) return filterCheck;

  return { ok: true, rows: objects, filter: filterCheck.filter };
}

/** { csv_text: string, filter? } */
export function validateCsvRequest(
  body: Record<string, unknown>
): TransportResult<{ csv_text: string; filter: RecordFilter }> {
  const csv_text = body.csv_text;
  if (typeof csv_text !== 'string' || csv_text.trim() === '') {
    return fail(400, ErrorCodes.MISSING_FILE_REFERENCE, 'csv_text is required and must be a non-empty string.');
  }

  const filterCheck = validateFilter(body.filter);
  if (!filterCheck.ok) return filterCheck;

  return { ok: true, csv_text, filter: filterCheck.filter };
}

/** { file_id: string, filter? } */
export function validateFileRequest(
  body: Record<string, unknown>
): TransportResult<{ file_id: string; filter: RecordFilter }> {
  const file_id = body.file_id;
  if (typeof file_id !== 'string' || file_id.trim() === '') {
    return fail(400, ErrorCodes.MISSING_FILE_REFERENCE, 'file_id is required and must be a string.');
  }

  const filterCheck = validateFilter(body.filter);
  if (!filterCheck.ok) return filterCheck;

  return { ok: true, file_id: file_id.trim(), filter: filterCheck.filter };
}
