// engine/errorCodes.ts
// Canonical error codes for the KPI Dashboard engine
//
//  E600–E699 → Request / structural issues (transport and type-level)
//  E700–E799 → Load failures (file unreadable, no sheet, no data)
//
// NOTE:
// - Field-level parse failures have no code: the cell degrades to null
//   and the row is kept.
// - Empty-after-filter is not an error (DashboardResult.status = 'EMPTY_SELECTION').

export const ErrorCodes = {
  // 6xx – Request / structural issues
  INVALID_JSON_BODY: 'E601',              // JSON parse failed
  INVALID_REQUEST_STRUCTURE: 'E602',      // body is null / not an object / too large
  INVALID_ROWS_ARRAY: 'E603',             // rows missing or not an array
  EMPTY_ROWS_ARRAY: 'E604',               // rows is []
  INVALID_TRANSPORT_PAYLOAD: 'E605',      // a row is not a plain object
  INVALID_FILTER: 'E606',                 // filter is not { members?, months?, statuses? } of strings
  INTERNAL_ENGINE_ERROR: 'E607',
  MISSING_FILE_REFERENCE: 'E608',         // file_id / csv_text missing

  // 7xx – Load failures
  FILE_UNREADABLE: 'E701',
  NO_WORKSHEET: 'E702',
  EMPTY_DATA: 'E703'
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type LoadErrorCode =
  | typeof ErrorCodes.FILE_UNREADABLE
  | typeof ErrorCodes.NO_WORKSHEET
  | typeof ErrorCodes.EMPTY_DATA;

// Human-readable descriptions (for logs / API error bodies)
export const ErrorCodeDescriptions: Record<ErrorCode, string> = {
  [ErrorCodes.INVALID_JSON_BODY]: 'Request body is not valid JSON.',
  [ErrorCodes.INVALID_REQUEST_STRUCTURE]: 'Request structure is invalid or not a non-null object.',
  [ErrorCodes.INVALID_ROWS_ARRAY]: 'The "rows" property is missing or is not a valid array.',
  [ErrorCodes.EMPTY_ROWS_ARRAY]: 'The "rows" array is present but empty.',
  [ErrorCodes.INVALID_TRANSPORT_PAYLOAD]: 'One or more rows are not valid objects.',
  [ErrorCodes.INVALID_FILTER]: 'The "filter" property must hold string arrays only.',
  [ErrorCodes.INTERNAL_ENGINE_ERROR]: 'Internal backend processing failure.',
  [ErrorCodes.MISSING_FILE_REFERENCE]: 'No input file or text was provided.',

  [ErrorCodes.FILE_UNREADABLE]: 'The input file could not be read.',
  [ErrorCodes.NO_WORKSHEET]: 'The workbook contains no worksheet.',
  [ErrorCodes.EMPTY_DATA]: 'No data found in the file.'
};
