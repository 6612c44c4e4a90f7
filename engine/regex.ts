// engine/regex.ts
// Centralized regular expressions for the KPI Dashboard engine

// ------------------------------------------------------------
// Date cells
// ------------------------------------------------------------

// Compact integer date, as exported by most HR sheets: 20250703 or 20250703.0
export const DATE_COMPACT_YYYYMMDD = /^(\d{4})(\d{2})(\d{2})(?:\.0)?$/;

// ISO: 2025-07-03 (month/day may drop the leading zero)
export const DATE_YYYY_MM_DD = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

// Slash: 2025/07/03
export const DATE_YYYY_MM_DD_SLASH = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;

// Dot: 2025.07.03
export const DATE_YYYY_MM_DD_DOT = /^(\d{4})\.(\d{1,2})\.(\d{1,2})$/;

// Numeric slash with year last: 03/07/2025 (day-first tried before month-first)
export const DATE_NN_NN_YYYY_SLASH = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

// ---- Fallback shapes ----

// ISO datetime: 2025-07-03T09:30:00Z, 2025-07-03 09:30
export const DATE_ISO_DATETIME = /^(\d{4})-(\d{1,2})-(\d{1,2})[T ]\d{1,2}:\d{2}/;

// European numeric dash: 03-07-2025
export const DATE_DD_MM_YYYY_DASH = /^(\d{1,2})-(\d{1,2})-(\d{4})$/;

// European numeric dot: 03.07.2025
export const DATE_DD_MM_YYYY_DOT = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

// Space-separated: 2025 07 03
export const DATE_YYYY_MM_DD_SPACE = /^(\d{4})\s+(\d{1,2})\s+(\d{1,2})$/;

const MONTH_WORD = '(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Sept|Oct|Nov|Dec)[a-z]*';

// Text month, year-first: 2025-Sep-30, 2025 September 30
export const DATE_YYYY_TEXT_MONTH_DD = new RegExp(`^(\\d{4})[-\\s]+${MONTH_WORD}[-\\s]+(\\d{1,2})$`, 'i');

// Text month, day-first: 30-Sep-2025, 30 September 2025
export const DATE_DD_TEXT_MONTH_YYYY = new RegExp(`^(\\d{1,2})[-\\s]+${MONTH_WORD}[-\\s]+(\\d{4})$`, 'i');

// Text month, month-first: Sep 30 2025, September 30, 2025
export const DATE_TEXT_MONTH_DD_YYYY = new RegExp(`^${MONTH_WORD}\\s+(\\d{1,2}),?\\s+(\\d{4})$`, 'i');

// ------------------------------------------------------------
// Work Duration ranges
// ------------------------------------------------------------

// Hyphen, en dash, em dash, "to" or slash, with optional surrounding whitespace
export const RANGE_DELIMITER = /\s*(?:[-–—]|\bto\b|\/)\s*/gi;

// Dangling delimiters around a single date: "- 20250704", "20250623 –"
export const RANGE_EDGE_DELIMITERS = /^[\s\-–—/]+|[\s\-–—/]+$/g;

// ------------------------------------------------------------
// Numbers
// ------------------------------------------------------------

// Trailing percent sign on a numeric cell: "92%", "92 %"
export const TRAILING_PERCENT = /\s*%$/;

// Plain decimal text: "12", "-3.5", ".75", "1e3" (no hex, binary or "1_000")
export const DECIMAL_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
