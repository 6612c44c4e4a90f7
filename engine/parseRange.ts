// engine/parseRange.ts
// "Work Duration" range parsing: "20250623-20250704", "2025/06/23 to 2025/07/04", ...

import { RANGE_DELIMITER, RANGE_EDGE_DELIMITERS } from './regex';
import { parseDate } from './parseDate';
import type { CellValue, DateRange, IsoDate } from './types';

const EMPTY_RANGE: DateRange = { start: null, end: null };

/**
 * Split a range cell into its planned start and end dates.
 *
 * The delimiter characters also occur inside dates (2025-06-23, 2025/06/23),
 * so occurrences are scanned left to right and the first one whose left side
 * is a date and whose right side is empty or a date splits the range.
 * When no occurrence gives such a pair, a bad end only loses the end: the
 * first date found left of a delimiter is kept as the start. Without any
 * such date the whole cell (minus dangling delimiters) is parsed as a single
 * start date.
 */
export function parseDateRange(value: CellValue | undefined): DateRange {
  if (value === null || value === undefined || typeof value === 'boolean') return EMPTY_RANGE;

  const raw = String(value).trim();
  if (!raw) return EMPTY_RANGE;

  let firstStart: IsoDate | null = null;

  for (const match of raw.matchAll(RANGE_DELIMITER)) {
    const index = match.index ?? 0;
    const left = raw.slice(0, index).trim();
    const right = raw.slice(index + match[0].length).trim();

    const start = parseDate(left);
    if (!start) continue;
    if (firstStart === null) firstStart = start;

    if (!right) return { start, end: null };

    const end = parseDate(right);
    if (end) return { start, end };
  }

  if (firstStart) return { start: firstStart, end: null };

  return { start: parseDate(raw.replace(RANGE_EDGE_DELIMITERS, '')), end: null };
}
