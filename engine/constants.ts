// engine/constants.ts
// Canonical constants for the KPI Dashboard engine.
// Everything config-driven is derived from DEFAULT_DASHBOARD_CONFIG so the
// normalizer and the aggregator read the same lists.

import { DEFAULT_DASHBOARD_CONFIG, type SourceField } from './config';

// ------------------------------------------------------------
// Source columns
// ------------------------------------------------------------

export const COLUMN_ALIASES = DEFAULT_DASHBOARD_CONFIG.columns.aliases;

// Lowercase lookup for case-insensitive header matching
export function aliasesLower(field: SourceField): string[] {
  return COLUMN_ALIASES[field].map((a) => a.trim().toLowerCase());
}

// ------------------------------------------------------------
// Sheets / derivations
// ------------------------------------------------------------

export const SHEET_PREFERENCE = DEFAULT_DASHBOARD_CONFIG.sheetPreference;

export const MONTH_BUCKET_SOURCES = DEFAULT_DASHBOARD_CONFIG.derivation.monthBucketSources;
export const EFFICIENCY_SOURCES = DEFAULT_DASHBOARD_CONFIG.derivation.efficiencySources;
export const FRACTION_SCALE_THRESHOLD = DEFAULT_DASHBOARD_CONFIG.derivation.fractionScaleThreshold;
export const PERCENT_DIVISOR = 100;

export const LEADERBOARD_METRICS = DEFAULT_DASHBOARD_CONFIG.leaderboardMetrics;

// ------------------------------------------------------------
// Transport limits
// ------------------------------------------------------------

export const MAX_DASHBOARD_BODY_BYTES = 2_000_000;
export const MAX_DASHBOARD_ROWS = 20_000;

export const SERVICE_NAME = 'kpi-dashboard';
