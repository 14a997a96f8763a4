import type { InsightRow, LabelCount } from '../db/repositories/types.js';

/** `count / total * 100` with two decimals and a `%` suffix. */
export function formatPercentage(count: number, total: number): string {
  return `${((count / total) * 100).toFixed(2)}%`;
}

export interface InsightTotals {
  /** Jobs in the current sprint. */
  sprintTotal: number;
  /** Jobs across every sprint. */
  overallTotal: number;
}

/**
 * Attach sprint and overall percentages to grouped counts.
 *
 * Returns no rows when either total is zero, so a fresh sprint never
 * produces `Infinity%` or `NaN%`.
 */
export function projectInsights(counts: LabelCount[], totals: InsightTotals): InsightRow[] {
  if (totals.sprintTotal === 0 || totals.overallTotal === 0) {
    return [];
  }

  return counts.map(({ label, count }) => ({
    label,
    count,
    sprint_percentage: formatPercentage(count, totals.sprintTotal),
    overall_percentage: formatPercentage(count, totals.overallTotal),
  }));
}
