/**
 * Per-year record counts by classification, with year-over-year growth of
 * the valid count.
 */

import type { RecordStore } from '../store/record-store.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface YearlyTotal {
  year: number;
  total: number;
  rejected: number;
  disputed: number;
  reserved: number;
  /** total - rejected - disputed - reserved */
  valid: number;
  /** Change in `valid` against the previous year of the range, in percent */
  yoyGrowthPercent: number;
}

// ---------------------------------------------------------------------------
// yearlyTotals
// ---------------------------------------------------------------------------

/**
 * Count records for each year of `years`, in the order given.
 *
 * The first year of the range, and any year following one with zero valid
 * records, reports 0% growth.
 */
export function yearlyTotals(store: RecordStore, years: readonly number[]): YearlyTotal[] {
  const totals: YearlyTotal[] = [];
  let previousValid = 0;

  for (const year of years) {
    const total = store.count({ year });
    const rejected = store.count({ year, classification: 'REJECT' });
    const disputed = store.count({ year, classification: 'DISPUTED' });
    const reserved = store.count({ year, classification: 'RESERVED' });
    const valid = total - rejected - disputed - reserved;

    totals.push({
      year,
      total,
      rejected,
      disputed,
      reserved,
      valid,
      yoyGrowthPercent: growthPercent(previousValid, valid),
    });
    previousValid = valid;
  }

  return totals;
}

/**
 * Percentage change from `previous` to `current`; 0 without a baseline.
 */
export function growthPercent(previous: number, current: number): number {
  if (previous <= 0) return 0;
  return ((current - previous) / previous) * 100;
}
