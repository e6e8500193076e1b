export interface YearRangeInput {
  startYear: number;
  /** Passed in by the caller; nothing here reads the clock */
  currentYear: number;
  /** Restrict the report to this single year */
  year?: number;
}

/**
 * Years a report covers: `[year]` when one is given, otherwise
 * `startYear..currentYear` inclusive (empty if start is after current).
 */
export function resolveYearRange(input: YearRangeInput): number[] {
  if (input.year !== undefined) return [input.year];
  const years: number[] = [];
  for (let y = input.startYear; y <= input.currentYear; y++) years.push(y);
  return years;
}
