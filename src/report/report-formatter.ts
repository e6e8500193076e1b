/**
 * Report builders: plain-text lines for the terminal, markdown tables for
 * pasting into issues or docs, and JSON for scripts.
 */

import type { YearlyTotal } from '../aggregator/yearly-totals.js';
import type { SeverityCounts } from '../aggregator/severity-distribution.js';
import type { SeveritySystem } from '../schemas/record.schema.js';

export type ReportFormat = 'text' | 'markdown' | 'json';

// ---------------------------------------------------------------------------
// Yearly totals
// ---------------------------------------------------------------------------

/**
 * One line per year:
 * `2021: 120 YoY: 20.00% (all=130,reject=6,disputed=3,reserved=1)`
 */
export function formatYearlyTotals(
  totals: readonly YearlyTotal[],
  format: ReportFormat = 'text',
): string {
  if (format === 'json') return JSON.stringify(totals, null, 2);

  if (format === 'markdown') {
    const lines = [
      '| Year | Valid | YoY | All | Rejected | Disputed | Reserved |',
      '|------|-------|-----|-----|----------|----------|----------|',
    ];
    for (const t of totals) {
      lines.push(
        `| ${t.year} | ${t.valid} | ${formatPercent(t.yoyGrowthPercent)} | ${t.total} ` +
          `| ${t.rejected} | ${t.disputed} | ${t.reserved} |`,
      );
    }
    return lines.join('\n');
  }

  return totals
    .map(
      (t) =>
        `${t.year}: ${t.valid} YoY: ${formatPercent(t.yoyGrowthPercent)} ` +
        `(all=${t.total},reject=${t.rejected},disputed=${t.disputed},reserved=${t.reserved})`,
    )
    .join('\n');
}

// ---------------------------------------------------------------------------
// Severity distribution
// ---------------------------------------------------------------------------

/**
 * One line per year: `2021: critical=2 high=3 medium=0 low=1 total=6`
 */
export function formatSeverityDistribution(
  counts: readonly SeverityCounts[],
  system: SeveritySystem,
  format: ReportFormat = 'text',
): string {
  if (format === 'json') return JSON.stringify({ system, years: counts }, null, 2);

  if (format === 'markdown') {
    const lines = [
      `## Severity distribution (${system})`,
      '',
      '| Year | Critical | High | Medium | Low | Total |',
      '|------|----------|------|--------|-----|-------|',
    ];
    for (const c of counts) {
      lines.push(`| ${c.year} | ${c.CRITICAL} | ${c.HIGH} | ${c.MEDIUM} | ${c.LOW} | ${c.total} |`);
    }
    return lines.join('\n');
  }

  return counts
    .map(
      (c) =>
        `${c.year}: critical=${c.CRITICAL} high=${c.HIGH} medium=${c.MEDIUM} ` +
        `low=${c.LOW} total=${c.total}`,
    )
    .join('\n');
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}
