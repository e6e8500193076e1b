import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { SqliteRecordStore } from '../src/store/sqlite-store.js';
import { normalize } from '../src/normalizer/record-normalizer.js';
import { yearlyTotals } from '../src/aggregator/yearly-totals.js';
import { severityDistribution } from '../src/aggregator/severity-distribution.js';
import type { Severity } from '../src/schemas/record.schema.js';
import { makeEntry } from './helpers/feed-entries.js';

// ---------------------------------------------------------------------------
// Arbitraries
// ---------------------------------------------------------------------------

const YEARS = [2018, 2019, 2020, 2021] as const;

const markerArb = fc.constantFrom('', '** REJECT ** ', '** DISPUTED ** ', '** RESERVED ** ');
const severityArb = fc.option(fc.constantFrom<Severity>('LOW', 'MEDIUM', 'HIGH', 'CRITICAL'), {
  nil: undefined,
});

const entrySpecArb = fc.record({
  year: fc.constantFrom(...YEARS),
  marker: markerArb,
  v2: severityArb,
  v3: severityArb,
});

const datasetArb = fc.array(entrySpecArb, { maxLength: 30 });

/** Load the specs into a fresh in-memory store, run, then close it. */
function withStore<T>(
  specs: ReadonlyArray<{ year: number; marker: string; v2?: Severity; v3?: Severity }>,
  run: (store: SqliteRecordStore) => T,
): T {
  const store = new SqliteRecordStore(':memory:');
  try {
    store.replaceAll(
      specs.map((spec, i) =>
        normalize(
          makeEntry({
            id: `CVE-${spec.year}-${String(i).padStart(4, '0')}`,
            publishedDate: `${spec.year}-07-01T00:00Z`,
            descriptions: [`${spec.marker}entry ${i}`],
            ...(spec.v2 ? { v2: { severity: spec.v2 } } : {}),
            ...(spec.v3 ? { v3: { severity: spec.v3 } } : {}),
          }),
        ),
      ),
    );
    return run(store);
  } finally {
    store.close();
  }
}

// ---------------------------------------------------------------------------
// Properties
// ---------------------------------------------------------------------------

describe('Aggregator (properties)', () => {
  it('should be idempotent', () => {
    fc.assert(
      fc.property(datasetArb, (specs) => {
        withStore(specs, (store) => {
          expect(yearlyTotals(store, YEARS)).toEqual(yearlyTotals(store, YEARS));
        });
      }),
      { numRuns: 50 },
    );
  });

  it('should keep valid = total - rejected - disputed - reserved and match the dataset', () => {
    fc.assert(
      fc.property(datasetArb, (specs) => {
        withStore(specs, (store) => {
          for (const t of yearlyTotals(store, YEARS)) {
            const inYear = specs.filter((s) => s.year === t.year);
            expect(t.total).toBe(inYear.length);
            expect(t.valid).toBe(t.total - t.rejected - t.disputed - t.reserved);
            expect(t.valid).toBe(inYear.filter((s) => s.marker === '').length);
          }
        });
      }),
      { numRuns: 50 },
    );
  });

  it('should report 0% growth for the first year and after a zero-valid year', () => {
    fc.assert(
      fc.property(datasetArb, (specs) => {
        withStore(specs, (store) => {
          const totals = yearlyTotals(store, YEARS);
          expect(totals[0]?.yoyGrowthPercent).toBe(0);
          totals.forEach((t, i) => {
            const previous = totals[i - 1];
            if (previous && previous.valid === 0) expect(t.yoyGrowthPercent).toBe(0);
          });
        });
      }),
      { numRuns: 50 },
    );
  });

  it('should make the COMBINED total equal the number of entries with any severity', () => {
    fc.assert(
      fc.property(datasetArb, (specs) => {
        withStore(specs, (store) => {
          for (const c of severityDistribution(store, 'COMBINED', YEARS)) {
            const expected = specs.filter(
              (s) => s.year === c.year && (s.v2 !== undefined || s.v3 !== undefined),
            ).length;
            expect(c.total).toBe(expected);
          }
        });
      }),
      { numRuns: 50 },
    );
  });
});
