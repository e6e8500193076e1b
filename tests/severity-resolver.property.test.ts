import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { SEVERITY_WEIGHTS, resolveSeverity } from '../src/normalizer/severity-resolver.js';
import type { Severity } from '../src/schemas/record.schema.js';

// ---------------------------------------------------------------------------
// Arbitraries
// ---------------------------------------------------------------------------

const severityArb = fc.constantFrom<Severity>('LOW', 'MEDIUM', 'HIGH', 'CRITICAL');
const scoreArb = fc.integer({ min: 0, max: 100 }).map((n) => n / 10);

const v2Arb = fc.record({ severity: severityArb, score: scoreArb }).map(({ severity, score }) => ({
  cvssV2: { baseScore: score },
  severity,
}));

const v3Arb = fc.record({ severity: severityArb, score: scoreArb }).map(({ severity, score }) => ({
  cvssV3: { baseScore: score, baseSeverity: severity },
}));

/** Values that are never a valid metric block. */
const junkArb = fc.oneof(
  fc.constant(undefined),
  fc.constant(null),
  fc.string(),
  fc.integer(),
  fc.constant({}),
  fc.constant({ cvssV3: 'broken' }),
);

// ---------------------------------------------------------------------------
// Properties
// ---------------------------------------------------------------------------

describe('resolveSeverity (properties)', () => {
  it('should return NONE with no severities when neither source is usable', () => {
    fc.assert(
      fc.property(junkArb, junkArb, (a, b) => {
        const resolved = resolveSeverity(a, b);
        expect(resolved.impact).toBe('NONE');
        expect(resolved.cvssV2Severity).toBeUndefined();
        expect(resolved.cvssV3Severity).toBeUndefined();
      }),
    );
  });

  it('should equal the V2 severity when only V2 is present', () => {
    fc.assert(
      fc.property(v2Arb, junkArb, (metrics, junk) => {
        expect(resolveSeverity(metrics, junk).impact).toBe(metrics.severity);
      }),
    );
  });

  it('should equal the V3 severity when only V3 is present', () => {
    fc.assert(
      fc.property(junkArb, v3Arb, (junk, metrics) => {
        expect(resolveSeverity(junk, metrics).impact).toBe(metrics.cvssV3.baseSeverity);
      }),
    );
  });

  it('should pick the heavier severity, and V3 on a tie', () => {
    fc.assert(
      fc.property(v2Arb, v3Arb, (m2, m3) => {
        const s2 = m2.severity;
        const s3 = m3.cvssV3.baseSeverity;
        const expected = SEVERITY_WEIGHTS[s2] > SEVERITY_WEIGHTS[s3] ? s2 : s3;
        expect(resolveSeverity(m2, m3).impact).toBe(expected);
      }),
    );
  });

  it('should report impact NONE only when both severities are absent', () => {
    fc.assert(
      fc.property(fc.oneof(v2Arb, junkArb), fc.oneof(v3Arb, junkArb), (a, b) => {
        const resolved = resolveSeverity(a, b);
        const hasAny = resolved.cvssV2Severity !== undefined || resolved.cvssV3Severity !== undefined;
        expect(resolved.impact === 'NONE').toBe(!hasAny);
      }),
    );
  });
});
