/**
 * Extracts CVSS v2/v3 scores and severities from an
 * entry's metric blocks and reconciles them into a single impact level.
 */

import type { ZodType } from 'zod';
import {
  BaseMetricV2Score,
  BaseMetricV2Severity,
  BaseMetricV3Score,
  BaseMetricV3Severity,
} from '../schemas/feed.schema.js';
import type { Impact, Severity, TieBreak } from '../schemas/record.schema.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface ResolvedSeverity {
  cvssV2Score?: number;
  cvssV2Severity?: Severity;
  cvssV3Score?: number;
  cvssV3Severity?: Severity;
  impact: Impact;
}

export interface ResolveSeverityOptions {
  /** Source whose label wins when both severities have the same weight. Default "V3". */
  tieBreak?: TieBreak;
}

export const SEVERITY_WEIGHTS: Readonly<Record<Severity, number>> = {
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
  CRITICAL: 4,
};

// ---------------------------------------------------------------------------
// resolveSeverity
// ---------------------------------------------------------------------------

/**
 * Resolve scores, severities and impact from `impact.baseMetricV2` and
 * `impact.baseMetricV3`. Each field is read on its own: a missing or
 * malformed block (or part of one) only makes that field absent.
 */
export function resolveSeverity(
  metricsV2: unknown,
  metricsV3: unknown,
  options: ResolveSeverityOptions = {},
): ResolvedSeverity {
  const cvssV2Severity = extract(BaseMetricV2Severity, metricsV2, (m) => m.severity);
  const cvssV2Score = extract(BaseMetricV2Score, metricsV2, (m) => m.cvssV2.baseScore);
  const cvssV3Severity = extract(BaseMetricV3Severity, metricsV3, (m) => m.cvssV3.baseSeverity);
  const cvssV3Score = extract(BaseMetricV3Score, metricsV3, (m) => m.cvssV3.baseScore);

  const resolved: ResolvedSeverity = {
    impact: reconcileImpact(cvssV2Severity, cvssV3Severity, options.tieBreak ?? 'V3'),
  };
  if (cvssV2Score !== undefined) resolved.cvssV2Score = cvssV2Score;
  if (cvssV2Severity !== undefined) resolved.cvssV2Severity = cvssV2Severity;
  if (cvssV3Score !== undefined) resolved.cvssV3Score = cvssV3Score;
  if (cvssV3Severity !== undefined) resolved.cvssV3Severity = cvssV3Severity;
  return resolved;
}

/**
 * Pick the heavier of the two severities. `NONE` when neither is present.
 */
export function reconcileImpact(
  severityV2: Severity | undefined,
  severityV3: Severity | undefined,
  tieBreak: TieBreak = 'V3',
): Impact {
  if (severityV2 === undefined && severityV3 === undefined) return 'NONE';
  if (severityV2 === undefined) return severityV3 ?? 'NONE';
  if (severityV3 === undefined) return severityV2;

  const w2 = SEVERITY_WEIGHTS[severityV2];
  const w3 = SEVERITY_WEIGHTS[severityV3];
  if (w2 === w3) return tieBreak === 'V3' ? severityV3 : severityV2;
  return w2 > w3 ? severityV2 : severityV3;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function extract<S extends ZodType, T>(
  schema: S,
  input: unknown,
  pick: (parsed: S['_output']) => T,
): T | undefined {
  if (input === undefined || input === null) return undefined;
  const parsed = schema.safeParse(input);
  return parsed.success ? pick(parsed.data) : undefined;
}
