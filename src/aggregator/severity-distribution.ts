/**
 * Per-year severity counts for one scoring system: CVSS v2, CVSS v3, or the
 * reconciled impact (COMBINED).
 */

import { SeveritySystem } from '../schemas/record.schema.js';
import type { Severity } from '../schemas/record.schema.js';
import type { CountQuery, RecordStore } from '../store/record-store.js';
import { InvalidSeveritySystemError } from '../errors.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface SeverityCounts {
  year: number;
  CRITICAL: number;
  HIGH: number;
  MEDIUM: number;
  LOW: number;
  /** CRITICAL + HIGH + MEDIUM + LOW */
  total: number;
}

// ---------------------------------------------------------------------------
// parseSeveritySystem
// ---------------------------------------------------------------------------

/**
 * Parse a user-supplied selector. "ALL" is accepted as an alias of
 * "COMBINED"; matching ignores case and surrounding whitespace.
 *
 * @throws InvalidSeveritySystemError for anything else
 */
export function parseSeveritySystem(input: string): SeveritySystem {
  const normalized = input.trim().toUpperCase();
  const parsed = SeveritySystem.safeParse(normalized === 'ALL' ? 'COMBINED' : normalized);
  if (!parsed.success) throw new InvalidSeveritySystemError(input);
  return parsed.data;
}

// ---------------------------------------------------------------------------
// severityDistribution
// ---------------------------------------------------------------------------

/**
 * Count CRITICAL/HIGH/MEDIUM/LOW records per year for the given system.
 * `system` is parsed with parseSeveritySystem before any query runs.
 *
 * @throws InvalidSeveritySystemError when `system` is not a known selector
 */
export function severityDistribution(
  store: RecordStore,
  system: string,
  years: readonly number[],
): SeverityCounts[] {
  const selected = parseSeveritySystem(system);

  return years.map((year) => {
    const count = (severity: Severity) => store.count(severityQuery(selected, year, severity));
    const CRITICAL = count('CRITICAL');
    const HIGH = count('HIGH');
    const MEDIUM = count('MEDIUM');
    const LOW = count('LOW');
    return { year, CRITICAL, HIGH, MEDIUM, LOW, total: CRITICAL + HIGH + MEDIUM + LOW };
  });
}

function severityQuery(system: SeveritySystem, year: number, severity: Severity): CountQuery {
  switch (system) {
    case 'V2':
      return { year, severityV2: severity };
    case 'V3':
      return { year, severityV3: severity };
    case 'COMBINED':
      return { year, impact: severity };
  }
}
