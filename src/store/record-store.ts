/**
 * Store Adapter interface for normalized records, plus the row layout of
 * the persisted `cves` table.
 */

import type {
  Classification,
  Impact,
  Severity,
  VulnerabilityRecord,
} from '../schemas/record.schema.js';

// ---------------------------------------------------------------------------
// Data models
// ---------------------------------------------------------------------------

/** Field filters for `count`. Every given field must match. */
export interface CountQuery {
  /** Matches the year of the stored published date */
  year?: number;
  classification?: Classification;
  severityV2?: Severity;
  severityV3?: Severity;
  impact?: Impact;
}

/** One row of the `cves` table. */
export interface CvesRow {
  sequenceNum: number;
  id: string;
  lastModifiedDate: string;
  publishedDate: string;
  classification: Classification;
  severityV3: Severity | null;
  severityV2: Severity | null;
  impact: Impact;
  /** JSON-encoded combined description */
  description: string;
  /** JSON-encoded raw feed entry */
  rawPayload: string;
}

// ---------------------------------------------------------------------------
// Store interface
// ---------------------------------------------------------------------------

export interface RecordStore {
  /**
   * Drop, recreate and fill the table in one transaction.
   * @returns Number of rows written
   * @throws StoreError if anything fails; the previous table is kept
   */
  replaceAll(records: readonly VulnerabilityRecord[]): number;

  count(query?: CountQuery): number;

  /** Parsed raw payload of the first row with this id */
  getRawById(id: string): unknown;

  close(): void;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function toRow(record: VulnerabilityRecord, sequenceNum: number): CvesRow {
  return {
    sequenceNum,
    id: record.id,
    lastModifiedDate: record.lastModifiedDate,
    publishedDate: record.publishedDate,
    classification: record.classification,
    severityV3: record.cvssV3Severity ?? null,
    severityV2: record.cvssV2Severity ?? null,
    impact: record.impact,
    description: JSON.stringify(record.combinedDescription),
    rawPayload: JSON.stringify(record.rawPayload),
  };
}
