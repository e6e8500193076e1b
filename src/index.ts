/**
 * nvd-stats — NVD yearly feed importer and CVE statistics.
 *
 * Import pipeline: fetch every feed year → normalize every entry → replace
 * the stored table in one transaction. Nothing is streamed; each stage
 * finishes before the next starts.
 */

import type { FeedSource } from './feed/feed-source.js';
import { loadFeedEntries } from './feed/feed-loader.js';
import {
  normalizeAll,
  type NormalizeOptions,
  type SkippedEntry,
} from './normalizer/record-normalizer.js';
import type { RecordStore } from './store/record-store.js';
import { FetchError, errorMessage } from './errors.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('import');

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

export const VERSION = '1.0.0';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface ImportOptions {
  feedSource: FeedSource;
  store: RecordStore;
  /** Feed years to load, in order */
  years: readonly number[];
  normalize?: NormalizeOptions;
}

export interface ImportSummary {
  /** Rows written to the store */
  imported: number;
  /** Entries dropped by the normalizer */
  skipped: SkippedEntry[];
  yearsLoaded: number[];
  /** Years whose feed could not be fetched or read */
  yearsUnavailable: number[];
  /** False when no feed year loaded and the stored table was left as is */
  replaced: boolean;
}

// ---------------------------------------------------------------------------
// Re-exports for consumer convenience
// ---------------------------------------------------------------------------

export * from './errors.js';
export type {
  Classification,
  Impact,
  Severity,
  SeveritySystem,
  TieBreak,
  VulnerabilityRecord,
} from './schemas/record.schema.js';
export type { FeedSource } from './feed/feed-source.js';
export type { CountQuery, RecordStore } from './store/record-store.js';
export type { YearlyTotal } from './aggregator/yearly-totals.js';
export type { SeverityCounts } from './aggregator/severity-distribution.js';
export type { LookupResult } from './aggregator/lookup.js';
export { feedYears } from './feed/feed-source.js';
export { NvdFeedClient } from './feed/nvd-feed-client.js';
export { loadFeedEntries } from './feed/feed-loader.js';
export { normalize, normalizeAll } from './normalizer/record-normalizer.js';
export { classify } from './normalizer/classifier.js';
export { resolveSeverity, reconcileImpact } from './normalizer/severity-resolver.js';
export { SqliteRecordStore } from './store/sqlite-store.js';
export { resolveYearRange } from './aggregator/year-range.js';
export { yearlyTotals } from './aggregator/yearly-totals.js';
export { severityDistribution, parseSeveritySystem } from './aggregator/severity-distribution.js';
export { lookup } from './aggregator/lookup.js';
export { loadConfig, type Config } from './config/config.js';

// ---------------------------------------------------------------------------
// runImport — main pipeline
// ---------------------------------------------------------------------------

/**
 * Run a full import.
 *
 * A year whose feed cannot be fetched or read is skipped; a malformed entry
 * is skipped. Store failures propagate as StoreError.
 */
export async function runImport(options: ImportOptions): Promise<ImportSummary> {
  const { feedSource, store, years } = options;
  const entries: unknown[] = [];
  const yearsLoaded: number[] = [];
  const yearsUnavailable: number[] = [];

  // -------------------------------------------------------------------------
  // Step 1: Fetch and read every feed year, one at a time
  // -------------------------------------------------------------------------
  for (const year of years) {
    try {
      const feedPath = await feedSource.fetchYearFeed(year);
      if (feedPath === undefined) {
        yearsUnavailable.push(year);
        continue;
      }
      const yearEntries = await loadFeedEntries(feedPath, year);
      log.info(`Loaded ${yearEntries.length} entries from the ${year} feed`);
      for (const entry of yearEntries) entries.push(entry);
      yearsLoaded.push(year);
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;
      log.warn(errorMessage(err));
      yearsUnavailable.push(year);
    }
  }

  // -------------------------------------------------------------------------
  // Step 2: Normalize
  // -------------------------------------------------------------------------
  const { records, skipped } = normalizeAll(entries, options.normalize);
  if (skipped.length > 0) {
    log.warn(`Skipped ${skipped.length} malformed entr${skipped.length === 1 ? 'y' : 'ies'}`);
  }

  // -------------------------------------------------------------------------
  // Step 3: Replace the stored table
  // -------------------------------------------------------------------------
  if (yearsLoaded.length === 0) {
    log.error('No feed year could be loaded; keeping the existing table');
    return { imported: 0, skipped, yearsLoaded, yearsUnavailable, replaced: false };
  }

  const imported = store.replaceAll(records);
  log.info(`Imported ${imported} records`);
  return { imported, skipped, yearsLoaded, yearsUnavailable, replaced: true };
}
