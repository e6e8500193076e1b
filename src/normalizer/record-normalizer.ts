/**
 * Record Normalizer — turns one raw NVD feed entry into a flat
 * VulnerabilityRecord.
 */

import { z } from 'zod';
import { CveItem, ImpactBlock } from '../schemas/feed.schema.js';
import type { TieBreak, VulnerabilityRecord } from '../schemas/record.schema.js';
import { MalformedRecordError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { classify } from './classifier.js';
import { resolveSeverity } from './severity-resolver.js';

const log = createLogger('normalizer');

export const NO_DESCRIPTION = 'No description info';
export const DESCRIPTION_DELIMITER = '|';

const FEED_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})Z$/;

const IdProbe = z.object({
  cve: z.object({ CVE_data_meta: z.object({ ID: z.string().min(1) }) }),
});

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface NormalizeOptions {
  tieBreak?: TieBreak;
}

export interface SkippedEntry {
  /** Position of the entry in the input batch */
  index: number;
  id?: string;
  reason: string;
}

export interface NormalizeBatchResult {
  records: VulnerabilityRecord[];
  skipped: SkippedEntry[];
}

// ---------------------------------------------------------------------------
// normalize
// ---------------------------------------------------------------------------

/**
 * Normalize a single raw entry.
 *
 * @throws MalformedRecordError when the id, a timestamp or the description
 *   list is missing or mis-shaped
 */
export function normalize(rawEntry: unknown, options: NormalizeOptions = {}): VulnerabilityRecord {
  const parsed = CveItem.safeParse(rawEntry);
  if (!parsed.success) {
    throw new MalformedRecordError(
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', '),
      { recordId: peekId(rawEntry), issues: parsed.error.issues },
    );
  }

  const item = parsed.data;
  const id = item.cve.CVE_data_meta.ID;
  const publishedAt = parseFeedTimestamp(item.publishedDate, id, 'publishedDate');
  const lastModifiedAt = parseFeedTimestamp(item.lastModifiedDate, id, 'lastModifiedDate');

  const descriptions = (item.cve.description?.description_data ?? []).map((d) => d.value);
  const combinedDescription =
    descriptions.length > 0 ? descriptions.join(DESCRIPTION_DELIMITER) : NO_DESCRIPTION;

  const metrics = ImpactBlock.safeParse(item.impact);
  const severity = metrics.success
    ? resolveSeverity(metrics.data.baseMetricV2, metrics.data.baseMetricV3, options)
    : resolveSeverity(undefined, undefined, options);

  return {
    id,
    publishedDate: item.publishedDate,
    publishedAt,
    lastModifiedDate: item.lastModifiedDate,
    lastModifiedAt,
    descriptions,
    combinedDescription,
    classification: classify(combinedDescription),
    ...severity,
    rawPayload: rawEntry,
  };
}

/**
 * Normalize a batch, skipping (and logging) entries that fail.
 * Output order follows input order.
 */
export function normalizeAll(
  entries: readonly unknown[],
  options: NormalizeOptions = {},
): NormalizeBatchResult {
  const records: VulnerabilityRecord[] = [];
  const skipped: SkippedEntry[] = [];

  entries.forEach((entry, index) => {
    try {
      records.push(normalize(entry, options));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      const reason = errorMessage(err);
      log.warn(`Skipping feed entry #${index}: ${reason}`);
      skipped.push(err.recordId ? { index, id: err.recordId, reason } : { index, reason });
    }
  });

  return { records, skipped };
}

// ---------------------------------------------------------------------------
// Timestamps
// ---------------------------------------------------------------------------

/**
 * Parse a feed timestamp (`YYYY-MM-DDThh:mmZ`, UTC). Values that do not
 * match the format or name an impossible date are rejected.
 */
export function parseFeedTimestamp(value: string, recordId?: string, field = 'timestamp'): Date {
  const match = FEED_TIMESTAMP.exec(value);
  const fail = () =>
    new MalformedRecordError(`${field} "${value}" is not in YYYY-MM-DDThh:mmZ format`, {
      recordId,
    });
  if (!match) throw fail();

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hour = Number(match[4]);
  const minute = Number(match[5]);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute
  ) {
    throw fail();
  }
  return date;
}

/** Best-effort id of an entry that failed validation, for the warning. */
function peekId(rawEntry: unknown): string | undefined {
  const parsed = IdProbe.safeParse(rawEntry);
  return parsed.success ? parsed.data.cve.CVE_data_meta.ID : undefined;
}
