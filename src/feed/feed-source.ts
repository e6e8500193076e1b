/**
 * Feed Source interface and naming helpers for the NVD yearly feeds.
 *
 * The source is injectable so the import pipeline can be tested without
 * network access. The real implementation is NvdFeedClient.
 */

// ---------------------------------------------------------------------------
// Client interface
// ---------------------------------------------------------------------------

export interface FeedSource {
  /**
   * Make the decompressed feed for a year available locally.
   * @returns Path to the feed JSON, or undefined when no copy could be obtained
   * @throws FetchError when the local cache cannot be used
   */
  fetchYearFeed(year: number): Promise<string | undefined>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** NVD publishes yearly feeds starting with 2002. */
export const FIRST_FEED_YEAR = 2002;

const FEED_PREFIX = 'nvdcve-1.1-';

/**
 * Archive file name for a year, e.g. "nvdcve-1.1-2021.json.gz".
 */
export function feedArchiveName(year: number): string {
  return `${FEED_PREFIX}${year}.json.gz`;
}

/**
 * Decompressed file name for a year, e.g. "nvdcve-1.1-2021.json".
 */
export function feedJsonName(year: number): string {
  return `${FEED_PREFIX}${year}.json`;
}

/**
 * Every feed year from `firstFeedYear` through `currentYear`, ascending.
 */
export function feedYears(currentYear: number, firstFeedYear: number = FIRST_FEED_YEAR): number[] {
  const years: number[] = [];
  for (let y = firstFeedYear; y <= currentYear; y++) years.push(y);
  return years;
}
