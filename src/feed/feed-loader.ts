import { readFile } from 'node:fs/promises';
import { FeedFile } from '../schemas/feed.schema.js';
import { FetchError, errorMessage } from '../errors.js';

/**
 * Read a decompressed yearly feed and return its raw entries.
 * Entries are not validated here; the normalizer checks each one.
 *
 * @throws FetchError when the file cannot be read or is not a feed
 */
export async function loadFeedEntries(filePath: string, year: number): Promise<unknown[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (err) {
    throw new FetchError(year, `cannot read ${filePath}: ${errorMessage(err)}`, err);
  }

  const feed = FeedFile.safeParse(parsed);
  if (!feed.success) {
    throw new FetchError(year, `${filePath} has no CVE_Items list`, feed.error);
  }
  return feed.data.CVE_Items;
}
