/**
 * NvdFeedClient — FeedSource backed by the NVD JSON 1.1 feed archives.
 *
 * Archives are cached under `cacheDir` and re-fetched once their
 * modification time is older than `maxCacheAgeHours`. A download goes to a
 * temporary file first, so a failed refresh never clobbers the cached copy.
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import path from 'node:path';
import { promisify } from 'node:util';
import { gunzip } from 'node:zlib';
import { DEFAULT_FEED_BASE_URL } from '../config/config.js';
import { FetchError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { feedArchiveName, feedJsonName, type FeedSource } from './feed-source.js';

const gunzipAsync = promisify(gunzip);
const log = createLogger('feed');

const HOUR_MS = 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

/** The subset of a fetch Response the client reads. */
export interface FeedResponse {
  ok: boolean;
  status: number;
  statusText: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchFn = (url: string) => Promise<FeedResponse>;

export interface NvdFeedClientOptions {
  cacheDir: string;
  baseUrl?: string;
  maxCacheAgeHours?: number;
  /** Extra attempts after the first failed download */
  retries?: number;
  /** Backoff unit; attempt n waits n * retryDelayMs */
  retryDelayMs?: number;
  fetchFn?: FetchFn;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

// ---------------------------------------------------------------------------
// NvdFeedClient
// ---------------------------------------------------------------------------

export class NvdFeedClient implements FeedSource {
  private readonly cacheDir: string;
  private readonly baseUrl: string;
  private readonly maxAgeMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: NvdFeedClientOptions) {
    this.cacheDir = options.cacheDir;
    this.baseUrl = options.baseUrl ?? DEFAULT_FEED_BASE_URL;
    this.maxAgeMs = (options.maxCacheAgeHours ?? 24) * HOUR_MS;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.fetchFn = options.fetchFn ?? ((url) => fetch(url));
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  feedUrl(year: number): string {
    return `${this.baseUrl}${feedArchiveName(year)}`;
  }

  /**
   * @throws FetchError when the cache directory cannot be created or read
   */
  async fetchYearFeed(year: number): Promise<string | undefined> {
    try {
      return await this.obtainFeed(year);
    } catch (err) {
      if (err instanceof FetchError) throw err;
      throw new FetchError(year, `cache ${this.cacheDir} is unusable: ${errorMessage(err)}`, err);
    }
  }

  private async obtainFeed(year: number): Promise<string | undefined> {
    await mkdir(this.cacheDir, { recursive: true });
    const archivePath = path.join(this.cacheDir, feedArchiveName(year));
    const jsonPath = path.join(this.cacheDir, feedJsonName(year));

    let archive = await statOrUndefined(archivePath);
    if (!archive || this.now() - archive.mtimeMs > this.maxAgeMs) {
      if (archive) log.info(`${feedArchiveName(year)} is older than the cache limit, refreshing`);
      try {
        await this.download(year, archivePath);
        archive = await statOrUndefined(archivePath);
      } catch (err) {
        if (!(err instanceof FetchError)) throw err;
        log.warn(errorMessage(err));
        if (!archive) return undefined;
        log.warn(`Using stale cached copy of ${feedArchiveName(year)}`);
      }
    }
    if (!archive) return undefined;

    const json = await statOrUndefined(jsonPath);
    if (!json || json.mtimeMs < archive.mtimeMs) {
      try {
        await writeFile(jsonPath, await gunzipAsync(await readFile(archivePath)));
      } catch (err) {
        log.warn(new FetchError(year, `cannot decompress ${archivePath}`, err).message);
        return undefined;
      }
    }
    return jsonPath;
  }

  /**
   * Download one archive, retrying with linear backoff.
   * @throws FetchError once every attempt has failed
   */
  private async download(year: number, archivePath: string): Promise<void> {
    const url = this.feedUrl(year);
    const tmpPath = `${archivePath}.${process.pid}.tmp`;
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      if (attempt > 0) await this.sleep(this.retryDelayMs * attempt);
      log.info(`Downloading ${url}${attempt > 0 ? ` (retry ${attempt})` : ''}`);
      try {
        const response = await this.fetchFn(url);
        if (!response.ok) {
          throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
        }
        await writeFile(tmpPath, Buffer.from(await response.arrayBuffer()));
        await rename(tmpPath, archivePath);
        return;
      } catch (err) {
        lastError = err;
        await rm(tmpPath, { force: true });
      }
    }

    throw new FetchError(
      year,
      `download of ${url} failed after ${this.retries + 1} attempt(s): ${errorMessage(lastError)}`,
      lastError,
    );
  }
}

async function statOrUndefined(filePath: string): Promise<Stats | undefined> {
  try {
    return await stat(filePath);
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
