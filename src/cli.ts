/**
 * Command-line surface: import, year-stats, severity-stats, lookup.
 *
 * `runCli` returns the exit code instead of exiting so it can be driven
 * from tests with an in-memory store and a fake feed source.
 */

import { parseArgs } from 'node:util';
import { loadConfig, type Config } from './config/config.js';
import { feedYears, type FeedSource } from './feed/feed-source.js';
import { NvdFeedClient } from './feed/nvd-feed-client.js';
import type { RecordStore } from './store/record-store.js';
import { SqliteRecordStore } from './store/sqlite-store.js';
import { resolveYearRange } from './aggregator/year-range.js';
import { yearlyTotals } from './aggregator/yearly-totals.js';
import { parseSeveritySystem, severityDistribution } from './aggregator/severity-distribution.js';
import { lookup } from './aggregator/lookup.js';
import {
  formatSeverityDistribution,
  formatYearlyTotals,
  type ReportFormat,
} from './report/report-formatter.js';
import { InvalidSeveritySystemError, NvdStatsError, errorMessage } from './errors.js';
import { createLogger } from './utils/logger.js';
import { runImport } from './index.js';

const log = createLogger('cli');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: nvd-stats <command> [options]

Commands:
  import                         Download the NVD feeds and rebuild the database
  year-stats [--year Y]          CVE counts per year with YoY growth of valid entries
  severity-stats --system S [--year Y]
                                 Severity counts per year; S is V2, V3, ALL or COMBINED
  lookup <id...>                 Print the stored feed entry of each CVE id

Options:
  --db <path>                    Database file (default: $NVD_STATS_DB or nvdcves.db)
  --format <text|markdown|json>  Report format (default: text)
  -h, --help                     Show this help`;

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  env: NodeJS.ProcessEnv;
  now(): Date;
  openStore(config: Config): RecordStore;
  createFeedSource(config: Config): FeedSource;
}

export const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  env: process.env,
  now: () => new Date(),
  openStore: (config) => new SqliteRecordStore(config.dbPath),
  createFeedSource: (config) =>
    new NvdFeedClient({
      cacheDir: config.cacheDir,
      baseUrl: config.feedBaseUrl,
      maxCacheAgeHours: config.maxCacheAgeHours,
      retries: config.fetchRetries,
      retryDelayMs: config.retryDelayMs,
    }),
};

class UsageError extends Error {}

const FORMATS: readonly ReportFormat[] = ['text', 'markdown', 'json'];

// ---------------------------------------------------------------------------
// runCli
// ---------------------------------------------------------------------------

export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  let store: RecordStore | undefined;

  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      options: {
        year: { type: 'string' },
        system: { type: 'string', short: 's' },
        format: { type: 'string' },
        db: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
      strict: true,
    });

    const [command, ...rest] = positionals;
    if (values.help) {
      io.stdout(USAGE);
      return EXIT_OK;
    }
    if (command === undefined) throw new UsageError('No command given');

    const config = loadConfig(io.env, { dbPath: values.db });
    const format = parseFormat(values.format);
    const year = parseYear(values.year);
    const currentYear = io.now().getFullYear();

    switch (command) {
      case 'import': {
        store = io.openStore(config);
        const summary = await runImport({
          feedSource: io.createFeedSource(config),
          store,
          years: feedYears(currentYear, config.firstFeedYear),
          normalize: { tieBreak: config.tieBreak },
        });
        io.stdout(
          `Imported ${summary.imported} records (${summary.skipped.length} skipped, ` +
            `${summary.yearsUnavailable.length} feed years unavailable)`,
        );
        return summary.replaced ? EXIT_OK : EXIT_FAILURE;
      }

      case 'year-stats': {
        store = io.openStore(config);
        const years = resolveYearRange({ startYear: config.startYear, currentYear, year });
        io.stdout(formatYearlyTotals(yearlyTotals(store, years), format));
        return EXIT_OK;
      }

      case 'severity-stats': {
        if (values.system === undefined) throw new UsageError('severity-stats requires --system');
        const system = parseSeveritySystem(values.system);
        store = io.openStore(config);
        const years = resolveYearRange({ startYear: config.startYear, currentYear, year });
        const counts = severityDistribution(store, system, years);
        io.stdout(formatSeverityDistribution(counts, system, format));
        return EXIT_OK;
      }

      case 'lookup': {
        if (rest.length === 0) throw new UsageError('lookup requires at least one id');
        store = io.openStore(config);
        const results = lookup(store, rest);
        if (format === 'json') {
          const entries = results.map((r) =>
            r.found ? r : { id: r.id, found: false, error: r.error.message },
          );
          io.stdout(JSON.stringify(entries, null, 2));
        } else {
          for (const result of results) {
            if (result.found) io.stdout(JSON.stringify(result.payload, null, 2));
          }
        }
        const misses = results.filter((r) => !r.found);
        for (const miss of misses) io.stderr(`${miss.id}: not found`);
        return misses.length > 0 ? EXIT_FAILURE : EXIT_OK;
      }

      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (err) {
    if (err instanceof InvalidSeveritySystemError) {
      io.stderr(err.message);
      return EXIT_USAGE;
    }
    if (err instanceof UsageError || isParseArgsError(err)) {
      io.stderr(`${errorMessage(err)}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (err instanceof NvdStatsError) {
      log.error(err.message);
      io.stderr(err.message);
      return EXIT_FAILURE;
    }
    throw err;
  } finally {
    store?.close();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseFormat(value: string | undefined): ReportFormat {
  if (value === undefined) return 'text';
  const format = FORMATS.find((f) => f === value.toLowerCase());
  if (!format) throw new UsageError(`Unknown format "${value}"`);
  return format;
}

function parseYear(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d{4}$/.test(value.trim())) throw new UsageError(`Invalid year "${value}"`);
  return Number(value.trim());
}

/** node:util parseArgs throws TypeErrors tagged with an ERR_PARSE_ARGS_* code. */
function isParseArgsError(err: unknown): boolean {
  return (
    err instanceof TypeError &&
    'code' in err &&
    typeof err.code === 'string' &&
    err.code.startsWith('ERR_PARSE_ARGS')
  );
}
