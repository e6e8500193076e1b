import { z } from 'zod';
import { TieBreak } from '../schemas/record.schema.js';
import { ConfigError } from '../errors.js';

export const DEFAULT_FEED_BASE_URL = 'https://nvd.nist.gov/feeds/json/cve/1.1/';

const Year = z.coerce.number().int().min(1988).max(9999);

export const ConfigSchema = z.object({
  dbPath: z.string().min(1).default('nvdcves.db'),
  cacheDir: z.string().min(1).default('.nvd-cache'),
  feedBaseUrl: z
    .string()
    .url()
    .transform((u) => (u.endsWith('/') ? u : `${u}/`))
    .default(DEFAULT_FEED_BASE_URL),
  /** First year reported by year-stats and severity-stats */
  startYear: Year.default(1999),
  /** First year the upstream publishes a feed for */
  firstFeedYear: Year.default(2002),
  maxCacheAgeHours: z.coerce.number().positive().default(24),
  fetchRetries: z.coerce.number().int().min(0).max(10).default(2),
  retryDelayMs: z.coerce.number().int().min(0).default(1000),
  tieBreak: TieBreak.default('V3'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

const ENV_KEYS: Record<keyof Config, string> = {
  dbPath: 'NVD_STATS_DB',
  cacheDir: 'NVD_STATS_CACHE_DIR',
  feedBaseUrl: 'NVD_STATS_FEED_URL',
  startYear: 'NVD_STATS_START_YEAR',
  firstFeedYear: 'NVD_STATS_FIRST_FEED_YEAR',
  maxCacheAgeHours: 'NVD_STATS_MAX_CACHE_AGE_HOURS',
  fetchRetries: 'NVD_STATS_FETCH_RETRIES',
  retryDelayMs: 'NVD_STATS_RETRY_DELAY_MS',
  tieBreak: 'NVD_STATS_TIE_BREAK',
};

/**
 * Build the configuration from environment variables, with explicit
 * overrides taking precedence. Empty variables count as unset.
 *
 * @throws ConfigError when a value fails validation
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ConfigInput> = {},
): Config {
  const fromEnv: Record<string, string> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName]?.trim();
    if (value) fromEnv[key] = key === 'tieBreak' ? value.toUpperCase() : value;
  }

  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, v]) => v !== undefined),
  );

  const result = ConfigSchema.safeParse({ ...fromEnv, ...definedOverrides });
  if (!result.success) throw new ConfigError(result.error.issues);
  return result.data;
}
