import 'dotenv/config';
import path from 'path';
import { fileURLToPath } from 'url';
import { log } from './logger.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = path.resolve(__dirname, '..');

// ---------------------------------------------------------------------------
// Environment helpers
// ---------------------------------------------------------------------------
export function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}\n` +
      `Make sure you have a .env file in the project root.\n` +
      `See .env.example for reference.`
    );
  }
  return value;
}

export function optionalEnv(key: string, fallback: string = ''): string {
  return process.env[key] || fallback;
}

/** Positive integer from the environment; anything else yields the fallback. */
export function intEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    log.warn(`Ignoring invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

export function listEnv(key: string, fallback: string[]): string[] {
  const items = optionalEnv(key)
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : fallback;
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------
export const paths = {
  database: optionalEnv('SQLITE_PATH', path.join(PROJECT_ROOT, 'data', 'scraper.db')),
  output: path.resolve(optionalEnv('OUTPUT_DIR', path.join(PROJECT_ROOT, 'output'))),
};

// ---------------------------------------------------------------------------
// Scraper settings
// ---------------------------------------------------------------------------
export const scraper = {
  /** Observer page; account credentials are appended as query parameters */
  observerBaseUrl: optionalEnv('OBSERVER_BASE_URL', 'https://www.antpool.com/observer'),

  /** Run browser hidden (true) or with a visible window (false) */
  headless: optionalEnv('HEADLESS', 'true') === 'true',

  /** Hard upper bound on table pages visited per account and kind */
  maxPages: intEnv('MAX_PAGES', 50),

  /** Milliseconds to wait for page loads and selectors */
  pageTimeout: intEnv('PAGE_TIMEOUT_MS', 30_000),

  /** How long a freshly paged table may take to show stable rows */
  settleTimeout: intEnv('SETTLE_TIMEOUT_MS', 5_000),

  /** Navigate → wait-for-table attempts per account before giving up */
  viewLoadAttempts: intEnv('VIEW_LOAD_ATTEMPTS', 3),

  /** Fixed delay between view-load attempts */
  retryBackoff: intEnv('RETRY_BACKOFF_MS', 2_000),

  /** Browsers running side by side; each owns one contiguous account group */
  maxConcurrent: intEnv('MAX_CONCURRENT', 3),

  /** Last-share tokens that mark a worker inactive */
  staleTokens: listEnv('STALE_TOKENS', ['day', 'week', 'month']),
};

// ---------------------------------------------------------------------------
// Data sink
// ---------------------------------------------------------------------------
export type SinkMode = 'convex' | 'sqlite' | 'none';

function sinkMode(): SinkMode {
  const mode = optionalEnv('SINK', process.env.CONVEX_URL ? 'convex' : 'none');
  if (mode === 'convex' || mode === 'sqlite' || mode === 'none') return mode;
  log.warn(`Unknown SINK="${mode}", running without a data sink`);
  return 'none';
}

export const sink = {
  mode: sinkMode(),
  convexUrl: optionalEnv('CONVEX_URL'),
  convexAuthToken: optionalEnv('CONVEX_AUTH_TOKEN'),
  batchSize: intEnv('BATCH_SIZE', 100),
};

// ---------------------------------------------------------------------------
// Single-account credentials (CLI / scheduler entry points only)
// ---------------------------------------------------------------------------
export const credentials = {
  accessKey: optionalEnv('ACCESS_KEY'),
  userId: optionalEnv('USER_ID'),
  coinType: optionalEnv('COIN_TYPE', 'BTC'),
};

// ---------------------------------------------------------------------------
// Schedule
// ---------------------------------------------------------------------------
export const schedule = {
  workers: optionalEnv('WORKERS_CRON', '0 */3 * * *'),
  daily: optionalEnv('DAILY_CRON', '0 1 * * *'),
  inactive: optionalEnv('INACTIVE_CRON', '*/30 * * * *'),
  /** Newest earnings rows the daily job reads */
  dailyEarningsDays: intEnv('DAILY_EARNINGS_DAYS', 7),
  timezone: optionalEnv('SCHEDULE_TIMEZONE', 'UTC'),
};
