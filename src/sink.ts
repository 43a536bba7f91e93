import { errorMessage } from './errors.js';
import { log as rootLog, type Logger } from './logger.js';
import type { Account, SinkRow, SinkTable, UploadResult } from './types.js';

// ---------------------------------------------------------------------------
// Store interfaces, implemented by the Convex and SQLite backends
// ---------------------------------------------------------------------------

/** Tabular insert access to the data sink */
export interface RecordStore {
  /** One request for the whole batch; rejects when any row is refused */
  insertMany(table: SinkTable, rows: SinkRow[]): Promise<void>;
  insertOne(table: SinkTable, row: SinkRow): Promise<void>;
}

/** Where credentialed accounts come from, and where their scrape time goes */
export interface AccountSource {
  /** Active accounts, highest priority first, least recently scraped next */
  listActiveAccounts(): Promise<Account[]>;
  markScraped(account: Account, scrapedAt: string): Promise<void>;
}

export type RunStatus = 'success' | 'partial' | 'failed';

// A type alias (not an interface) so it can travel as Convex function args.
export type RunCompletion = {
  status: RunStatus;
  attempted: number;
  succeeded: number;
  failed: number;
  records: number;
  durationSeconds: number;
  error?: string;
};

/** Run history kept beside the records */
export interface RunLog {
  startRun(kinds: string[]): Promise<string>;
  completeRun(runId: string, completion: RunCompletion): Promise<void>;
  getConsecutiveFailures(): Promise<number>;
}

export interface DataSink {
  records: RecordStore;
  accounts: AccountSource;
  runs: RunLog;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Batch upload
// ---------------------------------------------------------------------------

export const DEFAULT_BATCH_SIZE = 100;

/**
 * Insert `rows` in batches of `batchSize`. A batch that fails is retried one
 * row at a time, so every row is counted exactly once as succeeded or failed.
 * Never rejects.
 */
export async function uploadRecords(
  store: RecordStore,
  table: SinkTable,
  rows: SinkRow[],
  batchSize: number = DEFAULT_BATCH_SIZE,
  log: Logger = rootLog
): Promise<UploadResult> {
  const result: UploadResult = { succeeded: 0, failed: 0 };
  const size = Math.max(1, Math.floor(batchSize));

  for (let start = 0; start < rows.length; start += size) {
    const batch = rows.slice(start, start + size);
    const label = `${table} rows ${start + 1}-${start + batch.length}`;

    try {
      await store.insertMany(table, batch);
      result.succeeded += batch.length;
      log.debug(`Inserted ${label} in one batch`);
      continue;
    } catch (error) {
      log.warn(`Batch insert of ${label} failed, inserting one by one: ${errorMessage(error)}`);
    }

    for (const row of batch) {
      try {
        await store.insertOne(table, row);
        result.succeeded++;
      } catch (error) {
        result.failed++;
        log.error(`Insert into ${table} failed: ${errorMessage(error)}`);
      }
    }
  }

  if (result.failed > 0) {
    log.warn(`Uploaded ${result.succeeded}/${rows.length} row(s) to ${table}, ${result.failed} failed`);
  } else if (rows.length > 0) {
    log.success(`Uploaded ${result.succeeded} row(s) to ${table}`);
  }
  return result;
}

// ---------------------------------------------------------------------------
// Account ordering
// ---------------------------------------------------------------------------

/** Priority descending, then never-scraped first, then oldest scrape first */
export function compareAccounts(a: Account, b: Account): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  if (a.last_scraped_at === b.last_scraped_at) return 0;
  if (a.last_scraped_at === null) return -1;
  if (b.last_scraped_at === null) return 1;
  return Date.parse(a.last_scraped_at) - Date.parse(b.last_scraped_at);
}

export function orderAccounts(accounts: readonly Account[]): Account[] {
  return [...accounts].sort(compareAccounts);
}
