import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { log } from './logger.js';
import type { AccountSource, DataSink, RecordStore, RunLog } from './sink.js';
import type { Account, SinkRow, SinkTable, SinkValue } from './types.js';

// ---------------------------------------------------------------------------
// Local SQLite sink: the hosted sink interfaces, for offline runs
// ---------------------------------------------------------------------------

export const TABLE_COLUMNS: Record<SinkTable, readonly string[]> = {
  mining_workers: [
    'worker_id', 'ten_min_hashrate', 'one_hour_hashrate', 'day_hashrate', 'rejection_rate',
    'last_share_time', 'connections_24h', 'status', 'account_ref', 'coin_type', 'observed_at',
  ],
  mining_pool_stats: [
    'ten_min_hashrate', 'day_hashrate', 'active_worker_count', 'inactive_worker_count',
    'account_balance', 'yesterday_earnings', 'total_earnings', 'account_ref', 'coin_type', 'observed_at',
  ],
  mining_earnings: [
    'date', 'daily_hashrate', 'earnings_amount', 'earnings_currency', 'earnings_type',
    'payment_status', 'account_ref', 'coin_type', 'observed_at',
  ],
  mining_inactive_workers: [
    'worker_id', 'last_share_time', 'inactive_duration', 'account_ref', 'coin_type', 'observed_at',
  ],
};

/** Account as stored locally (SQLite has no booleans) */
interface AccountRow {
  id: number;
  account_name: string;
  access_key: string;
  user_id: string;
  coin_type: string;
  is_active: number;
  priority: number;
  last_scraped_at: string | null;
}

interface RunRow {
  status: string;
}

// ---------------------------------------------------------------------------
// Database initialization
// ---------------------------------------------------------------------------

/** Open (and create if needed) the local database; ':memory:' works too */
export function openDatabase(file: string): Database.Database {
  if (file !== ':memory:') {
    fs.mkdirSync(path.dirname(file), { recursive: true });
  }

  const db = new Database(file);

  // Enable WAL mode for better concurrent access
  db.pragma('journal_mode = WAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS mining_workers (
      id                INTEGER PRIMARY KEY AUTOINCREMENT,
      worker_id         TEXT NOT NULL,
      ten_min_hashrate  TEXT NOT NULL,
      one_hour_hashrate TEXT NOT NULL,
      day_hashrate      TEXT NOT NULL,
      rejection_rate    TEXT NOT NULL,
      last_share_time   TEXT NOT NULL,
      connections_24h   TEXT NOT NULL,
      status            TEXT NOT NULL CHECK (status IN ('active', 'inactive')),
      account_ref       TEXT NOT NULL,
      coin_type         TEXT NOT NULL,
      observed_at       TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS mining_pool_stats (
      id                    INTEGER PRIMARY KEY AUTOINCREMENT,
      ten_min_hashrate      TEXT NOT NULL,
      day_hashrate          TEXT NOT NULL,
      active_worker_count   INTEGER NOT NULL,
      inactive_worker_count INTEGER NOT NULL,
      account_balance       TEXT NOT NULL,
      yesterday_earnings    TEXT NOT NULL,
      total_earnings        TEXT NOT NULL,
      account_ref           TEXT NOT NULL,
      coin_type             TEXT NOT NULL,
      observed_at           TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS mining_earnings (
      id                INTEGER PRIMARY KEY AUTOINCREMENT,
      date              TEXT NOT NULL,
      daily_hashrate    TEXT NOT NULL,
      earnings_amount   TEXT NOT NULL,
      earnings_currency TEXT NOT NULL,
      earnings_type     TEXT NOT NULL,
      payment_status    TEXT NOT NULL,
      account_ref       TEXT NOT NULL,
      coin_type         TEXT NOT NULL,
      observed_at       TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS mining_inactive_workers (
      id                INTEGER PRIMARY KEY AUTOINCREMENT,
      worker_id         TEXT NOT NULL,
      last_share_time   TEXT NOT NULL,
      inactive_duration TEXT NOT NULL,
      account_ref       TEXT NOT NULL,
      coin_type         TEXT NOT NULL,
      observed_at       TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS account_credentials (
      id              INTEGER PRIMARY KEY AUTOINCREMENT,
      account_name    TEXT NOT NULL,
      access_key      TEXT NOT NULL DEFAULT '',
      user_id         TEXT NOT NULL UNIQUE,
      coin_type       TEXT NOT NULL DEFAULT 'BTC',
      is_active       INTEGER NOT NULL DEFAULT 1,
      priority        INTEGER NOT NULL DEFAULT 0,
      last_scraped_at TEXT
    );

    CREATE TABLE IF NOT EXISTS scrape_runs (
      id               INTEGER PRIMARY KEY AUTOINCREMENT,
      started_at       TEXT NOT NULL,
      completed_at     TEXT,
      status           TEXT NOT NULL DEFAULT 'running',
      kinds            TEXT NOT NULL DEFAULT '[]',
      attempted        INTEGER DEFAULT 0,
      succeeded        INTEGER DEFAULT 0,
      failed           INTEGER DEFAULT 0,
      records          INTEGER DEFAULT 0,
      duration_seconds REAL,
      error            TEXT
    );
  `);

  log.info('Database initialized', { path: file });
  return db;
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

type BindValue = string | number | null;

function bindable(value: SinkValue | undefined): BindValue {
  if (value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

function recordStore(db: Database.Database): RecordStore {
  const inserts = new Map<SinkTable, Database.Statement<Record<string, BindValue>>>();

  const statementFor = (table: SinkTable) => {
    let statement = inserts.get(table);
    if (!statement) {
      const columns = TABLE_COLUMNS[table];
      statement = db.prepare<Record<string, BindValue>>(
        `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${columns.map(c => `@${c}`).join(', ')})`
      );
      inserts.set(table, statement);
    }
    return statement;
  };

  const params = (table: SinkTable, row: SinkRow): Record<string, BindValue> =>
    Object.fromEntries(TABLE_COLUMNS[table].map(column => [column, bindable(row[column])]));

  return {
    async insertMany(table, rows) {
      const insert = statementFor(table);
      // All-or-nothing, like a batch request to the hosted sink
      db.transaction((items: SinkRow[]) => {
        for (const row of items) insert.run(params(table, row));
      })(rows);
    },

    async insertOne(table, row) {
      statementFor(table).run(params(table, row));
    },
  };
}

// ---------------------------------------------------------------------------
// Accounts
// ---------------------------------------------------------------------------

function toAccount(row: AccountRow): Account {
  return {
    id: String(row.id),
    name: row.account_name,
    access_key: row.access_key,
    external_user_id: row.user_id,
    coin_type: row.coin_type,
    is_active: row.is_active === 1,
    priority: row.priority,
    last_scraped_at: row.last_scraped_at,
  };
}

export interface NewAccount {
  name: string;
  access_key: string;
  external_user_id: string;
  coin_type?: string;
  priority?: number;
  is_active?: boolean;
}

/** Insert an account, or update the one with the same observer user id */
export function upsertAccount(db: Database.Database, account: NewAccount): void {
  db.prepare(`
    INSERT INTO account_credentials (account_name, access_key, user_id, coin_type, is_active, priority)
    VALUES (@name, @access_key, @user_id, @coin_type, @is_active, @priority)
    ON CONFLICT (user_id) DO UPDATE SET
      account_name = excluded.account_name,
      access_key = excluded.access_key,
      coin_type = excluded.coin_type,
      is_active = excluded.is_active,
      priority = excluded.priority
  `).run({
    name: account.name,
    access_key: account.access_key,
    user_id: account.external_user_id,
    coin_type: account.coin_type ?? 'BTC',
    is_active: account.is_active === false ? 0 : 1,
    priority: account.priority ?? 0,
  });
}

function accountSource(db: Database.Database): AccountSource {
  return {
    async listActiveAccounts() {
      const rows = db.prepare(`
        SELECT * FROM account_credentials
        WHERE is_active = 1
        ORDER BY priority DESC, last_scraped_at IS NOT NULL, last_scraped_at ASC, id ASC
      `).all() as AccountRow[];
      return rows.map(toAccount);
    },

    async markScraped(account, scrapedAt) {
      if (account.id === null) return;
      db.prepare('UPDATE account_credentials SET last_scraped_at = ? WHERE id = ?')
        .run(scrapedAt, Number(account.id));
    },
  };
}

// ---------------------------------------------------------------------------
// Run log operations
// ---------------------------------------------------------------------------

function runLog(db: Database.Database): RunLog {
  return {
    async startRun(kinds) {
      const result = db.prepare(`
        INSERT INTO scrape_runs (started_at, status, kinds) VALUES (?, 'running', ?)
      `).run(new Date().toISOString(), JSON.stringify(kinds));
      return String(result.lastInsertRowid);
    },

    async completeRun(runId, completion) {
      db.prepare(`
        UPDATE scrape_runs
        SET completed_at = ?, status = ?, attempted = ?, succeeded = ?, failed = ?,
            records = ?, duration_seconds = ?, error = ?
        WHERE id = ?
      `).run(
        new Date().toISOString(),
        completion.status,
        completion.attempted,
        completion.succeeded,
        completion.failed,
        completion.records,
        completion.durationSeconds,
        completion.error ?? null,
        Number(runId)
      );
    },

    /** Get count of consecutive failed runs */
    async getConsecutiveFailures() {
      const rows = db.prepare(
        "SELECT status FROM scrape_runs WHERE status != 'running' ORDER BY id DESC LIMIT 10"
      ).all() as RunRow[];
      let count = 0;
      for (const row of rows) {
        if (row.status === 'failed') count++;
        else break;
      }
      return count;
    },
  };
}

export function createSqliteSink(db: Database.Database): DataSink {
  return {
    records: recordStore(db),
    accounts: accountSource(db),
    runs: runLog(db),
    async close() {
      db.close();
      log.info('Database connection closed');
    },
  };
}
