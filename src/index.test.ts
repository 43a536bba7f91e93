import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { LaunchBrowser } from './browser.js';
import { createSqliteSink, openDatabase, upsertAccount } from './database.js';
import {
  accountFromCredentials,
  cliAccounts,
  isDirectRun,
  main,
  parseCli,
  runScraper,
  runStatus,
  type CliOptions,
} from './index.js';
import type { RunSummary } from './orchestrator.js';
import type { DataSink } from './sink.js';
import { FakeBrowser, FakeObserverPage, MemoryLogger } from './testing/fakes.js';

const DASHBOARD_TEXT = '10-Minute Hashrate\n512.3 TH/s\nActive\n12\nAccount Balance\n0.5 BTC';

function summary(succeeded: number, failed: number): RunSummary {
  return {
    attempted: succeeded + failed,
    succeeded,
    failed,
    successRate: 0,
    records: 0,
    durationSeconds: 0,
    failuresByReason: {},
  };
}

function cliOptions(overrides: Partial<CliOptions> = {}): CliOptions {
  return {
    command: 'scrape',
    kinds: ['workers'],
    credentials: { accessKey: '', userId: '', coinType: 'BTC' },
    useSink: false,
    skipSink: false,
    outputDir: '/tmp/out',
    ...overrides,
  };
}

describe('parseCli', () => {
  it('reads kinds, credentials and numeric limits', () => {
    const cli = parseCli([
      'daily',
      'workers',
      '--access-key', 'test-secret',
      '--user-id', 'user-9',
      '--coin-type', 'LTC',
      '--max-concurrent', '4',
      '--skip-sink',
    ]);

    expect(cli.command).toBe('scrape');
    expect(cli.kinds).toEqual(['dashboard', 'earnings', 'workers']);
    expect(cli.credentials).toEqual({ accessKey: 'test-secret', userId: 'user-9', coinType: 'LTC', name: undefined });
    expect(cli.maxConcurrent).toBe(4);
    expect(cli.batchSize).toBeUndefined();
    expect(cli.skipSink).toBe(true);
    expect(cli.useSink).toBe(false);
  });

  it('shows help without positionals or with --help', () => {
    expect(parseCli([]).command).toBe('help');
    expect(parseCli(['workers', '--help']).command).toBe('help');
  });

  it('recognises add-account without resolving kinds', () => {
    const cli = parseCli(['add-account', '--name', 'Farm Two', '--user-id', 'user-2', '--access-key', 'test-secret']);
    expect(cli.command).toBe('add-account');
    expect(cli.kinds).toEqual([]);
    expect(cli.credentials.name).toBe('Farm Two');
  });

  it('reads the account group and the earnings row limit', () => {
    const cli = parseCli(['daily', '--group', '2', '--total-groups', '3', '--earnings-days', '7']);
    expect(cli.shard).toEqual({ group: 2, totalGroups: 3 });
    expect(cli.earningsDays).toBe(7);
    expect(parseCli(['workers']).shard).toBeUndefined();
  });

  it('rejects a group outside the total or given alone', () => {
    expect(() => parseCli(['workers', '--group', '4', '--total-groups', '3'])).toThrow(
      'Group must be between 1 and 3, got 4'
    );
    expect(() => parseCli(['workers', '--group', '1'])).toThrow('--group and --total-groups must be given together');
    expect(() => parseCli(['workers', '--total-groups', '2'])).toThrow(
      '--group and --total-groups must be given together'
    );
  });

  it('rejects limits that are not positive integers', () => {
    expect(() => parseCli(['workers', '--max-pages', '0'])).toThrow('--max-pages must be a positive integer, got "0"');
    expect(() => parseCli(['workers', '--batch-size', '2.5'])).toThrow('--batch-size must be a positive integer, got "2.5"');
  });
});

describe('cliAccounts', () => {
  it('leaves account selection to the sink with --use-sink', () => {
    expect(cliAccounts(cliOptions({ useSink: true }))).toBeUndefined();
  });

  it('yields no account without any credentials', () => {
    expect(cliAccounts(cliOptions())).toEqual([]);
  });

  it('builds an ad-hoc account from the credentials', () => {
    const accounts = cliAccounts(
      cliOptions({ credentials: { accessKey: 'test-secret', userId: 'user-3', coinType: '' } })
    );
    expect(accounts).toEqual([accountFromCredentials({ accessKey: 'test-secret', userId: 'user-3', coinType: 'BTC' })]);
    expect(accounts?.[0]).toMatchObject({ id: null, name: 'user-3', coin_type: 'BTC' });
  });
});

describe('main', () => {
  it('exits 0 after a run in which every account failed', async () => {
    const launch = vi.fn<LaunchBrowser>();

    const code = await main(['workers', '--user-id', 'user-1', '--access-key='], { openSink: () => null, launch });

    expect(code).toBe(0);
    expect(launch).not.toHaveBeenCalled();
  });

  it('exits 1 when there is no account to process', async () => {
    const launch = vi.fn<LaunchBrowser>();
    const code = await main(['workers', '--user-id=', '--access-key='], { openSink: () => null, launch });
    expect(code).toBe(1);
  });
});

describe('isDirectRun', () => {
  it('is false, without throwing, when the entry script does not exist', () => {
    const entry = process.argv[1];
    process.argv[1] = '/no/such/dir/entry.js';
    try {
      expect(isDirectRun(import.meta.url)).toBe(false);
    } finally {
      process.argv[1] = entry;
    }
  });
});

describe('runStatus', () => {
  it('derives the run status from the outcome counts', () => {
    expect(runStatus(summary(3, 0))).toBe('success');
    expect(runStatus(summary(2, 1))).toBe('partial');
    expect(runStatus(summary(0, 3))).toBe('failed');
  });
});

describe('runScraper', () => {
  let db: Database.Database;
  let sink: DataSink;

  beforeEach(() => {
    db = openDatabase(':memory:');
    sink = createSqliteSink(db);
  });

  afterEach(async () => {
    await sink.close();
  });

  it('reports no_accounts when the sink has none', async () => {
    const launch = vi.fn<LaunchBrowser>();
    const log = new MemoryLogger();

    const result = await runScraper({ kinds: ['workers'], sink, outputDir: null, launch, log });

    expect(result).toEqual({ status: 'no_accounts', kinds: ['workers'], outcomes: [], summary: null, consecutiveFailures: 0 });
    expect(launch).not.toHaveBeenCalled();
    expect(db.prepare('SELECT COUNT(*) FROM scrape_runs').pluck().get()).toBe(0);
  });

  it('scrapes only the selected group of accounts', async () => {
    upsertAccount(db, { name: 'First', access_key: 'test-secret', external_user_id: 'user-1' });
    upsertAccount(db, { name: 'Second', access_key: 'test-secret', external_user_id: 'user-2' });
    upsertAccount(db, { name: 'Third', access_key: 'test-secret', external_user_id: 'user-3' });
    const launch = vi
      .fn<LaunchBrowser>()
      .mockResolvedValue(new FakeBrowser(() => new FakeObserverPage({ dashboardText: DASHBOARD_TEXT })));

    const result = await runScraper({
      kinds: ['dashboard'],
      sink,
      outputDir: null,
      shard: { group: 2, totalGroups: 2 },
      launch,
      log: new MemoryLogger(),
    });

    expect(result.status).toBe('success');
    expect(result.outcomes.map(outcome => outcome.account.name)).toEqual(['Third']);
  });

  it('runs the sink accounts and records a partial run', async () => {
    upsertAccount(db, { name: 'Good', access_key: 'test-secret', external_user_id: 'user-1' });
    upsertAccount(db, { name: 'Keyless', access_key: '', external_user_id: 'user-2' });
    const browser = new FakeBrowser(() => new FakeObserverPage({ dashboardText: DASHBOARD_TEXT }));
    const launch = vi.fn<LaunchBrowser>().mockResolvedValue(browser);

    const result = await runScraper({
      kinds: ['dashboard'],
      sink,
      outputDir: null,
      maxConcurrent: 1,
      launch,
      log: new MemoryLogger(),
    });

    expect(result.status).toBe('partial');
    expect(result.outcomes.map(outcome => [outcome.account.name, outcome.status])).toEqual([
      ['Good', 'success'],
      ['Keyless', 'failed'],
    ]);
    expect(result.summary).toMatchObject({ attempted: 2, succeeded: 1, failed: 1, records: 1, successRate: 50 });
    expect(launch).toHaveBeenCalledTimes(1);
    expect(browser.closed).toBe(true);

    expect(db.prepare('SELECT account_ref, active_worker_count FROM mining_pool_stats').all()).toEqual([
      { account_ref: 'user-1', active_worker_count: 12 },
    ]);
    expect(db.prepare('SELECT status, attempted, succeeded, failed, records, error FROM scrape_runs').get()).toEqual({
      status: 'partial',
      attempted: 2,
      succeeded: 1,
      failed: 1,
      records: 1,
      error: '1 account(s) failed (missing_credentials: 1)',
    });
    const scraped = db
      .prepare('SELECT account_name FROM account_credentials WHERE last_scraped_at IS NOT NULL')
      .pluck()
      .all();
    expect(scraped).toEqual(['Good']);
  });
});
