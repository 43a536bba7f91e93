import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EmptyTableError, ViewLoadError } from './errors.js';
import { buildKinds } from './kinds.js';
import { scrapeAccount, type PipelineOptions } from './pipeline.js';
import {
  FakeObserverPage,
  FakeTableView,
  makeAccount,
  MemoryLogger,
  MemoryRecordStore,
  workerCells,
} from './testing/fakes.js';

const DASHBOARD_TEXT = `
10-Minute Hashrate
512.3 TH/s
24H Hashrate
498.1 TH/s
Active
12
Inactive
3
Account Balance
0.01234567 BTC
Yesterday Earnings
0.00051234 BTC
Total Earnings
1.2345 BTC
`;

const now = new Date(2026, 0, 5, 9, 7);

let outputDir: string;
let store: MemoryRecordStore;

function options(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  return {
    kinds: ['workers'],
    configs: buildKinds(),
    maxPages: 50,
    settleTimeoutMs: 50,
    settlePollMs: 1,
    viewLoadAttempts: 3,
    retryBackoffMs: 0,
    outputDir,
    store,
    batchSize: 100,
    now: () => now,
    ...overrides,
  };
}

function workersTable(): FakeTableView {
  return new FakeTableView(
    [[
      ['', '#', 'Worker', '10-Minute', '1H', '24H', 'Rejection', 'Last Share', 'Connections'],
      workerCells('rig01'),
      workerCells('rig02', '2 days ago'),
      workerCells('rig03'),
    ]],
    { summary: 'Total 3 items' }
  );
}

beforeEach(() => {
  outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'observer-pipeline-'));
  store = new MemoryRecordStore();
});

afterEach(() => {
  fs.rmSync(outputDir, { recursive: true, force: true });
});

describe('scrapeAccount', () => {
  it('extracts, saves and uploads a table kind', async () => {
    const page = new FakeObserverPage({ tables: { workers: workersTable() } });
    const account = makeAccount();

    const result = await scrapeAccount(page, account, options(), new MemoryLogger());

    const file = path.join(outputDir, '20260105_0907_BTC_workers_user-1.json');
    expect(result).toEqual({
      observedAt: now.toISOString(),
      records: 3,
      kinds: [
        {
          kind: 'workers',
          records: 3,
          rejected: 1,
          pages: 1,
          upload: { succeeded: 3, failed: 0 },
          file,
        },
      ],
    });

    const saved: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    expect(saved).toMatchObject([
      { worker_id: 'rig01', status: 'active', account_ref: 'user-1', observed_at: now.toISOString() },
      { worker_id: 'rig02', status: 'inactive' },
      { worker_id: 'rig03', status: 'active' },
    ]);
    expect(store.rows('mining_workers').map(row => row.worker_id)).toEqual(['rig01', 'rig02', 'rig03']);
    expect(page.screenshots).toEqual([path.join(outputDir, '20260105_0907_BTC_workers_user-1.png')]);
    expect(page.overlayDismissals).toBe(1);
  });

  it('retries the view load and succeeds on the third attempt', async () => {
    const page = new FakeObserverPage({ tables: { workers: workersTable() }, openFailures: 2 });
    const result = await scrapeAccount(page, makeAccount(), options(), new MemoryLogger());

    expect(page.opened).toEqual(['workers:user-1', 'workers:user-1', 'workers:user-1']);
    expect(result.records).toBe(3);
  });

  it('fails with ViewLoadError once every attempt is used', async () => {
    const page = new FakeObserverPage({ openFailures: 3 });
    const failure = scrapeAccount(page, makeAccount(), options(), new MemoryLogger());

    await expect(failure).rejects.toBeInstanceOf(ViewLoadError);
    await expect(failure).rejects.toHaveProperty('attempts', 3);
    expect(page.opened).toHaveLength(3);
  });

  it('reads the dashboard into one pool stats row', async () => {
    const page = new FakeObserverPage({ dashboardText: DASHBOARD_TEXT });
    const result = await scrapeAccount(page, makeAccount(), options({ kinds: ['dashboard'] }), new MemoryLogger());

    expect(result.records).toBe(1);
    expect(store.rows('mining_pool_stats')).toEqual([
      {
        ten_min_hashrate: '512.3 TH/s',
        day_hashrate: '498.1 TH/s',
        active_worker_count: 12,
        inactive_worker_count: 3,
        account_balance: '0.01234567',
        yesterday_earnings: '0.00051234',
        total_earnings: '1.2345',
        account_ref: 'user-1',
        coin_type: 'BTC',
        observed_at: now.toISOString(),
      },
    ]);
  });

  it('treats a dashboard with no recognisable field as no data', async () => {
    const page = new FakeObserverPage({ dashboardText: 'Loading...' });
    await expect(
      scrapeAccount(page, makeAccount(), options({ kinds: ['dashboard'] }), new MemoryLogger())
    ).rejects.toBeInstanceOf(EmptyTableError);
  });

  it('runs each kind of a daily visit in order on the same page', async () => {
    const earnings = new FakeTableView([[['2026-01-04', '105.2 TH/s', '0.00051234 BTC', 'PPS+', 'Paid']]]);
    const page = new FakeObserverPage({ dashboardText: DASHBOARD_TEXT, tables: { earnings } });

    const result = await scrapeAccount(
      page,
      makeAccount(),
      options({ kinds: ['dashboard', 'earnings'] }),
      new MemoryLogger()
    );

    expect(page.opened).toEqual(['dashboard:user-1', 'earnings:user-1']);
    expect(result.kinds.map(kind => [kind.kind, kind.records])).toEqual([
      ['dashboard', 1],
      ['earnings', 1],
    ]);
    expect(store.rows('mining_earnings')[0]).toMatchObject({ earnings_amount: '0.00051234', earnings_currency: 'BTC' });
  });

  it('reads only the newest earnings rows when the kind has a row limit', async () => {
    const days = Array.from({ length: 10 }, (_, i) => [
      `2026-01-${String(10 - i).padStart(2, '0')}`,
      '100 TH/s',
      '0.0005 BTC',
      'PPS+',
      'Paid',
    ]);
    const page = new FakeObserverPage({ tables: { earnings: new FakeTableView([days]) } });

    const result = await scrapeAccount(
      page,
      makeAccount(),
      options({ kinds: ['earnings'], rowLimits: { earnings: 7 } }),
      new MemoryLogger()
    );

    expect(result.records).toBe(7);
    expect(store.rows('mining_earnings').map(row => row.date)).toEqual([
      '2026-01-10',
      '2026-01-09',
      '2026-01-08',
      '2026-01-07',
      '2026-01-06',
      '2026-01-05',
      '2026-01-04',
    ]);
  });

  it('writes nothing and uploads nothing without an output dir or a sink', async () => {
    const page = new FakeObserverPage({ tables: { workers: workersTable() } });
    const result = await scrapeAccount(
      page,
      makeAccount(),
      options({ outputDir: null, store: null }),
      new MemoryLogger()
    );

    expect(result.kinds[0]).toMatchObject({ records: 3, upload: null, file: null });
    expect(page.screenshots).toEqual([]);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });

  it('keeps the account alive when the screenshot fails', async () => {
    const page = new FakeObserverPage({ tables: { workers: workersTable() }, screenshotFails: true });
    const log = new MemoryLogger();
    const result = await scrapeAccount(page, makeAccount(), options(), log);

    expect(result.records).toBe(3);
    expect(log.messages('warn')).toEqual(['Screenshot failed: Target page has been closed']);
  });
});
