import { describe, expect, it } from 'vitest';
import { orderAccounts, uploadRecords } from './sink.js';
import { makeAccount, MemoryLogger, MemoryRecordStore } from './testing/fakes.js';
import type { SinkRow } from './types.js';

function rows(count: number): SinkRow[] {
  return Array.from({ length: count }, (_, n) => ({ worker_id: `rig${n}`, n }));
}

describe('uploadRecords', () => {
  it('falls back to single inserts for the failed batch only', async () => {
    const store = new MemoryRecordStore({
      failBatch: call => call === 3,
      failRow: row => typeof row.n === 'number' && row.n % 10 === 0,
    });

    const result = await uploadRecords(store, 'mining_workers', rows(250), 100, new MemoryLogger());

    // rows 0-199 go through in two batches; rows 200-249 one by one, 200/210/220/230/240 refused
    expect(store.insertManyCalls).toBe(3);
    expect(store.insertOneCalls).toBe(50);
    expect(result).toEqual({ succeeded: 245, failed: 5 });
    expect(store.rows('mining_workers')).toHaveLength(245);
  });

  it('sends every batch once when nothing fails', async () => {
    const store = new MemoryRecordStore();
    const result = await uploadRecords(store, 'mining_earnings', rows(250), 100, new MemoryLogger());

    expect(result).toEqual({ succeeded: 250, failed: 0 });
    expect(store.insertManyCalls).toBe(3);
    expect(store.insertOneCalls).toBe(0);
  });

  it('counts every row exactly once when all single inserts fail too', async () => {
    const store = new MemoryRecordStore({ failBatch: () => true, failRow: () => true });
    const result = await uploadRecords(store, 'mining_workers', rows(7), 3, new MemoryLogger());

    expect(result).toEqual({ succeeded: 0, failed: 7 });
    expect(store.insertManyCalls).toBe(3);
    expect(store.insertOneCalls).toBe(7);
  });

  it('does nothing for an empty list', async () => {
    const store = new MemoryRecordStore();
    await expect(uploadRecords(store, 'mining_workers', [], 100, new MemoryLogger())).resolves.toEqual({
      succeeded: 0,
      failed: 0,
    });
    expect(store.insertManyCalls).toBe(0);
  });

  it('treats a batch size below one as one', async () => {
    const store = new MemoryRecordStore();
    await uploadRecords(store, 'mining_workers', rows(3), 0, new MemoryLogger());
    expect(store.insertManyCalls).toBe(3);
  });

  it('logs the failed batch by its row range', async () => {
    const store = new MemoryRecordStore({ failBatch: call => call === 2 });
    const log = new MemoryLogger();
    await uploadRecords(store, 'mining_workers', rows(5), 2, log);

    expect(log.messages('warn')).toEqual([
      'Batch insert of mining_workers rows 3-4 failed, inserting one by one: batch rejected',
    ]);
  });
});

describe('orderAccounts', () => {
  it('puts priority first, then never-scraped, then the oldest scrape', () => {
    const accounts = [
      makeAccount({ id: 'recent', last_scraped_at: '2026-01-03T00:00:00.000Z' }),
      makeAccount({ id: 'old', last_scraped_at: '2026-01-01T00:00:00.000Z' }),
      makeAccount({ id: 'never' }),
      makeAccount({ id: 'vip', priority: 5, last_scraped_at: '2026-01-04T00:00:00.000Z' }),
    ];

    expect(orderAccounts(accounts).map(account => account.id)).toEqual(['vip', 'never', 'old', 'recent']);
    expect(accounts[0].id).toBe('recent');
  });
});
