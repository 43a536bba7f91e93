import { describe, expect, it } from 'vitest';
import { buildJobs, runExclusive } from './scheduler.js';

describe('buildJobs', () => {
  it('maps each job to its cron expression and kinds', () => {
    const jobs = buildJobs({
      workers: '0 */3 * * *',
      daily: '0 1 * * *',
      inactive: '*/30 * * * *',
      dailyEarningsDays: 7,
      timezone: 'UTC',
    });

    expect(jobs).toEqual([
      { name: 'workers', cron: '0 */3 * * *', kinds: ['workers'] },
      { name: 'daily', cron: '0 1 * * *', kinds: ['dashboard', 'earnings'], rowLimits: { earnings: 7 } },
      { name: 'inactive', cron: '*/30 * * * *', kinds: ['inactive'] },
    ]);
  });
});

describe('runExclusive', () => {
  it('skips a tick while the same job is still running', async () => {
    let finish: () => void = () => {};
    const first = runExclusive('workers', () => new Promise<void>(resolve => { finish = resolve; }));

    await expect(runExclusive('workers', async () => {})).resolves.toBe(false);
    await expect(runExclusive('daily', async () => {})).resolves.toBe(true);

    finish();
    await expect(first).resolves.toBe(true);
    await expect(runExclusive('workers', async () => {})).resolves.toBe(true);
  });

  it('releases the job after a failure without rethrowing', async () => {
    await expect(runExclusive('inactive', async () => { throw new Error('browser crashed'); })).resolves.toBe(true);
    await expect(runExclusive('inactive', async () => {})).resolves.toBe(true);
  });
});
