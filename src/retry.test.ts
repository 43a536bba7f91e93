import { afterEach, describe, expect, it, vi } from 'vitest';
import { ViewLoadError } from './errors.js';
import { loadWithRetry } from './retry.js';
import { MemoryLogger } from './testing/fakes.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('loadWithRetry', () => {
  it('returns the first successful load', async () => {
    const load = vi.fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('net::ERR_TIMED_OUT'))
      .mockResolvedValue('table');

    await expect(loadWithRetry(load, { attempts: 3, backoffMs: 0, log: new MemoryLogger() })).resolves.toBe('table');
    expect(load.mock.calls).toEqual([[1], [2]]);
  });

  it('gives up with a ViewLoadError carrying the last cause', async () => {
    const last = new Error('selector never appeared');
    const load = vi.fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockRejectedValueOnce(last);
    const log = new MemoryLogger();

    const error = await loadWithRetry(load, { attempts: 3, backoffMs: 0, log }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ViewLoadError);
    if (!(error instanceof ViewLoadError)) return;
    expect(error.attempts).toBe(3);
    expect(error.cause).toBe(last);
    expect(error.message).toBe('View failed to load after 3 attempt(s): selector never appeared');
    expect(log.messages('warn')).toEqual([
      'View load attempt 1/3 failed: first',
      'View load attempt 2/3 failed: second',
      'View load attempt 3/3 failed: selector never appeared',
    ]);
  });

  it('waits the fixed backoff between attempts', async () => {
    vi.useFakeTimers();
    const load = vi.fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValue('table');

    const result = loadWithRetry(load, { attempts: 3, backoffMs: 2000, log: new MemoryLogger() });

    await vi.advanceTimersByTimeAsync(1999);
    expect(load).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(load).toHaveBeenCalledTimes(2);
    await expect(result).resolves.toBe('table');
  });

  it('always makes at least one attempt', async () => {
    const load = vi.fn<(attempt: number) => Promise<string>>().mockResolvedValue('table');
    await expect(loadWithRetry(load, { attempts: 0, backoffMs: 0, log: new MemoryLogger() })).resolves.toBe('table');
    expect(load).toHaveBeenCalledTimes(1);
  });
});
