import { describe, expect, it, vi } from 'vitest';
import { retryWithDelay } from '../retry';

describe('retryWithDelay', () => {
  it('waits delay * attempt between calls and rethrows the last error', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const operation = vi.fn(async (attempt: number) => {
      throw new Error(`failure ${attempt}`);
    });

    await expect(
      retryWithDelay(operation, { attempts: 3, delayMs: 2000, sleep })
    ).rejects.toThrow('failure 3');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
  });

  it('returns as soon as an attempt succeeds', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const onRetry = vi.fn();
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 2) throw new Error('transient');
      return 'ok';
    });

    await expect(
      retryWithDelay(operation, { attempts: 3, delayMs: 10, sleep, onRetry })
    ).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 10);
  });

  it('stops early on errors that must not be retried', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const operation = vi.fn(async () => {
      throw new Error('bad request');
    });

    await expect(
      retryWithDelay(operation, { attempts: 5, delayMs: 10, sleep, shouldRetry: () => false })
    ).rejects.toThrow('bad request');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
