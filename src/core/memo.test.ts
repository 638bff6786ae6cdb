import { describe, expect, it, vi } from 'vitest';

import { createAsyncMemo } from './memo.js';

describe('createAsyncMemo', () => {
  it('builds the value once for concurrent callers', async () => {
    const factory = vi.fn(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return { id: 'client' };
    });
    const memo = createAsyncMemo(factory);

    const [a, b, c] = await Promise.all([memo.get(), memo.get(), memo.get()]);

    expect(factory).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
    expect(b).toBe(c);
    expect(memo.isInitialized()).toBe(true);
  });

  it('retries after a failed build', async () => {
    const factory = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce('ready');
    const memo = createAsyncMemo(factory);

    await expect(memo.get()).rejects.toThrow('boom');
    expect(memo.isInitialized()).toBe(false);

    await expect(memo.get()).resolves.toBe('ready');
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('rebuilds after reset', async () => {
    let counter = 0;
    const memo = createAsyncMemo(() => Promise.resolve(++counter));

    expect(await memo.get()).toBe(1);
    expect(await memo.get()).toBe(1);

    memo.reset();
    expect(memo.isInitialized()).toBe(false);
    expect(await memo.get()).toBe(2);
  });
});
