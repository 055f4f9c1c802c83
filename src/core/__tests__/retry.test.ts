import { describe, it, expect, jest } from '@jest/globals';
import { RetryPolicy } from '../retry.js';
import { DocsnapError, ErrorCode } from '../errors.js';

describe('RetryPolicy', () => {
  const noWait = () => jest.fn((_ms: number) => Promise.resolve());

  it('returns the first successful result', async () => {
    const wait = noWait();
    const fn = jest.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce('ok');

    const result = await new RetryPolicy({ maxAttempts: 3, delayMs: 250 }, undefined, wait).execute('op', fn);

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls).toEqual([[250], [250]]);
  });

  it('rethrows the last error once attempts run out', async () => {
    const wait = noWait();
    const fn = jest.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    await expect(
      new RetryPolicy({ maxAttempts: 2, delayMs: 0 }, undefined, wait).execute('op', fn)
    ).rejects.toThrow('second');
    expect(wait).toHaveBeenCalledTimes(1);
  });

  it('does not retry a non-retryable error', async () => {
    const error = new DocsnapError(ErrorCode.BROWSER_NOT_FOUND, 'No supported browser found');
    const fn = jest.fn<() => Promise<string>>().mockRejectedValue(error);

    await expect(
      new RetryPolicy({ maxAttempts: 5, delayMs: 0 }, undefined, noWait()).execute('op', fn)
    ).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries a retryable DocsnapError', async () => {
    const fn = jest.fn<() => Promise<number>>()
      .mockRejectedValueOnce(new DocsnapError(ErrorCode.SESSION_LAUNCH_FAILED, 'crashed', true))
      .mockResolvedValueOnce(7);

    await expect(
      new RetryPolicy({ maxAttempts: 2, delayMs: 0 }, undefined, noWait()).execute('op', fn)
    ).resolves.toBe(7);
  });

  it('always makes at least one attempt', () => {
    const policy = new RetryPolicy({ maxAttempts: 0, delayMs: -5 });
    expect(policy.maxAttempts).toBe(1);
    expect(policy.delayMs).toBe(0);
  });
});
