/**
 * RETRY UTILITIES TESTS
 * =====================
 */

import { withRetry } from '../src/utils/retry';
import { ApiError, NetworkError } from '../src/utils/errors';

describe('withRetry', () => {
  const noSleep = async (): Promise<void> => undefined;

  it('returns the result without retrying on success', async () => {
    const fn = jest.fn(async () => 'success');

    await expect(withRetry(fn, { sleep: noSleep })).resolves.toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries a transient failure until it succeeds', async () => {
    let attempts = 0;
    const fn = async () => {
      attempts++;
      if (attempts < 3) throw new NetworkError('socket hang up');
      return 'success';
    };

    await expect(withRetry(fn, { maxRetries: 2, sleep: noSleep })).resolves.toBe('success');
    expect(attempts).toBe(3);
  });

  it('throws the last error after the retries run out', async () => {
    const fn = jest.fn(async () => {
      throw new ApiError('API_ERROR: 503 Service Unavailable', 503);
    });

    await expect(withRetry(fn, { maxRetries: 2, sleep: noSleep })).rejects.toThrow('API_ERROR: 503 Service Unavailable');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors or malformed payloads', async () => {
    const badRequest = jest.fn(async () => {
      throw new ApiError('API_ERROR: 400 Bad Request', 400);
    });
    const malformed = jest.fn(async () => {
      throw new ApiError('Unexpected userFills payload: expected an array');
    });

    await expect(withRetry(badRequest, { sleep: noSleep })).rejects.toBeInstanceOf(ApiError);
    await expect(withRetry(malformed, { sleep: noSleep })).rejects.toBeInstanceOf(ApiError);
    expect(badRequest).toHaveBeenCalledTimes(1);
    expect(malformed).toHaveBeenCalledTimes(1);
  });

  it('retries rate limiting', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new ApiError('RATE_LIMITED: Too many requests', 429))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { sleep: noSleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('backs off exponentially up to the cap', async () => {
    const delays: number[] = [];
    const fn = async (): Promise<string> => {
      throw new NetworkError('timed out');
    };

    await expect(
      withRetry(fn, {
        maxRetries: 4,
        initialDelayMs: 500,
        maxDelayMs: 2000,
        sleep: async (ms) => {
          delays.push(ms);
        },
      }),
    ).rejects.toBeInstanceOf(NetworkError);

    expect(delays).toEqual([500, 1000, 2000, 2000]);
  });

  it('reports each retry', async () => {
    const seen: Array<[number, number]> = [];
    const fn = jest
      .fn<Promise<number>, []>()
      .mockRejectedValueOnce(new NetworkError('reset'))
      .mockResolvedValueOnce(42);

    await withRetry(fn, {
      initialDelayMs: 10,
      sleep: noSleep,
      onRetry: (_error, attempt, delayMs) => seen.push([attempt, delayMs]),
    });

    expect(seen).toEqual([[1, 10]]);
  });

  it('honours a custom retry predicate', async () => {
    const fn = jest.fn(async () => {
      throw new Error('always');
    });

    await expect(withRetry(fn, { maxRetries: 1, retryIf: () => true, sleep: noSleep })).rejects.toThrow('always');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
