import { describe, expect, it, vi } from 'vitest';
import { isRateLimitError, isResendableError, retryWithBackoff } from '../retry-handler';
import { TransportError } from '../errors';

describe('retryWithBackoff', () => {
  it('doubles the delay between attempts', async () => {
    const sleep = vi.fn(async () => {});
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new TransportError('HTTP 503', { status: 503 }))
      .mockRejectedValueOnce(new TransportError('HTTP 503', { status: 503 }))
      .mockResolvedValueOnce('done');

    await expect(retryWithBackoff(fn, { maxAttempts: 3, delayMs: 100, sleep })).resolves.toBe('done');
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('waits for the Retry-After hint on a rate limit', async () => {
    const sleep = vi.fn(async () => {});
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new TransportError('HTTP 429', { status: 429, retryAfterMs: 5000 }))
      .mockResolvedValueOnce('done');

    await retryWithBackoff(fn, { maxAttempts: 3, delayMs: 100, sleep, shouldRetry: isResendableError });

    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it('rethrows at once when the error is not retryable', async () => {
    const sleep = vi.fn(async () => {});
    const failure = new TransportError('HTTP 401', { status: 401 });
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(failure);

    await expect(
      retryWithBackoff(fn, { maxAttempts: 3, delayMs: 100, sleep, shouldRetry: isResendableError })
    ).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('throws the last error after the final attempt', async () => {
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    await expect(
      retryWithBackoff(fn, { maxAttempts: 2, delayMs: 10, exponentialBackoff: false, sleep: async () => {} })
    ).rejects.toThrow('second');
  });
});

describe('error classification', () => {
  it.each([
    [new TransportError('x', { status: 429 }), true, true],
    [new TransportError('x', { errorCode: 'ECONNREFUSED' }), true, false],
    [new TransportError('x', { errorCode: 'ENOTFOUND' }), true, false],
    [new TransportError('x', { status: 502 }), false, false],
    [new TransportError('x', { errorCode: 'ETIMEDOUT' }), false, false],
    [new TransportError('x', { errorCode: 'ECONNABORTED' }), false, false],
    [new TransportError('x', { status: 404 }), false, false],
    [new Error('x'), false, false],
  ])('classifies %s', (error, resendable, rateLimited) => {
    expect(isResendableError(error)).toBe(resendable);
    expect(isRateLimitError(error)).toBe(rateLimited);
  });
});
