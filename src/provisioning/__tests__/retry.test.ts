import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PermanentProviderError, TransientProviderError } from '../../errors';
import { Logger } from '../../types';
import { backoffDelay, retryWithBackoff } from '../retry';

describe('retryWithBackoff', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = { log: vi.fn(), warn: vi.fn() };
  });

  it('should return the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(retryWithBackoff(fn, { logger })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should retry a transient failure and log the attempt', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new TransientProviderError('throttled'))
      .mockResolvedValueOnce('ok');

    const result = await retryWithBackoff(fn, { baseDelayMs: 0, logger });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      '[operation] Attempt 1/3 failed (TransientProviderError). Retrying in 0ms...'
    );
  });

  it('should rethrow a non-retryable error unchanged', async () => {
    const error = new PermanentProviderError('access denied');
    const fn = vi.fn().mockRejectedValue(error);

    await expect(retryWithBackoff(fn, { baseDelayMs: 0, logger })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should escalate after the last attempt', async () => {
    const cause = new TransientProviderError('still throttled');
    const fn = vi.fn().mockRejectedValue(cause);

    const error = await retryWithBackoff(fn, { baseDelayMs: 0, label: 'createTable', logger })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PermanentProviderError);
    expect(error).toHaveProperty('message', 'createTable still failing after 3 attempts: still throttled');
    expect(error).toHaveProperty('cause', cause);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('should honour a custom retry predicate and attempt count', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('flaky'));

    await expect(retryWithBackoff(fn, {
      maxAttempts: 5,
      baseDelayMs: 0,
      retryIf: () => true,
      logger
    })).rejects.toThrow('operation still failing after 5 attempts: flaky');
    expect(fn).toHaveBeenCalledTimes(5);
  });
});

describe('backoffDelay', () => {
  it('should double the delay per attempt without jitter', () => {
    expect(backoffDelay(1, 1000, 30_000, 0)).toBe(1000);
    expect(backoffDelay(2, 1000, 30_000, 0)).toBe(2000);
    expect(backoffDelay(3, 1000, 30_000, 0)).toBe(4000);
  });

  it('should cap the delay', () => {
    expect(backoffDelay(10, 1000, 30_000, 0)).toBe(30_000);
  });

  it('should add jitter proportional to the delay', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);

    expect(backoffDelay(2, 1000, 30_000, 0.2)).toBe(2200);
  });
});
