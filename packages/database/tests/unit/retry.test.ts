import { describe, it, expect, vi, afterEach } from 'vitest';
import { withRetry } from '../../src/retry/index';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const operation = vi.fn().mockResolvedValue('connected');

    expect(await withRetry(operation)).toBe('connected');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should retry until the operation succeeds', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error('ECONNREFUSED'))
      .mockRejectedValueOnce(new Error('ECONNREFUSED'))
      .mockResolvedValueOnce('connected');

    const result = await withRetry(operation, { initialDelayMs: 1, maxDelayMs: 2 });

    expect(result).toBe('connected');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(console.warn).toHaveBeenNthCalledWith(
      1,
      'Operation failed (attempt 1/3). Retrying in 1ms...',
      'ECONNREFUSED'
    );
    expect(console.warn).toHaveBeenNthCalledWith(
      2,
      'Operation failed (attempt 2/3). Retrying in 2ms...',
      'ECONNREFUSED'
    );
  });

  it('should rethrow the last error after maxRetries', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const operation = vi.fn().mockRejectedValue(new Error('still down'));

    await expect(withRetry(operation, { maxRetries: 2, initialDelayMs: 1 })).rejects.toThrow('still down');
    expect(operation).toHaveBeenCalledTimes(3);
  });
});
