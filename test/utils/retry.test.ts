import { describe, expect, it, vi } from 'vitest';
import { OrderRejectedError } from '../../src/strategies/gridCycle/errors';
import { formatError } from '../../src/utils/formatError';
import { retry } from '../../src/utils/retry';

describe('retry', () => {
  it('retries until the operation succeeds', async () => {
    const operation = vi
      .fn(async () => 'ok')
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));
    const onRetry = vi.fn();
    await expect(retry(operation, { attempts: 3, delayMs: 0, onRetry })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([, attempt]) => attempt)).toEqual([1, 2]);
  });

  it('gives up after the last attempt or when told not to retry', async () => {
    const failing = vi.fn(async () => {
      throw new Error('down');
    });
    await expect(retry(failing, { attempts: 2, delayMs: 0 })).rejects.toThrow('down');
    expect(failing).toHaveBeenCalledTimes(2);

    failing.mockClear();
    await expect(retry(failing, { attempts: 5, delayMs: 0, shouldRetry: () => false })).rejects.toThrow('down');
    expect(failing).toHaveBeenCalledTimes(1);
  });

  it('uses the wait the failure asks for, capped at the maximum delay', async () => {
    const operation = vi
      .fn(async () => 'ok')
      .mockRejectedValueOnce(new Error('slow down'))
      .mockRejectedValueOnce(new Error('down'));
    const onRetry = vi.fn();
    const retryAfterMs = vi.fn((error: unknown) => (error instanceof Error && error.message === 'slow down' ? 60_000 : undefined));
    await expect(
      retry(operation, { attempts: 3, delayMs: 0, maxDelayMs: 0, retryAfterMs, onRetry })
    ).resolves.toBe('ok');
    expect(onRetry.mock.calls.map(([, attempt, waitMs]) => [attempt, waitMs])).toEqual([
      [1, 0],
      [2, 0],
    ]);
    expect(retryAfterMs).toHaveBeenCalledTimes(2);
  });
});

describe('formatError', () => {
  it('keeps the name, message and code of errors', () => {
    const error = Object.assign(new Error('refused'), { code: 'ECONNREFUSED' });
    expect(formatError(error)).toMatchObject({ name: 'Error', message: 'refused', code: 'ECONNREFUSED' });
    expect(formatError({ reason: 'x' })).toEqual({ reason: 'x' });
    expect(formatError('plain')).toEqual({ message: 'plain' });
  });

  it('keeps engine error details and HTTP status', () => {
    const rejected = formatError(new OrderRejectedError('invalid_stop_price', { price: 1999.2 }));
    expect(rejected).toMatchObject({
      name: 'OrderRejectedError',
      message: 'invalid_stop_price',
      code: 'order_rejected',
      details: { price: 1999.2 },
    });

    const http = Object.assign(new Error('Request failed with status code 502'), {
      isAxiosError: true,
      response: { status: 502 },
    });
    expect(formatError(http)).toEqual({ name: 'Error', message: 'Request failed with status code 502', status: 502 });
  });
});
