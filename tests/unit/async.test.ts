import { describe, expect, it } from 'vitest';
import { callWithTimeout, withRetry } from '../../src/utils/async.js';
import { ModelUnavailableError, PipelineTimeoutError } from '../../src/utils/errors.js';

const never = (signal: AbortSignal): Promise<string> =>
  new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

describe('callWithTimeout', () => {
  it('returns the call result', async () => {
    await expect(callWithTimeout(async () => 'ok', { timeoutMs: 100, label: 'fake' })).resolves.toBe('ok');
  });

  it('turns a call timeout into ModelUnavailableError', async () => {
    const pending = callWithTimeout(never, { timeoutMs: 10, label: 'fake model' });

    await expect(pending).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(pending).rejects.toThrow('fake model timed out after 10ms');
  });

  it('surfaces an aborted request signal as its timeout error', async () => {
    const controller = new AbortController();
    const reason = new PipelineTimeoutError('Request exceeded 50ms');
    const pending = callWithTimeout(never, { timeoutMs: 1000, signal: controller.signal, label: 'fake' });

    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });

  it('wraps a plain cancellation in PipelineTimeoutError', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      callWithTimeout(never, { timeoutMs: 1000, signal: controller.signal, label: 'fake' })
    ).rejects.toThrow('Request was cancelled');
  });
});

describe('withRetry', () => {
  it('retries until success within the retry budget', async () => {
    const attempts: number[] = [];

    const result = await withRetry(
      async attempt => {
        attempts.push(attempt);
        if (attempt === 0) {
          throw new Error('flaky');
        }
        return 'done';
      },
      { retries: 1, initialDelayMs: 0 }
    );

    expect(result).toBe('done');
    expect(attempts).toEqual([0, 1]);
  });

  it('stops when shouldRetry rejects the error', async () => {
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new Error('fatal');
        },
        { retries: 3, initialDelayMs: 0, shouldRetry: () => false }
      )
    ).rejects.toThrow('fatal');
    expect(calls).toBe(1);
  });

  it('gives up after the last retry', async () => {
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new Error(`failure ${calls}`);
        },
        { retries: 2, initialDelayMs: 0 }
      )
    ).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
  });
});
