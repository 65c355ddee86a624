import { setTimeout as sleep } from 'timers/promises';
import { ModelUnavailableError, PipelineTimeoutError } from './errors.js';

export interface RetryOptions {
  retries?: number;
  initialDelayMs?: number;
  factor?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  signal?: AbortSignal;
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 1, initialDelayMs = 250, factor = 2, shouldRetry = () => true, onRetry, signal } = options;
  let attempt = 0;
  let delay = initialDelayMs;
  while (true) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= retries || !shouldRetry(error) || signal?.aborted) {
        throw error;
      }
      onRetry?.(error, attempt + 1);
      if (delay > 0) {
        await sleep(delay, undefined, { signal });
      }
      delay *= factor;
      attempt += 1;
    }
  }
}

/** Settles with the promise, or rejects with the signal's reason once it aborts. */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export function deadlineError(signal: AbortSignal): PipelineTimeoutError {
  return signal.reason instanceof PipelineTimeoutError
    ? signal.reason
    : new PipelineTimeoutError('Request was cancelled', signal.reason);
}

/**
 * Runs one model call under its own timeout, nested inside the request signal.
 * A call timeout surfaces as ModelUnavailableError (retryable); an aborted
 * request surfaces as PipelineTimeoutError (terminal).
 */
export async function callWithTimeout<T>(
  call: (signal: AbortSignal) => Promise<T>,
  options: { timeoutMs: number; signal?: AbortSignal; label: string }
): Promise<T> {
  const callTimeout = AbortSignal.timeout(options.timeoutMs);
  const callSignal = options.signal ? AbortSignal.any([options.signal, callTimeout]) : callTimeout;

  try {
    return await abortable(call(callSignal), callSignal);
  } catch (error) {
    if (options.signal?.aborted) {
      throw deadlineError(options.signal);
    }
    if (callTimeout.aborted) {
      throw new ModelUnavailableError(`${options.label} timed out after ${options.timeoutMs}ms`);
    }
    throw error;
  }
}

export const isTransient = (error: unknown): boolean => error instanceof ModelUnavailableError;
