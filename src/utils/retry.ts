import { logger } from './logger.js';

export class NonRetryableError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'NonRetryableError';
  }
}

/**
 * Failure reported by an external provider. `transient` marks failures worth
 * another attempt (network errors, 408/429, 5xx).
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly transient: boolean,
    public readonly status?: number,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/** Default classification: provider errors by flag, fetch network failures as transient. */
export function isTransientError(err: unknown): boolean {
  if (err instanceof NonRetryableError) return false;
  if (err instanceof ProviderError) return err.transient;
  if (err instanceof Error && err.name === 'AbortError') return false;
  // undici reports connection failures as TypeError('fetch failed')
  return err instanceof TypeError;
}

interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
  signal?: AbortSignal;
  label?: string;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs = 1_000, backoffFactor = 2,
    isRetryable = isTransientError, onRetry, signal, label = 'operation' } = opts;
  let lastErr: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal?.throwIfAborted();
    try { return await fn(attempt); }
    catch (err) {
      lastErr = err;
      if (signal?.aborted || !isRetryable(err) || attempt === maxAttempts) throw err;
      const delay = baseDelayMs * Math.pow(backoffFactor, attempt - 1);
      logger.warn(`Retry ${attempt}/${maxAttempts} for ${label} in ${delay}ms`, { error: String(err) });
      onRetry?.(attempt, err);
      await sleep(delay, signal);
    }
  }
  throw lastErr;
}
