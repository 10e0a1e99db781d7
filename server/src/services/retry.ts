import { describeError, errorStatus } from '../errors.js';

export interface RetryOptions {
  label: string;
  maxRetries?: number;
  baseDelayMs?: number;
}

function isRetryable(err: unknown): boolean {
  const status = errorStatus(err);
  if (status === 429 || (status !== undefined && status >= 500)) return true;
  const message = describeError(err);
  return message.includes('429') || message.includes('RESOURCE_EXHAUSTED');
}

/** Retry with exponential backoff for API rate limits and transient errors */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const maxRetries = options.maxRetries ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 1000;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxRetries || !isRetryable(err)) throw err;
      const delay = Math.pow(2, attempt) * baseDelayMs + Math.random() * 1000;
      console.warn(
        `${options.label} retry ${attempt + 1}/${maxRetries} after ${Math.round(delay)}ms (${errorStatus(err) ?? describeError(err).slice(0, 60)})`,
      );
      await new Promise(r => setTimeout(r, delay));
    }
  }
}
