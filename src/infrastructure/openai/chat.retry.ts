import { setTimeout as sleep } from 'timers/promises';

import { logger } from '@utils/logger.js';

export interface RetryOptions {
  retries?: number;
  base?: number;
  max?: number;
  /** Aborting stops further attempts and cancels a pending backoff. */
  signal?: AbortSignal;
  label?: string;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 1, base = 250, max = 2000, signal, label = 'openai' } = options;
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= retries) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt >= retries || signal?.aborted || !shouldRetry(error)) {
        throw error;
      }

      const delay = computeDelay(attempt, base, max);
      logger.warn(`[${label}] retrying after error`, { attempt: attempt + 1, delay, status: extractStatus(error) });
      await sleep(delay, undefined, { signal });
      attempt += 1;
    }
  }

  throw lastError instanceof Error ? lastError : new Error('Retry operation failed');
}

function computeDelay(attempt: number, base: number, max: number): number {
  const exponential = base * 2 ** attempt;
  const capped = Math.min(max, exponential);
  const jitter = capped / 2 + Math.random() * (capped / 2);
  return Math.max(base, Math.min(max, Math.round(jitter)));
}

export function shouldRetry(error: unknown): boolean {
  const status = extractStatus(error);
  if (status === null) return false;
  return status === 408 || status === 429 || status >= 500;
}

function extractStatus(error: unknown): number | null {
  if (!error || typeof error !== 'object') {
    return null;
  }

  const candidates: unknown[] = [];
  if ('status' in error) candidates.push(error.status);
  if ('response' in error && error.response && typeof error.response === 'object' && 'status' in error.response) {
    candidates.push(error.response.status);
  }

  for (const candidate of candidates) {
    if (typeof candidate === 'number' && Number.isFinite(candidate)) return candidate;
    if (typeof candidate === 'string') {
      const parsed = Number.parseInt(candidate, 10);
      if (!Number.isNaN(parsed)) return parsed;
    }
  }
  return null;
}
