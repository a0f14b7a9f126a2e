/**
 * Timeout and attempt budgeting for calls to inference servers
 */

import { InferenceTimeoutError } from '../core/errors.js';

export interface AttemptBudgetConfig {
  // Hard ceiling on attempts per chunk, whatever the cluster size
  attemptCeiling: number;
  // Pause between attempts of the same chunk
  retryDelayMs: number;
}

export const DEFAULT_ATTEMPT_BUDGET: AttemptBudgetConfig = {
  attemptCeiling: 10,
  retryDelayMs: 0,
};

/**
 * Global attempt cap for a chunk: the sum of per-server retry budgets
 * across the servers it may use, bounded by the hard ceiling.
 */
export function computeAttemptCap(
  servers: ReadonlyArray<{ maxRetries: number }>,
  ceiling: number = DEFAULT_ATTEMPT_BUDGET.attemptCeiling
): number {
  const total = servers.reduce((sum, server) => sum + server.maxRetries, 0);
  return Math.max(0, Math.min(total, ceiling));
}

/**
 * Race a promise against a timer. The timer is always cleared so it never
 * keeps the process alive; a late settlement of `promise` is ignored.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  server: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new InferenceTimeoutError(server, timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeoutPromise]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

/**
 * Sleep utility function
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface AttemptErrorLog {
  timestamp: string;
  job_id: string;
  chunk_index: number;
  attempt: number;
  server: string;
  kind: string;
  error: string;
  will_retry: boolean;
  severity: 'MEDIUM' | 'HIGH';
}

/**
 * Create structured error log in JSON format
 */
export function createErrorLog(
  timestamp: Date,
  jobId: string,
  chunkIndex: number,
  attempt: number,
  server: string,
  kind: string,
  error: string,
  willRetry: boolean
): AttemptErrorLog {
  return {
    timestamp: timestamp.toISOString(),
    job_id: jobId,
    chunk_index: chunkIndex,
    attempt,
    server,
    kind,
    error,
    will_retry: willRetry,
    severity: willRetry ? 'MEDIUM' : 'HIGH',
  };
}
