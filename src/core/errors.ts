/**
 * Error taxonomy shared by the dispatch layer
 */

export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InferenceTimeoutError extends Error {
  constructor(public readonly server: string, public readonly timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms on ${server}`);
    this.name = 'InferenceTimeoutError';
  }
}

export class InferenceRequestError extends Error {
  constructor(
    public readonly server: string,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'InferenceRequestError';
  }
}

export class ModelUnavailableError extends Error {
  constructor(public readonly server: string, public readonly model: string) {
    super(`Model ${model} is not available on ${server}`);
    this.name = 'ModelUnavailableError';
  }
}

export class NoActiveServersError extends Error {
  constructor(public readonly model?: string) {
    super(model ? `No active inference servers available for model ${model}` : 'No active inference servers available');
    this.name = 'NoActiveServersError';
  }
}

export class JobNotFoundError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job not found: ${jobId}`);
    this.name = 'JobNotFoundError';
  }
}

export type ErrorKind = 'timeout' | 'network' | 'server' | 'capability' | 'unknown';

const NETWORK_PATTERNS = [
  'econnrefused',
  'econnreset',
  'enotfound',
  'ehostunreach',
  'socket hang up',
  'network',
  'connection refused',
];

/**
 * Classify a thrown value for logging. Every kind counts as an attempt failure.
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof InferenceTimeoutError) return 'timeout';
  if (error instanceof ModelUnavailableError) return 'capability';
  if (error instanceof InferenceRequestError) {
    return error.status !== undefined ? 'server' : 'network';
  }

  const message = errorMessage(error).toLowerCase();
  if (message.includes('timeout') || message.includes('timed out')) return 'timeout';
  if (NETWORK_PATTERNS.some((pattern) => message.includes(pattern))) return 'network';
  return 'unknown';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
