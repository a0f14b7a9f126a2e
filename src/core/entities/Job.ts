/**
 * Job domain entities
 */
export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export type ChunkFailureReason = 'exhausted' | 'no-capacity' | 'cancelled';

export interface ChunkSuccess {
  index: number;
  status: 'succeeded';
  content: string;
  server: string;
  attempts: number;
  latencyMs: number;
}

export interface ChunkFailure {
  index: number;
  status: 'failed';
  reason: ChunkFailureReason;
  error: string;
  attempts: number;
}

/**
 * Outcome of one chunk. A failure marker is never confused with an empty success.
 */
export type ChunkResult = ChunkSuccess | ChunkFailure;

export interface JobSummary {
  observationsCount: number;
  entitiesCount: number;
  processingTimeMs: number;
}

/**
 * Point-in-time view of a job, safe to hand to callers
 */
export interface JobSnapshot {
  id: string;
  label?: string;
  model?: string;
  status: JobStatus;
  total: number;
  completed: number; // succeeded + failed
  succeeded: number;
  failed: number;
  progress: number; // 0-100
  estimatedRemainingMs?: number;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  error?: string;
  summary?: JobSummary;
}

export interface JobSubmitOptions {
  label?: string;
  model?: string;
}

/**
 * How many permanently failed chunks a job may carry and still complete
 */
export interface FailurePolicy {
  // Ratio of total chunks, 0 = any failure fails the job, 1 = never fail on chunk errors
  chunkFailureTolerance: number;
}

export const STRICT_FAILURE_POLICY: FailurePolicy = { chunkFailureTolerance: 0 };
