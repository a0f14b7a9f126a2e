import { randomUUID } from 'crypto';
import {
  ChunkResult,
  FailurePolicy,
  JobSnapshot,
  JobStatus,
  JobSubmitOptions,
  JobSummary,
  STRICT_FAILURE_POLICY,
  TERMINAL_STATUSES,
} from '../../core/entities/Job.js';
import { summarizeObservations } from '../../core/entities/Observation.js';
import { createLogger, Logger } from '../../utils/logger.js';

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['processing', 'cancelled', 'failed'],
  processing: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

interface JobRecord {
  id: string;
  label?: string;
  model?: string;
  status: JobStatus;
  total: number;
  succeeded: number;
  failed: number;
  results: Array<ChunkResult | undefined>;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  error?: string;
  summary?: JobSummary;
  // Final snapshot, fixed at the terminal transition
  frozen?: Readonly<JobSnapshot>;
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Owns the lifecycle and progress counters of every job.
 *
 * Each chunk result is folded in by one synchronous call that updates the
 * result slot and the counters together, so a snapshot never sees half of an
 * update. Status only moves forward; terminal jobs answer with the snapshot
 * taken when they finished.
 */
export class JobTracker {
  private jobs: Map<string, JobRecord> = new Map();
  private updateCallbacks: Array<(snapshot: JobSnapshot) => void> = [];
  private readonly logger: Logger;

  constructor(private policy: FailurePolicy = STRICT_FAILURE_POLICY, logger?: Logger) {
    if (policy.chunkFailureTolerance < 0 || policy.chunkFailureTolerance > 1) {
      throw new Error(`chunkFailureTolerance must be within [0, 1], got ${policy.chunkFailureTolerance}`);
    }
    this.logger = logger ?? createLogger('JobTracker');
  }

  /**
   * Register a new job in the queued state
   */
  create(total: number, options: JobSubmitOptions = {}): string {
    if (!Number.isInteger(total) || total < 0) {
      throw new Error(`Invalid chunk count: ${total}`);
    }

    const id = randomUUID();
    this.jobs.set(id, {
      id,
      label: options.label,
      model: options.model,
      status: 'queued',
      total,
      succeeded: 0,
      failed: 0,
      results: new Array(total),
      createdAt: new Date(),
    });
    this.emit(id);
    return id;
  }

  markProcessing(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || !this.transition(job, 'processing')) return false;

    job.startedAt = new Date();
    this.emit(jobId);
    return true;
  }

  /**
   * Fold one chunk result into the job. A chunk is counted at most once.
   */
  recordChunk(jobId: string, result: ChunkResult): boolean {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'processing') return false;
    if (!this.store(job, result)) return false;

    this.emit(jobId);
    return true;
  }

  /**
   * Close a job whose chunks have all resolved, applying the failure policy
   */
  finalize(jobId: string, results: ChunkResult[] = []): JobStatus | null {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'processing') return job?.status ?? null;

    for (const result of results) {
      this.store(job, result);
    }

    const resolved = job.succeeded + job.failed;
    let status: JobStatus;
    if (resolved < job.total) {
      status = 'failed';
      job.error = `${job.total - resolved} of ${job.total} chunks never resolved`;
    } else if (this.withinTolerance(job)) {
      status = 'completed';
    } else {
      status = 'failed';
      job.error = `${job.failed}/${job.total} chunks failed permanently`;
    }

    this.finish(job, status);
    return status;
  }

  /**
   * Abort a job on an unrecoverable condition
   */
  fail(jobId: string, error: string, results: ChunkResult[] = []): boolean {
    const job = this.jobs.get(jobId);
    if (!job || isTerminal(job.status)) return false;

    for (const result of results) {
      this.store(job, result);
    }
    job.error = error;
    return this.finish(job, 'failed');
  }

  /**
   * Close a job on the caller's request, folding in whatever resolved first.
   * Chunks still without an outcome get a `cancelled` marker.
   */
  cancel(jobId: string, results: ChunkResult[] = []): boolean {
    const job = this.jobs.get(jobId);
    if (!job || isTerminal(job.status)) return false;

    for (const result of results) {
      this.store(job, result);
    }
    for (let index = 0; index < job.total; index++) {
      if (job.results[index]) continue;
      this.store(job, {
        index,
        status: 'failed',
        reason: 'cancelled',
        error: 'Job cancelled before this chunk was dispatched',
        attempts: 0,
      });
    }
    job.error = 'Cancelled by caller';
    return this.finish(job, 'cancelled');
  }

  /**
   * Consistent view of a job, or null if unknown
   */
  snapshot(jobId: string): JobSnapshot | null {
    const job = this.jobs.get(jobId);
    if (!job) return null;
    return job.frozen ?? this.buildSnapshot(job);
  }

  /**
   * Resolved chunk results in chunk order; unresolved chunks are left out
   */
  getResults(jobId: string): ChunkResult[] | null {
    const job = this.jobs.get(jobId);
    if (!job) return null;
    return job.results.filter((r): r is ChunkResult => r !== undefined);
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  list(status?: JobStatus): JobSnapshot[] {
    const snapshots: JobSnapshot[] = [];
    for (const id of this.jobs.keys()) {
      const snapshot = this.snapshot(id);
      if (snapshot && (!status || snapshot.status === status)) {
        snapshots.push(snapshot);
      }
    }
    return snapshots;
  }

  getStatistics(): Record<JobStatus, number> & { total: number } {
    const stats = { total: 0, queued: 0, processing: 0, completed: 0, failed: 0, cancelled: 0 };
    for (const job of this.jobs.values()) {
      stats.total++;
      stats[job.status]++;
    }
    return stats;
  }

  /**
   * Forget a finished job
   */
  discard(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || !isTerminal(job.status)) return false;
    return this.jobs.delete(jobId);
  }

  /**
   * Clear finished jobs older than the given age
   */
  clearOldJobs(hoursOld: number = 24): number {
    const cutoff = Date.now() - hoursOld * 60 * 60 * 1000;
    let cleared = 0;

    for (const [jobId, job] of this.jobs.entries()) {
      if (isTerminal(job.status) && job.completedAt && job.completedAt.getTime() < cutoff) {
        this.jobs.delete(jobId);
        cleared++;
      }
    }
    return cleared;
  }

  onUpdate(callback: (snapshot: JobSnapshot) => void): void {
    this.updateCallbacks.push(callback);
  }

  private store(job: JobRecord, result: ChunkResult): boolean {
    if (result.index < 0 || result.index >= job.total || job.results[result.index]) {
      return false;
    }
    job.results[result.index] = result;
    if (result.status === 'succeeded') {
      job.succeeded++;
    } else {
      job.failed++;
    }
    return true;
  }

  private withinTolerance(job: JobRecord): boolean {
    if (job.failed === 0) return true;
    return job.total > 0 && job.failed / job.total <= this.policy.chunkFailureTolerance;
  }

  private transition(job: JobRecord, next: JobStatus): boolean {
    if (!TRANSITIONS[job.status].includes(next)) {
      this.logger.debug(`Job ${job.id}: ignoring transition ${job.status} -> ${next}`);
      return false;
    }
    job.status = next;
    return true;
  }

  private finish(job: JobRecord, status: JobStatus): boolean {
    if (!this.transition(job, status)) return false;

    job.completedAt = new Date();
    if (status === 'completed') {
      const contents = job.results.flatMap((r) => (r && r.status === 'succeeded' ? [r.content] : []));
      job.summary = {
        ...summarizeObservations(contents),
        processingTimeMs: job.startedAt ? job.completedAt.getTime() - job.startedAt.getTime() : 0,
      };
    }

    job.frozen = Object.freeze(this.buildSnapshot(job));
    this.logger.info(
      `Job ${job.id} ${status} (${job.succeeded} succeeded, ${job.failed} failed of ${job.total})`
    );
    this.emit(job.id);
    return true;
  }

  private buildSnapshot(job: JobRecord): JobSnapshot {
    const completed = job.succeeded + job.failed;
    return {
      id: job.id,
      label: job.label,
      model: job.model,
      status: job.status,
      total: job.total,
      completed,
      succeeded: job.succeeded,
      failed: job.failed,
      progress: job.total === 0 ? 100 : Math.round((completed / job.total) * 100),
      estimatedRemainingMs: this.estimateRemaining(job, completed),
      createdAt: job.createdAt,
      startedAt: job.startedAt,
      completedAt: job.completedAt,
      error: job.error,
      summary: job.summary,
    };
  }

  private estimateRemaining(job: JobRecord, completed: number): number | undefined {
    if (isTerminal(job.status)) return 0;
    if (job.status !== 'processing' || !job.startedAt || completed === 0) return undefined;

    const elapsedMs = Date.now() - job.startedAt.getTime();
    return Math.round((elapsedMs / completed) * (job.total - completed));
  }

  private emit(jobId: string): void {
    if (this.updateCallbacks.length === 0) return;
    const snapshot = this.snapshot(jobId);
    if (!snapshot) return;

    for (const callback of this.updateCallbacks) {
      try {
        callback(snapshot);
      } catch (error) {
        this.logger.error(`Update callback failed for job ${jobId}:`, error);
      }
    }
  }
}
