import { ChunkResult, JobSnapshot, JobStatus, JobSubmitOptions } from '../../core/entities/Job.js';
import { IResultRepository } from '../../core/interfaces/IResultRepository.js';
import { JobNotFoundError, NoActiveServersError, errorMessage } from '../../core/errors.js';
import { JobQueue, QueueStatistics } from '../../infrastructure/queue/JobQueue.js';
import { JobTracker } from '../../infrastructure/queue/JobTracker.js';
import { createLogger, Logger } from '../../utils/logger.js';
import { ChunkDispatcher } from './ChunkDispatcher.js';

export type JobFinishedCallback = (jobId: string, results: ChunkResult[], snapshot: JobSnapshot) => void;

export interface JobStatistics extends Record<JobStatus, number> {
  total: number;
  queue: QueueStatistics;
  inFlightRequests: number;
}

/**
 * Service for submitting, polling and cancelling extraction jobs
 */
export class JobService {
  private queue: JobQueue;
  private chunksByJob: Map<string, string[]> = new Map();
  private controllers: Map<string, AbortController> = new Map();
  private finishedCallbacks: JobFinishedCallback[] = [];
  private readonly logger: Logger;

  constructor(
    private tracker: JobTracker,
    private dispatcher: ChunkDispatcher,
    private resultRepository: IResultRepository | null,
    maxConcurrentJobs: number,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('JobService');
    this.queue = new JobQueue(maxConcurrentJobs, (jobId) => this.runJob(jobId));
  }

  /**
   * Submit a document's chunks; returns the job id
   */
  submitJob(chunks: string[], options: JobSubmitOptions = {}): string {
    if (chunks.length === 0) {
      throw new Error('A job needs at least one chunk');
    }

    const jobId = this.tracker.create(chunks.length, options);
    this.chunksByJob.set(jobId, [...chunks]);
    this.logger.info(`Job ${jobId} submitted with ${chunks.length} chunks${options.label ? ` (${options.label})` : ''}`);

    this.queue.submit(jobId);
    return jobId;
  }

  getJobStatus(jobId: string): JobSnapshot | null {
    return this.tracker.snapshot(jobId);
  }

  /**
   * Chunk results in chunk order. Jobs no longer in memory are read from storage.
   */
  getJobResult(jobId: string): ChunkResult[] | null {
    const results = this.tracker.getResults(jobId);
    if (results) return results;

    const stored = this.resultRepository?.loadResults(jobId) ?? [];
    return stored.length > 0 ? stored : null;
  }

  /**
   * Best-effort stop. Waiting jobs never start. Running jobs stop dispatching
   * and turn `cancelled` once their in-flight requests have drained.
   */
  cancelJob(jobId: string): boolean {
    if (this.queue.cancel(jobId)) {
      this.chunksByJob.delete(jobId);
      this.tracker.cancel(jobId);
      this.logger.info(`Job ${jobId} cancelled before admission`);
      this.publish(jobId);
      return true;
    }

    const controller = this.controllers.get(jobId);
    if (controller) {
      if (!controller.signal.aborted) {
        controller.abort();
        this.logger.info(`Job ${jobId} cancelled while processing, draining in-flight requests`);
      }
      return true;
    }

    return false;
  }

  /**
   * Cancel everything still waiting or running
   */
  cancelAll(): number {
    let cancelled = 0;
    for (const snapshot of [...this.tracker.list('queued'), ...this.tracker.list('processing')]) {
      if (this.cancelJob(snapshot.id)) cancelled++;
    }
    return cancelled;
  }

  getAllJobs(status?: JobStatus): JobSnapshot[] {
    return this.tracker.list(status);
  }

  getStatistics(): JobStatistics {
    return {
      ...this.tracker.getStatistics(),
      queue: this.queue.getStatistics(),
      inFlightRequests: this.dispatcher.inFlight,
    };
  }

  /**
   * Drop a finished job from memory. Stored results stay available unless purged.
   */
  discardJob(jobId: string, purgeResults: boolean = false): boolean {
    if (this.tracker.has(jobId)) {
      if (!this.tracker.discard(jobId)) return false;
    } else if (!purgeResults || !this.resultRepository || this.resultRepository.loadResults(jobId).length === 0) {
      throw new JobNotFoundError(jobId);
    }

    if (purgeResults && this.resultRepository) {
      const removed = this.resultRepository.deleteResults(jobId);
      this.logger.debug(`Job ${jobId}: ${removed} stored chunk results purged`);
    }
    return true;
  }

  clearOldJobs(hoursOld: number = 24): number {
    return this.tracker.clearOldJobs(hoursOld);
  }

  onJobUpdate(callback: (snapshot: JobSnapshot) => void): void {
    this.tracker.onUpdate(callback);
  }

  /**
   * Attach a consumer for the ordered results of finished jobs
   */
  onJobFinished(callback: JobFinishedCallback): void {
    this.finishedCallbacks.push(callback);
  }

  waitForIdle(): Promise<void> {
    return this.queue.waitForIdle();
  }

  private async runJob(jobId: string): Promise<void> {
    const chunks = this.chunksByJob.get(jobId);
    if (!chunks || !this.tracker.markProcessing(jobId)) {
      this.chunksByJob.delete(jobId);
      return;
    }

    const controller = new AbortController();
    this.controllers.set(jobId, controller);
    const model = this.tracker.snapshot(jobId)?.model;

    try {
      const report = await this.dispatcher.dispatch(
        jobId,
        chunks,
        (result) => {
          this.tracker.recordChunk(jobId, result);
        },
        { signal: controller.signal, model }
      );

      if (report.abortReason === 'no-capacity') {
        this.tracker.fail(jobId, new NoActiveServersError(model).message, report.results);
      } else if (report.abortReason === 'cancelled' || controller.signal.aborted) {
        this.tracker.cancel(jobId, report.results);
      } else {
        this.tracker.finalize(jobId, report.results);
      }
    } catch (error) {
      this.logger.error(`Job ${jobId} aborted: ${errorMessage(error)}`);
      this.tracker.fail(jobId, errorMessage(error));
    } finally {
      this.controllers.delete(jobId);
      this.chunksByJob.delete(jobId);
    }

    this.publish(jobId);
  }

  private publish(jobId: string): void {
    const results = this.tracker.getResults(jobId) ?? [];
    const snapshot = this.tracker.snapshot(jobId);
    if (!snapshot) return;

    if (this.resultRepository) {
      try {
        this.resultRepository.saveResults(jobId, results);
        this.logger.debug(`Job ${jobId}: ${results.length} chunk results stored`);
      } catch (error) {
        this.logger.error(`Failed to store results of job ${jobId}:`, error);
      }
    }

    for (const callback of this.finishedCallbacks) {
      try {
        callback(jobId, results, snapshot);
      } catch (error) {
        this.logger.error(`Finished callback failed for job ${jobId}:`, error);
      }
    }
  }
}
