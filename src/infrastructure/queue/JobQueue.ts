import { createLogger, Logger } from '../../utils/logger.js';

/**
 * Executes an admitted job; settles when the job is finished
 */
export type JobRunner = (jobId: string) => Promise<void>;

export interface QueueStatistics {
  pending: number;
  running: number;
  maxConcurrent: number;
}

/**
 * Admission control for jobs: at most `maxConcurrent` run at once, the rest
 * wait and are started strictly in arrival order.
 */
export class JobQueue {
  private pending: string[] = [];
  private running: Set<string> = new Set();
  private idleWaiters: Array<() => void> = [];
  private readonly logger: Logger;

  constructor(
    private maxConcurrent: number,
    private runner: JobRunner,
    logger?: Logger
  ) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.logger = logger ?? createLogger('JobQueue');
  }

  /**
   * Submit a job for admission. It may start before this returns.
   */
  submit(jobId: string): void {
    if (this.pending.includes(jobId) || this.running.has(jobId)) {
      throw new Error(`Job ${jobId} is already queued`);
    }
    this.pending.push(jobId);
    this.logger.debug(`Job ${jobId} queued (position ${this.pending.length})`);
    this.processQueue();
  }

  /**
   * Remove a job that has not been admitted yet
   */
  cancel(jobId: string): boolean {
    const index = this.pending.indexOf(jobId);
    if (index === -1) return false;

    this.pending.splice(index, 1);
    this.notifyIfIdle();
    return true;
  }

  isPending(jobId: string): boolean {
    return this.pending.includes(jobId);
  }

  isRunning(jobId: string): boolean {
    return this.running.has(jobId);
  }

  /**
   * 1-based position among waiting jobs, or 0 when not waiting
   */
  position(jobId: string): number {
    return this.pending.indexOf(jobId) + 1;
  }

  getStatistics(): QueueStatistics {
    return {
      pending: this.pending.length,
      running: this.running.size,
      maxConcurrent: this.maxConcurrent,
    };
  }

  /**
   * Resolves once nothing is waiting or running
   */
  waitForIdle(): Promise<void> {
    if (this.pending.length === 0 && this.running.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Process the queue and start admitted jobs
   */
  private processQueue(): void {
    while (this.pending.length > 0 && this.running.size < this.maxConcurrent) {
      const jobId = this.pending.shift();
      if (jobId === undefined) break;

      this.running.add(jobId);
      this.logger.debug(`Job ${jobId} admitted (${this.running.size}/${this.maxConcurrent} running)`);

      this.start(jobId)
        .catch((error) => {
          this.logger.error(`Job ${jobId} runner failed:`, error);
        })
        .finally(() => {
          this.running.delete(jobId);
          this.processQueue();
          this.notifyIfIdle();
        });
    }
  }

  private async start(jobId: string): Promise<void> {
    await this.runner(jobId);
  }

  private notifyIfIdle(): void {
    if (this.pending.length > 0 || this.running.size > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
