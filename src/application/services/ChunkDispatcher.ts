import { ChunkFailureReason, ChunkResult } from '../../core/entities/Job.js';
import { ServerEntry } from '../../core/entities/Server.js';
import { IOllamaClient } from '../../core/interfaces/IOllamaClient.js';
import { NoActiveServersError, classifyError, errorMessage } from '../../core/errors.js';
import { ServerRegistry } from '../../infrastructure/cluster/ServerRegistry.js';
import {
  AttemptBudgetConfig,
  DEFAULT_ATTEMPT_BUDGET,
  computeAttemptCap,
  createErrorLog,
  sleep,
  withTimeout,
} from '../../utils/retry.js';
import { Semaphore } from '../../utils/semaphore.js';
import { createLogger, Logger } from '../../utils/logger.js';

export interface DispatcherConfig extends AttemptBudgetConfig {
  // Worker pool size shared by every job, independent of the server count
  concurrency: number;
}

export const DEFAULT_DISPATCHER_CONFIG: DispatcherConfig = {
  ...DEFAULT_ATTEMPT_BUDGET,
  concurrency: 4,
};

export type ChunkResolvedCallback = (result: ChunkResult) => void;

export interface DispatchOptions {
  signal?: AbortSignal;
  // Restrict the job to servers configured with this model
  model?: string;
}

export type AbortReason = Extract<ChunkFailureReason, 'no-capacity' | 'cancelled'>;

export interface DispatchReport {
  // Indexed by chunk index; every slot is filled
  results: ChunkResult[];
  succeeded: number;
  failed: number;
  attemptCap: number;
  abortReason?: AbortReason;
}

interface ChunkTask {
  jobId: string;
  index: number;
  text: string;
  attempts: number;
  attemptsByServer: Map<string, number>;
  server: string | null;
  lastError?: string;
}

/**
 * Book-keeping for one dispatch call. Results land here exactly once per chunk.
 */
class DispatchRun {
  readonly results: Array<ChunkResult | undefined>;
  abortReason?: AbortReason;

  constructor(
    readonly jobId: string,
    readonly tasks: ChunkTask[],
    readonly attemptCap: number,
    private readonly onChunkResolved: ChunkResolvedCallback,
    private readonly logger: Logger,
    readonly signal?: AbortSignal,
    readonly model?: string
  ) {
    this.results = new Array(tasks.length);
  }

  resolve(result: ChunkResult): boolean {
    if (this.results[result.index]) {
      return false;
    }
    this.results[result.index] = result;
    try {
      this.onChunkResolved(result);
    } catch (error) {
      this.logger.error(`onChunkResolved threw for job ${this.jobId} chunk ${result.index}:`, error);
    }
    return true;
  }

  abort(reason: AbortReason): void {
    if (this.abortReason) return;
    this.abortReason = reason;
    if (reason === 'no-capacity') {
      this.logger.error(
        `Job ${this.jobId}: no active servers${this.model ? ` for model ${this.model}` : ''}, abandoning undispatched chunks`
      );
    } else {
      this.logger.info(`Job ${this.jobId}: cancelled, no further chunks will be dispatched`);
    }
  }

  /**
   * True once no more attempts may start
   */
  halted(): boolean {
    if (!this.abortReason && this.signal?.aborted) {
      this.abort('cancelled');
    }
    return this.abortReason !== undefined;
  }
}

type AttemptOutcome = 'resolved' | 'retry' | 'halted';

function hasRetryBudget(server: ServerEntry, task: Pick<ChunkTask, 'attemptsByServer'>): boolean {
  return (task.attemptsByServer.get(server.name) ?? 0) < server.maxRetries;
}

/**
 * Turns a job's chunks into ordered extraction results.
 *
 * Workers take chunks from the job's queue and run each to a terminal outcome.
 * Every attempt holds one slot of the shared pool and picks its server
 * round-robin over the registry's active set as it is at that moment; a failed
 * attempt moves to a different active server when there is one.
 */
export class ChunkDispatcher {
  private cursor = 0;
  private readonly pool: Semaphore;
  private readonly config: DispatcherConfig;
  private readonly logger: Logger;

  constructor(
    private registry: ServerRegistry,
    private client: IOllamaClient,
    config: Partial<DispatcherConfig> = {},
    logger?: Logger
  ) {
    this.config = { ...DEFAULT_DISPATCHER_CONFIG, ...config };
    this.pool = new Semaphore(this.config.concurrency);
    this.logger = logger ?? createLogger('ChunkDispatcher');
  }

  get concurrency(): number {
    return this.config.concurrency;
  }

  get inFlight(): number {
    return this.pool.inUse;
  }

  async dispatch(
    jobId: string,
    chunks: string[],
    onChunkResolved: ChunkResolvedCallback,
    options: DispatchOptions = {}
  ): Promise<DispatchReport> {
    const tasks: ChunkTask[] = chunks.map((text, index) => ({
      jobId,
      index,
      text,
      attempts: 0,
      attemptsByServer: new Map(),
      server: null,
    }));

    const active = this.eligibleServers(options.model);
    const attemptCap = computeAttemptCap(active, this.config.attemptCeiling);
    const run = new DispatchRun(
      jobId,
      tasks,
      attemptCap,
      onChunkResolved,
      this.logger,
      options.signal,
      options.model
    );

    if (tasks.length > 0 && active.length === 0) {
      run.abort('no-capacity');
    } else if (tasks.length > 0) {
      this.logger.debug(
        `Job ${jobId}: dispatching ${tasks.length} chunks (attempt cap ${attemptCap}, pool ${this.config.concurrency})`
      );

      const queue = [...tasks];
      const worker = async () => {
        while (!run.halted()) {
          const task = queue.shift();
          if (!task) return;
          await this.runTask(run, task);
        }
      };

      const workerCount = Math.min(this.config.concurrency, tasks.length);
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    }

    // Whatever is still unresolved was cut off by the abort
    const results = tasks.map(
      (task): ChunkResult =>
        run.results[task.index] ?? {
          index: task.index,
          status: 'failed',
          reason: run.abortReason ?? 'cancelled',
          error:
            run.abortReason === 'no-capacity'
              ? new NoActiveServersError(run.model).message
              : 'Dispatch cancelled',
          attempts: task.attempts,
        }
    );

    const succeeded = results.filter((r) => r.status === 'succeeded').length;
    return {
      results,
      succeeded,
      failed: results.length - succeeded,
      attemptCap,
      abortReason: run.abortReason,
    };
  }

  /**
   * Pick the next server round-robin among active servers that still have
   * retry budget for this chunk, preferring one other than the last used.
   */
  selectServer(active: ServerEntry[], task: Pick<ChunkTask, 'server' | 'attemptsByServer'>): ServerEntry | null {
    const n = active.length;
    if (n === 0) return null;

    // The active set may have shrunk since the cursor last moved
    const start = this.cursor % n;
    let fallback: number | null = null;

    for (let offset = 0; offset < n; offset++) {
      const position = (start + offset) % n;
      const server = active[position];
      if (!hasRetryBudget(server, task)) continue;

      if (n > 1 && server.name === task.server) {
        if (fallback === null) fallback = position;
        continue;
      }

      this.cursor = (position + 1) % n;
      return server;
    }

    if (fallback !== null) {
      this.cursor = (fallback + 1) % n;
      return active[fallback];
    }
    return null;
  }

  private async runTask(run: DispatchRun, task: ChunkTask): Promise<void> {
    while (true) {
      const outcome = await this.pool.run(() => this.attempt(run, task));
      if (outcome !== 'retry') return;

      if (this.config.retryDelayMs > 0) {
        await sleep(this.config.retryDelayMs);
      }
    }
  }

  private eligibleServers(model?: string): ServerEntry[] {
    const active = this.registry.listActive();
    return model ? active.filter((server) => server.model === model) : active;
  }

  private async attempt(run: DispatchRun, task: ChunkTask): Promise<AttemptOutcome> {
    if (run.halted()) return 'halted';

    const active = this.eligibleServers(run.model);
    if (active.length === 0) {
      run.abort('no-capacity');
      return 'halted';
    }

    if (task.attempts >= run.attemptCap) {
      this.exhaust(run, task);
      return 'resolved';
    }

    const server = this.selectServer(active, task);
    if (!server) {
      this.exhaust(run, task);
      return 'resolved';
    }

    task.attempts++;
    task.attemptsByServer.set(server.name, (task.attemptsByServer.get(server.name) ?? 0) + 1);
    task.server = server.name;

    const startedAt = Date.now();
    try {
      const response = await withTimeout(
        this.client.generate(server, task.text),
        server.timeoutMs,
        server.name
      );
      const latencyMs = Date.now() - startedAt;
      this.registry.recordSuccess(server.name, latencyMs);

      run.resolve({
        index: task.index,
        status: 'succeeded',
        content: response.content,
        server: server.name,
        attempts: task.attempts,
        latencyMs,
      });
      this.logger.debug(
        `Job ${run.jobId} chunk ${task.index}: done on ${server.name} in ${latencyMs}ms (attempt ${task.attempts})`
      );
      return 'resolved';
    } catch (error) {
      const message = errorMessage(error);
      task.lastError = message;
      this.registry.recordFailure(server.name, message);

      const remaining = this.eligibleServers(run.model);
      const withinCap = task.attempts < run.attemptCap;
      const willRetry = withinCap && remaining.some((candidate) => hasRetryBudget(candidate, task));
      console.error(
        JSON.stringify(
          createErrorLog(
            new Date(),
            run.jobId,
            task.index,
            task.attempts,
            server.name,
            classifyError(error),
            message,
            willRetry
          )
        )
      );

      if (withinCap && remaining.length === 0) {
        run.abort('no-capacity');
        return 'halted';
      }
      if (!willRetry) {
        this.exhaust(run, task);
        return 'resolved';
      }
      return 'retry';
    }
  }

  private exhaust(run: DispatchRun, task: ChunkTask): void {
    run.resolve({
      index: task.index,
      status: 'failed',
      reason: 'exhausted',
      error: `Failed after ${task.attempts} attempts. Last error: ${task.lastError ?? 'no server with retry budget left'}`,
      attempts: task.attempts,
    });
  }
}
