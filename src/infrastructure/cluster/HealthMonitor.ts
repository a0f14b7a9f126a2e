import { ServerEntry } from '../../core/entities/Server.js';
import { IOllamaClient, IReachabilityProbe } from '../../core/interfaces/IOllamaClient.js';
import { ModelUnavailableError, errorMessage } from '../../core/errors.js';
import { withTimeout } from '../../utils/retry.js';
import { createLogger, Logger } from '../../utils/logger.js';
import { ServerRegistry } from './ServerRegistry.js';

export interface HealthMonitorConfig {
  intervalMs: number;
  probeTimeoutMs: number;
  // Require the server's configured model in its model list
  verifyModel: boolean;
}

export const DEFAULT_HEALTH_CONFIG: HealthMonitorConfig = {
  intervalMs: 30000,
  probeTimeoutMs: 5000,
  verifyModel: true,
};

export interface ProbeResult {
  server: string;
  healthy: boolean;
  reactivated: boolean;
  deactivated: boolean;
  latencyMs?: number;
  error?: string;
}

export interface HealthCheckSummary {
  checkedAt: Date;
  checked: number;
  active: number;
  reactivated: number;
  results: ProbeResult[];
}

/**
 * Ollama tags carry a tag suffix (`gemma3:latest`); a bare model name matches any tag
 */
export function hasModel(models: ReadonlyArray<{ name: string }>, model: string): boolean {
  return models.some((m) => m.name === model || (!model.includes(':') && m.name.startsWith(`${model}:`)));
}

/**
 * Periodically probes every configured server and feeds the results into the registry.
 * Probes run concurrently and each is bounded by its own timeout, so a hung
 * server never delays the verdict on the others.
 */
export class HealthMonitor {
  private timer: NodeJS.Timeout | null = null;
  private cycle: Promise<HealthCheckSummary> | null = null;
  // One probe per server at a time; overlapping checks share it
  private probing: Map<string, Promise<ProbeResult>> = new Map();
  private readonly config: HealthMonitorConfig;
  private readonly logger: Logger;

  constructor(
    private registry: ServerRegistry,
    private client: IOllamaClient,
    private probe: IReachabilityProbe,
    config: Partial<HealthMonitorConfig> = {},
    logger?: Logger
  ) {
    this.config = { ...DEFAULT_HEALTH_CONFIG, ...config };
    this.logger = logger ?? createLogger('HealthMonitor');
  }

  /**
   * Run one full check now, then keep checking on the interval
   */
  start(): void {
    if (this.timer) return;

    this.tick();
    this.timer = setInterval(() => this.tick(), this.config.intervalMs);
    // Background activity only: never hold the process open
    this.timer.unref();
    this.logger.info(`Started (interval: ${this.config.intervalMs}ms, probe timeout: ${this.config.probeTimeoutMs}ms)`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Probe every server, active or not
   */
  async checkAll(): Promise<HealthCheckSummary> {
    if (this.cycle) return this.cycle;

    this.cycle = this.runCycle(this.registry.list(), true).finally(() => {
      this.cycle = null;
    });
    return this.cycle;
  }

  /**
   * Probe only inactive servers, to bring recovered ones back
   */
  async checkInactive(): Promise<HealthCheckSummary> {
    const inactive = this.registry.list().filter((server) => !server.active);
    if (inactive.length > 0) {
      this.logger.info(`Checking ${inactive.length} inactive servers for reconnection...`);
    }
    return this.runCycle(inactive, false);
  }

  /**
   * Probe one server: reachability first, then the model listing.
   * Both must pass for the server to be marked active.
   */
  async checkServer(server: ServerEntry): Promise<ProbeResult> {
    const { probeTimeoutMs } = this.config;
    const startedAt = Date.now();

    try {
      const reachable = await withTimeout(
        this.probe.isReachable(server, probeTimeoutMs),
        probeTimeoutMs,
        server.name
      );
      if (!reachable) {
        throw new Error(`Server ${server.name} is not reachable`);
      }

      const models = await withTimeout(
        this.client.listModels(server, probeTimeoutMs),
        probeTimeoutMs,
        server.name
      );
      if (this.config.verifyModel && !hasModel(models, server.model)) {
        throw new ModelUnavailableError(server.name, server.model);
      }

      const latencyMs = Date.now() - startedAt;
      const reactivated = this.registry.markHealthy(server.name, latencyMs);
      if (reactivated) {
        this.logger.info(`🟢 Server ${server.name} is back online! (response time: ${latencyMs}ms)`);
      } else {
        this.logger.debug(`Server ${server.name} is healthy (response time: ${latencyMs}ms)`);
      }

      return { server: server.name, healthy: true, reactivated, deactivated: false, latencyMs };
    } catch (error) {
      const message = errorMessage(error);
      const deactivated = this.registry.markUnhealthy(server.name, message);
      this.logger.warn(`Health check failed for ${server.name}: ${message}`);
      return { server: server.name, healthy: false, reactivated: false, deactivated, error: message };
    }
  }

  private probeOnce(server: ServerEntry): Promise<ProbeResult> {
    const running = this.probing.get(server.name);
    if (running) return running;

    const probe = this.checkServer(server).finally(() => {
      this.probing.delete(server.name);
    });
    this.probing.set(server.name, probe);
    return probe;
  }

  private async runCycle(servers: ServerEntry[], full: boolean): Promise<HealthCheckSummary> {
    const settled = await Promise.allSettled(servers.map((server) => this.probeOnce(server)));

    const results: ProbeResult[] = settled.map((outcome, i) =>
      outcome.status === 'fulfilled'
        ? outcome.value
        : {
            server: servers[i].name,
            healthy: false,
            reactivated: false,
            deactivated: false,
            error: errorMessage(outcome.reason),
          }
    );

    const checkedAt = new Date();
    if (full) {
      this.registry.noteHealthCheck(checkedAt, this.config.intervalMs);
    }

    const summary: HealthCheckSummary = {
      checkedAt,
      checked: results.length,
      active: this.registry.activeCount,
      reactivated: results.filter((r) => r.reactivated).length,
      results,
    };

    if (full) {
      this.logger.info(
        `Health check complete. ${summary.active}/${this.registry.size} servers active`
      );
    } else if (summary.reactivated > 0) {
      this.logger.info(`🟢 Reactivated ${summary.reactivated} servers!`);
    }

    return summary;
  }

  private tick(): void {
    // A cycle still running is joined rather than doubled
    this.checkAll().catch((error) => {
      this.logger.error('Health check cycle failed:', error);
    });
  }
}
