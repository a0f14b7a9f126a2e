import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { ChunkDispatcher } from '../application/services/ChunkDispatcher.js';
import { JobService } from '../application/services/JobService.js';
import { HealthMonitor } from '../infrastructure/cluster/HealthMonitor.js';
import { ServerRegistry } from '../infrastructure/cluster/ServerRegistry.js';
import { TcpReachabilityProbe } from '../infrastructure/cluster/TcpReachabilityProbe.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { ResultRepository } from '../infrastructure/database/repositories/ResultRepository.js';
import { OllamaApiClient } from '../infrastructure/http/OllamaApiClient.js';
import { JobTracker } from '../infrastructure/queue/JobTracker.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { createLogger } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import { registerSubmitChunksTool } from './tools/SubmitChunksTool.js';
import { registerHealthCheckTools } from './tools/HealthCheckTool.js';
import { registerJobManagementTools } from './tools/JobManagementTools.js';

const logger = createLogger('McpServer');

const SHUTDOWN_GRACE_MS = 5000;

/**
 * Main server class that wires the cluster, the dispatcher and both front ends
 */
export class McpServer {
  private server: BaseMcpServer | null = null;
  private webServer: WebServer | null = null;
  private retentionTimer: NodeJS.Timeout | null = null;
  private shuttingDown = false;

  readonly registry: ServerRegistry;
  readonly monitor: HealthMonitor;
  readonly jobService: JobService;
  private dbConnection: DatabaseConnection;

  constructor(private config: Config) {
    this.registry = new ServerRegistry(config.cluster.servers);

    const client = new OllamaApiClient();
    this.monitor = new HealthMonitor(this.registry, client, new TcpReachabilityProbe(), config.healthCheck);

    const dispatcher = new ChunkDispatcher(this.registry, client, config.dispatch);
    const tracker = new JobTracker({ chunkFailureTolerance: config.jobs.chunkFailureTolerance });

    this.dbConnection = new DatabaseConnection(config.results.databasePath);
    const resultRepository = new ResultRepository(this.dbConnection.getDatabase());

    this.jobService = new JobService(tracker, dispatcher, resultRepository, config.jobs.maxConcurrentJobs);

    if (config.http.enabled) {
      this.webServer = new WebServer(this.jobService, this.registry, this.monitor, config.http.port);
    }

    if (config.mcp.enabled) {
      this.server = new BaseMcpServer({
        name: config.server.name,
        version: config.server.version,
      });
      this.registerTools(this.server);
    }
  }

  private registerTools(server: BaseMcpServer) {
    registerSubmitChunksTool(server, this.jobService, () => this.registry.getStatus(), (message) =>
      logger.debug(message)
    );
    registerJobManagementTools(server, this.jobService);
    registerHealthCheckTools(server, this.registry, this.monitor, this.jobService, this.dbConnection);
  }

  /**
   * Print result storage statistics
   */
  printStats() {
    const stats = this.dbConnection.getStatistics();
    console.error(
      `📊 Result Storage: ${stats.totalJobs} jobs, ${stats.totalChunks} chunks (${stats.failedChunks} failed), ${(stats.databaseSize / 1024).toFixed(2)} KB`
    );
  }

  /**
   * Start health checks and the enabled front ends
   */
  async start() {
    logger.debug(`Result storage at: ${this.dbConnection.getDatabasePath()}`);

    this.monitor.start();
    this.startRetentionSweep();

    if (this.webServer) {
      try {
        await this.webServer.start();
      } catch (error) {
        logger.error('Failed to start HTTP API:', error);
      }
    }

    if (this.server) {
      const transport = new StdioServerTransport();

      process.stdin.on('error', (error) => {
        logger.warn(`stdin error (non-fatal): ${error.message}`);
      });

      process.stdout.on('error', (error) => {
        logger.warn(`stdout error (non-fatal): ${error.message}`);
      });

      process.stdin.on('end', () => {
        logger.warn('stdin ended - client may have disconnected');
      });

      await this.server.connect(transport);
      console.error(`\n✅ Chunk dispatch MCP server running on stdio`);
    }
  }

  private startRetentionSweep() {
    const { retentionHours } = this.config.jobs;
    if (retentionHours <= 0) return;

    const sweepMs = Math.max(60_000, Math.min(retentionHours * 3_600_000, 3_600_000));
    this.retentionTimer = setInterval(() => {
      const cleared = this.jobService.clearOldJobs(retentionHours);
      if (cleared > 0) {
        logger.info(`Cleared ${cleared} finished jobs older than ${retentionHours}h`);
      }
    }, sweepMs);
    this.retentionTimer.unref();
  }

  /**
   * Graceful shutdown: stop probing, cancel outstanding work, close front ends and storage
   */
  async shutdown() {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    console.error('\n👋 Shutting down gracefully...');

    this.monitor.stop();
    if (this.retentionTimer) {
      clearInterval(this.retentionTimer);
      this.retentionTimer = null;
    }

    const cancelled = this.jobService.cancelAll();
    if (cancelled > 0) {
      logger.info(`Cancelled ${cancelled} outstanding jobs`);
    }
    // In-flight requests get a short grace period to land
    await Promise.race([this.jobService.waitForIdle(), sleep(SHUTDOWN_GRACE_MS)]);

    if (this.webServer) {
      await this.webServer.stop();
    }

    if (this.server) {
      await this.server.close();
    }

    this.dbConnection.close();
  }
}
