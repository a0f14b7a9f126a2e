import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobService } from '../../application/services/JobService.js';
import { ClusterStatus } from '../../core/entities/Server.js';
import { HealthMonitor } from '../../infrastructure/cluster/HealthMonitor.js';
import { ServerRegistry } from '../../infrastructure/cluster/ServerRegistry.js';
import { DatabaseConnection } from '../../infrastructure/database/DatabaseConnection.js';

export function formatClusterStatus(status: ClusterStatus): string {
  const rows = status.servers.map(
    (server) =>
      `| ${server.active ? '🟢' : '🔴'} ${server.name} | ${server.url} | ${server.model} | ${server.consecutiveErrors}/${status.errorThreshold} | ${
        server.averageResponseTimeMs !== undefined ? `${server.averageResponseTimeMs}ms` : '-'
      } | ${server.lastError ?? ''} |`
  );

  return `# Cluster Status

**Active servers**: ${status.activeServers}/${status.totalServers}
**Last health check**: ${status.lastHealthCheckAt?.toISOString() ?? 'never'}

| Server | URL | Model | Errors | Avg response | Last error |
|---|---|---|---|---|---|
${rows.join('\n')}`;
}

/**
 * Register the cluster-status, reconnect-servers and health-check tools
 */
export function registerHealthCheckTools(
  server: McpServer,
  registry: ServerRegistry,
  monitor: HealthMonitor,
  jobService: JobService,
  dbConnection: DatabaseConnection | null
) {
  server.tool(
    'cluster-status',
    'Show every configured Ollama server with its active flag, error count and response time',
    {},
    async () => ({
      content: [{ type: 'text', text: formatClusterStatus(registry.getStatus()) }],
    })
  );

  server.tool(
    'reconnect-servers',
    'Probe inactive servers now and bring recovered ones back into rotation',
    {},
    async () => {
      try {
        const summary = await monitor.checkInactive();
        const status = registry.getStatus();

        return {
          content: [
            {
              type: 'text',
              text: `Checked ${summary.checked} inactive servers, reactivated ${summary.reactivated}.\n\n${formatClusterStatus(status)}`,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Reconnect check failed: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );

  server.tool(
    'health-check',
    'Check the health of the service: cluster capacity, job queue and result storage',
    {},
    async () => {
      const cluster = registry.getStatus();
      let storage: Record<string, unknown>;

      try {
        storage = dbConnection
          ? { status: 'healthy', statistics: dbConnection.getStatistics() }
          : { status: 'disabled' };
      } catch (error) {
        storage = { status: 'error', message: error instanceof Error ? error.message : String(error) };
      }

      const health = {
        timestamp: new Date().toISOString(),
        status: cluster.activeServers > 0 && storage.status !== 'error' ? 'healthy' : 'degraded',
        components: {
          cluster: {
            activeServers: cluster.activeServers,
            totalServers: cluster.totalServers,
            monitorRunning: monitor.isRunning(),
          },
          jobQueue: jobService.getStatistics(),
          storage,
        },
      };

      return {
        content: [
          {
            type: 'text',
            text: `# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``,
          },
        ],
      };
    }
  );
}
