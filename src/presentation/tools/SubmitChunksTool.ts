import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobService } from '../../application/services/JobService.js';
import { ClusterStatus } from '../../core/entities/Server.js';

/**
 * Register the submit-chunks tool
 */
export function registerSubmitChunksTool(
  server: McpServer,
  jobService: JobService,
  getClusterStatus: () => ClusterStatus,
  debugLog: (message: string) => void
) {
  server.tool(
    'submit-chunks',
    'Submit the chunks of a document for observation extraction across the Ollama cluster. Returns a job ID to poll with get-job-progress.',
    {
      chunks: z
        .array(z.string().min(1, 'Chunks must not be empty'))
        .min(1, 'At least 1 chunk is required')
        .describe('Text chunks in document order'),
      label: z.string().optional().describe('Optional label, such as the source document name'),
      model: z.string().optional().describe('Only dispatch to servers configured with this model'),
    },
    async ({ chunks, label, model }) => {
      try {
        const jobId = jobService.submitJob(chunks, { label, model });
        const status = getClusterStatus();
        debugLog(`[SubmitChunks] Job ${jobId} created for ${chunks.length} chunks`);

        return {
          content: [
            {
              type: 'text',
              text: `# 📋 Job Submitted

**Job ID**: \`${jobId}\`
**Chunks**: ${chunks.length}${label ? `\n**Label**: ${label}` : ''}
**Active servers**: ${status.activeServers}/${status.totalServers}

Use \`get-job-progress\` with this job ID to follow it, then \`get-job-result\` once it has finished.`,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error submitting chunks: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
