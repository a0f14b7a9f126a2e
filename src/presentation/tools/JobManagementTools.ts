import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobService } from '../../application/services/JobService.js';
import { JobSnapshot, JobStatus } from '../../core/entities/Job.js';

const STATUS_EMOJI: Record<JobStatus, string> = {
  queued: '⏳',
  processing: '🔄',
  completed: '✅',
  failed: '❌',
  cancelled: '⛔',
};

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.round(ms / 1000);
  return seconds < 60 ? `${seconds}s` : `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

export function formatJobProgress(job: JobSnapshot): string {
  const eta =
    job.estimatedRemainingMs !== undefined && job.status === 'processing'
      ? `\n- **Estimated remaining**: ${formatDuration(job.estimatedRemainingMs)}`
      : '';

  return `# ${STATUS_EMOJI[job.status]} Job Progress: ${job.id}

## Status
- **Status**: ${job.status}${job.label ? `\n- **Label**: ${job.label}` : ''}
- **Progress**: ${job.progress}% (${job.completed}/${job.total} chunks)
- **Succeeded**: ${job.succeeded}
- **Failed**: ${job.failed}${eta}

## Time Information
- **Created**: ${job.createdAt.toISOString()}
- **Started**: ${job.startedAt?.toISOString() || 'Not yet started'}
- **Completed**: ${job.completedAt?.toISOString() || 'In progress'}
${job.error ? `\n## ❌ Error\n\`\`\`\n${job.error}\n\`\`\`\n` : ''}${
    job.status === 'completed'
      ? `\n## ✅ Job Completed!\nUse \`get-job-result\` with job ID \`${job.id}\` to retrieve the results.\n`
      : ''
  }`;
}

/**
 * Register all job management tools
 */
export function registerJobManagementTools(server: McpServer, jobService: JobService) {
  // list-jobs tool
  server.tool(
    'list-jobs',
    'List extraction jobs with their status and progress',
    {
      status: z
        .enum(['queued', 'processing', 'completed', 'failed', 'cancelled'])
        .optional()
        .describe('Filter jobs by status (optional)'),
    },
    async ({ status }) => {
      try {
        const jobs = jobService.getAllJobs(status);
        const stats = jobService.getStatistics();

        const formattedJobs = jobs.map((job) => ({
          id: job.id,
          label: job.label,
          status: job.status,
          progress: `${job.progress}%`,
          chunks: `${job.completed}/${job.total}`,
          failed: job.failed,
          createdAt: job.createdAt.toISOString(),
          completedAt: job.completedAt?.toISOString(),
          error: job.error,
        }));

        const text = `# Job Queue Status

## Statistics
- Total Jobs: ${stats.total}
- Queued: ${stats.queued}
- Processing: ${stats.processing}
- Completed: ${stats.completed}
- Failed: ${stats.failed}
- Cancelled: ${stats.cancelled}
- Max Concurrent Jobs: ${stats.queue.maxConcurrent}
- In-flight Requests: ${stats.inFlightRequests}

## Jobs
${formattedJobs.length === 0 ? 'No jobs found' : `\`\`\`json\n${JSON.stringify(formattedJobs, null, 2)}\n\`\`\``}`;

        return {
          content: [{ type: 'text', text }],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error listing jobs: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );

  // get-job-progress tool
  server.tool(
    'get-job-progress',
    'Get progress information for a specific job',
    {
      job_id: z.string().describe('The ID of the job to check'),
    },
    async ({ job_id }) => {
      const job = jobService.getJobStatus(job_id);

      if (!job) {
        return {
          isError: true,
          content: [{ type: 'text', text: `Job not found: ${job_id}` }],
        };
      }

      return {
        content: [{ type: 'text', text: formatJobProgress(job) }],
      };
    }
  );

  // get-job-result tool
  server.tool(
    'get-job-result',
    'Get the ordered chunk results of a finished job',
    {
      job_id: z.string().describe('The ID of the finished job'),
    },
    async ({ job_id }) => {
      try {
        const job = jobService.getJobStatus(job_id);

        if (job && (job.status === 'queued' || job.status === 'processing')) {
          return {
            content: [
              {
                type: 'text',
                text: `⏳ Job is still in progress (Status: ${job.status}, Progress: ${job.progress}%)\n\nUse \`get-job-progress\` to check the current status:\n\`\`\`\nget-job-progress(job_id="${job_id}")\n\`\`\``,
              },
            ],
          };
        }

        const results = jobService.getJobResult(job_id);
        if (!results) {
          return {
            isError: true,
            content: [{ type: 'text', text: `Job not found: ${job_id}` }],
          };
        }

        const payload = {
          job_id,
          status: job?.status,
          error: job?.error,
          summary: job?.summary,
          results,
        };

        return {
          isError: job?.status === 'failed',
          content: [
            {
              type: 'text',
              text: `\`\`\`json\n${JSON.stringify(payload, null, 2)}\n\`\`\``,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error getting job result: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );

  // cancel-job tool
  server.tool(
    'cancel-job',
    'Cancel a queued or processing job',
    {
      job_id: z.string().describe('The ID of the job to cancel'),
    },
    async ({ job_id }) => {
      const success = jobService.cancelJob(job_id);

      if (!success) {
        return {
          content: [
            {
              type: 'text',
              text: `Could not cancel job: ${job_id} (unknown or already finished)`,
            },
          ],
        };
      }

      return {
        content: [
          {
            type: 'text',
            text: `# Job Cancelled\n\nJob ID: ${job_id}\nStatus: ${
              jobService.getJobStatus(job_id)?.status ?? 'cancelled'
            } (in-flight requests drain before the job closes)\nCancelled at: ${new Date().toISOString()}`,
          },
        ],
      };
    }
  );
}
