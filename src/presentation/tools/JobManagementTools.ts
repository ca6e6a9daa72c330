import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ResearchOrchestrator } from '../../application/services/ResearchOrchestrator.js';
import { JOB_STATUSES, Job, JobStatus } from '../../core/entities/Job.js';
import { errorMessage } from '../../core/errors/ResearchErrors.js';

const STATUS_EMOJI: Record<JobStatus, string> = {
  queued: '⏳',
  researching: '🔍',
  generating: '✍️',
  completed: '✅',
  failed: '❌',
};

function errorResult(prefix: string, error: unknown) {
  return {
    isError: true,
    content: [{ type: 'text' as const, text: `${prefix}: ${errorMessage(error)}` }],
  };
}

function textResult(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

export function formatJobStatus(job: Job): string {
  let text = `# ${STATUS_EMOJI[job.status]} Research Job: ${job.id}

## Status
- **Query**: ${job.query}
- **Sources**: ${job.sources}
- **Results per backend**: ${job.numResults}
- **Status**: ${job.status}
- **Progress**: ${job.progress}%

## Time Information
- **Created**: ${job.createdAt.toISOString()}
- **Started**: ${job.startedAt?.toISOString() ?? 'Not yet started'}
- **Completed**: ${job.completedAt?.toISOString() ?? 'In progress'}
`;

  if (job.backendErrors.length > 0) {
    text += `\n## Degraded Backends\n${job.backendErrors.map((e) => `- ${e.message}`).join('\n')}\n`;
  }
  if (job.skippedSources.length > 0) {
    text += `\n## Skipped Sources\n${job.skippedSources.map((s) => `- ${s.url}: ${s.reason}`).join('\n')}\n`;
  }
  if (job.error) {
    text += `\n## ❌ Error\n\`\`\`\n${job.error}\n\`\`\`\n`;
  }
  if (job.report) {
    text += `\n## Report\n\n${job.report}\n`;
  } else if (job.rawData && job.status === 'completed') {
    text += `\n## Raw Research Data\n\n${job.rawData}\n`;
  }
  return text;
}

/**
 * Register the research job management tools
 */
export function registerJobManagementTools(server: McpServer, orchestrator: ResearchOrchestrator) {
  server.tool(
    'list-research-jobs',
    'List research jobs with their status and progress',
    {
      status: z.enum(JOB_STATUSES).optional().describe('Filter jobs by status (optional)'),
    },
    async ({ status }) => {
      try {
        const jobs = orchestrator.list().filter((job) => !status || job.status === status);
        const stats = orchestrator.getStatistics();

        const formattedJobs = jobs.map((job) => ({
          id: job.id,
          query: job.query,
          status: job.status,
          progress: `${job.progress}%`,
          createdAt: job.createdAt.toISOString(),
          completedAt: job.completedAt?.toISOString(),
          error: job.error,
        }));

        const text = `# Research Jobs

## Statistics
- Total Jobs: ${stats.total}
- Queued: ${stats.byStatus.queued}
- Researching: ${stats.byStatus.researching}
- Generating: ${stats.byStatus.generating}
- Completed: ${stats.byStatus.completed}
- Failed: ${stats.byStatus.failed}
- Max Concurrent: ${stats.queue.maxConcurrent}

## Jobs
${formattedJobs.length === 0 ? 'No jobs found' : `\`\`\`json\n${JSON.stringify(formattedJobs, null, 2)}\n\`\`\``}`;

        return textResult(text);
      } catch (error) {
        return errorResult('Error listing research jobs', error);
      }
    }
  );

  server.tool(
    'get-research-status',
    'Get the status of a research job, with its report once completed',
    {
      job_id: z.string().describe('The ID of the research job'),
    },
    async ({ job_id }) => {
      try {
        return textResult(formatJobStatus(orchestrator.get(job_id)));
      } catch (error) {
        return errorResult('Error getting research status', error);
      }
    }
  );

  server.tool(
    'get-research-progress',
    'Get the progress log of a research job',
    {
      job_id: z.string().describe('The ID of the research job'),
    },
    async ({ job_id }) => {
      try {
        const { job, progressLog } = orchestrator.getProgress(job_id);
        const updates = progressLog
          .map((event) => `- [${event.progress}%] ${event.timestamp.toISOString()} (${event.status}): ${event.message}`)
          .join('\n');

        return textResult(
          `# ${STATUS_EMOJI[job.status]} Research Progress: ${job.id}\n\n**Status**: ${job.status} (${job.progress}%)\n\n## Progress Updates\n${updates}`
        );
      } catch (error) {
        return errorResult('Error getting research progress', error);
      }
    }
  );

  server.tool(
    'delete-research-job',
    'Delete a research job. A job that is still running is cancelled.',
    {
      job_id: z.string().describe('The ID of the research job to delete'),
    },
    async ({ job_id }) => {
      try {
        orchestrator.delete(job_id);
        return textResult(`✅ Research job ${job_id} deleted`);
      } catch (error) {
        return errorResult('Error deleting research job', error);
      }
    }
  );
}
