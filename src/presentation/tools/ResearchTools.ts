import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ResearchOrchestrator } from '../../application/services/ResearchOrchestrator.js';
import { Job, SOURCE_SELECTIONS } from '../../core/entities/Job.js';
import { REPORT_PROVIDERS } from '../../config.js';
import { errorMessage } from '../../core/errors/ResearchErrors.js';

export interface ResearchToolOptions {
  defaultTimeoutSeconds: number;
  pollIntervalMs: number;
}

const DEFAULT_OPTIONS: ResearchToolOptions = {
  defaultTimeoutSeconds: 300,
  pollIntervalMs: 1000,
};

function formatFinishedJob(job: Job): string {
  if (job.status === 'failed') {
    return `# ❌ Research Failed\n\n**Job ID**: ${job.id}\n**Query**: ${job.query}\n\n\`\`\`\n${job.error ?? 'Unknown error'}\n\`\`\``;
  }

  const skipped = job.skippedSources.length;
  const degraded = job.backendErrors.map((e) => `- ${e.message}`).join('\n');
  let text = `# ✅ Research Complete\n\n**Job ID**: ${job.id}\n**Query**: ${job.query}\n**Sources**: ${job.sources}\n`;
  if (skipped > 0) {
    text += `**Skipped sources**: ${skipped}\n`;
  }
  if (degraded) {
    text += `\n## Degraded backends\n${degraded}\n`;
  }

  if (job.report) {
    text += `\n## Report\n\n${job.report}`;
  } else {
    const reason = job.progressLog[job.progressLog.length - 1]?.message ?? 'No report generated';
    text += `\n_${reason}_\n\n## Raw Research Data\n\n${job.rawData ?? ''}`;
  }
  return text;
}

function formatPendingJob(job: Job): string {
  return `# ⏳ Research In Progress

**Job ID**: ${job.id}
**Status**: ${job.status}
**Progress**: ${job.progress}%

The job is still running. Use \`get-research-status\` with job ID \`${job.id}\` to check on it.`;
}

/**
 * Register the deep-research tool
 */
export function registerResearchTools(
  server: McpServer,
  orchestrator: ResearchOrchestrator,
  options: ResearchToolOptions = DEFAULT_OPTIONS
) {
  server.tool(
    'deep-research',
    'Research a topic across web and academic sources, extract content from the best hits and write a report',
    {
      query: z.string().describe('The research question or topic'),
      sources: z
        .enum(SOURCE_SELECTIONS)
        .optional()
        .describe('"web" for general information, "academic" for scholarly sources, "both" for all (default)'),
      num_results: z.number().int().optional().describe('Sources to extract per backend'),
      llm_provider: z.enum(REPORT_PROVIDERS).optional().describe('Provider that writes the report'),
      model: z.string().optional().describe('Model name for the report provider'),
      wait_for_completion: z
        .boolean()
        .optional()
        .describe('Wait for the job to finish and return its report (default: true)'),
      timeout_seconds: z
        .number()
        .positive()
        .optional()
        .describe(`Maximum time to wait when waiting for completion (default: ${options.defaultTimeoutSeconds})`),
    },
    async ({ query, sources, num_results, llm_provider, model, wait_for_completion, timeout_seconds }) => {
      try {
        const jobId = orchestrator.submit(query, sources, num_results, { llmProvider: llm_provider, model });

        if (wait_for_completion === false) {
          return {
            content: [
              {
                type: 'text',
                text: `# 🔍 Research Job Started\n\n**Job ID**: ${jobId}\n**Query**: ${query}\n\nUse \`get-research-status\` or \`get-research-progress\` with this job ID to follow it.`,
              },
            ],
          };
        }

        const job = await orchestrator.waitForJob(jobId, {
          timeoutMs: (timeout_seconds ?? options.defaultTimeoutSeconds) * 1000,
          pollIntervalMs: options.pollIntervalMs,
        });

        if (job.status === 'completed' || job.status === 'failed') {
          return {
            isError: job.status === 'failed',
            content: [{ type: 'text', text: formatFinishedJob(job) }],
          };
        }
        return { content: [{ type: 'text', text: formatPendingJob(job) }] };
      } catch (error) {
        return {
          isError: true,
          content: [{ type: 'text', text: `Research error: ${errorMessage(error)}` }],
        };
      }
    }
  );
}
