import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { HealthService } from '../../application/services/HealthService.js';
import { errorMessage } from '../../core/errors/ResearchErrors.js';

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(server: McpServer, healthService: HealthService) {
  server.tool(
    'health-check',
    'Check the health of the research server: job queue, report providers, database and Ollama circuit breaker',
    {},
    async () => {
      try {
        const health = await healthService.check();
        return {
          content: [
            {
              type: 'text',
              text: `# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [{ type: 'text', text: `Health check error: ${errorMessage(error)}` }],
        };
      }
    }
  );
}
