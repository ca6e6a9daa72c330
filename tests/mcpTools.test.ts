import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createResearchMcpServer } from '../src/presentation/McpServer.js';
import { registerResearchTools } from '../src/presentation/tools/ResearchTools.js';
import { registerJobManagementTools } from '../src/presentation/tools/JobManagementTools.js';
import { registerHealthCheckTool } from '../src/presentation/tools/HealthCheckTool.js';
import { HealthService } from '../src/application/services/HealthService.js';
import { ResearchOrchestrator } from '../src/application/services/ResearchOrchestrator.js';
import { SearchError } from '../src/core/errors/ResearchErrors.js';
import { SourceHit } from '../src/core/entities/SourceHit.js';
import { FakeSearchAdapter, createTestSystem, deferred, makeHits } from './helpers/fakes.js';

const INFO = { name: 'deep-research-test', version: '1.0.0-test' };

const ToolResultSchema = z.object({
  isError: z.boolean().optional(),
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
});

const PromptResultSchema = z.object({
  messages: z.array(z.object({ role: z.string(), content: z.object({ type: z.literal('text'), text: z.string() }) })),
});

async function connect(server: McpServer): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: 'deep-research-tests', version: '1.0.0-test' });
  await client.connect(clientTransport);
  return client;
}

function serverFor(orchestrator: ResearchOrchestrator, health: HealthService): McpServer {
  const server = new McpServer(INFO);
  registerResearchTools(server, orchestrator, { defaultTimeoutSeconds: 5, pollIntervalMs: 5 });
  registerJobManagementTools(server, orchestrator);
  registerHealthCheckTool(server, health);
  return server;
}

describe('MCP tools', () => {
  let client: Client;
  let server: McpServer;

  async function call(name: string, args: Record<string, unknown> = {}) {
    return ToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  }

  async function start(system = createTestSystem()) {
    const health = new HealthService(system.orchestrator, system.reports);
    server = serverFor(system.orchestrator, health);
    client = await connect(server);
    return system;
  }

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  test('createResearchMcpServer should expose every tool and the research prompt', async () => {
    const system = createTestSystem();
    server = createResearchMcpServer(INFO, system.orchestrator, new HealthService(system.orchestrator, system.reports));
    client = await connect(server);

    const tools = await client.listTools();
    expect(tools.tools.map((t) => t.name).sort()).toEqual([
      'deep-research',
      'delete-research-job',
      'get-research-progress',
      'get-research-status',
      'health-check',
      'list-research-jobs',
    ]);

    const prompt = PromptResultSchema.parse(
      await client.getPrompt({ name: 'research-prompt', arguments: { topic: 'coral restoration' } })
    );
    expect(prompt.messages[0].role).toBe('user');
    expect(prompt.messages[0].content.text.split('\n')[0]).toBe('I need comprehensive research on: coral restoration');
  });

  test('deep-research should wait for the job and return its report', async () => {
    await start();

    const result = await call('deep-research', { query: 'tidal power', sources: 'web', num_results: 2 });

    expect(result.isError ?? false).toBe(false);
    expect(result.content[0].text).toBe(
      '# ✅ Research Complete\n\n**Job ID**: job-1\n**Query**: tidal power\n**Sources**: web\n\n## Report\n\nReport on tidal power'
    );
  });

  test('deep-research should return at once when not waiting', async () => {
    await start();

    const result = await call('deep-research', { query: 'tidal power', wait_for_completion: false });

    expect(result.isError ?? false).toBe(false);
    expect(result.content[0].text).toBe(
      '# 🔍 Research Job Started\n\n**Job ID**: job-1\n**Query**: tidal power\n\nUse `get-research-status` or `get-research-progress` with this job ID to follow it.'
    );
  });

  test('deep-research should report a failed job as an error', async () => {
    await start(
      createTestSystem({
        adapters: [FakeSearchAdapter.failing('web', new SearchError('web', 'Unreachable', 'HTTP 502 Bad Gateway'))],
      })
    );

    const result = await call('deep-research', { query: 'tidal power', sources: 'web' });

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe(
      '# ❌ Research Failed\n\n**Job ID**: job-1\n**Query**: tidal power\n\n```\nAll search backends failed: Search error (web): unreachable - HTTP 502 Bad Gateway\n```'
    );
  });

  test('deep-research should return the job id when the wait times out', async () => {
    const gate = deferred<SourceHit[]>();
    const system = await start(createTestSystem({ adapters: [new FakeSearchAdapter('web', () => gate.promise)] }));

    const result = await call('deep-research', { query: 'tidal power', sources: 'web', timeout_seconds: 0.05 });

    expect(result.content[0].text).toContain('# ⏳ Research In Progress\n\n**Job ID**: job-1\n**Status**: researching');
    gate.resolve(makeHits('web', 2));
    await system.queue.whenIdle();
  });

  test('deep-research should surface validation errors', async () => {
    await start();

    const result = await call('deep-research', { query: 'tidal power', num_results: 9 });

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe('Research error: Number of results must be an integer between 1 and 5');
  });

  test('job tools should report status, progress and deletion', async () => {
    const { orchestrator } = await start();
    const id = orchestrator.submit('kelp forests', 'web', 1);
    await orchestrator.waitForJob(id, { timeoutMs: 2000, pollIntervalMs: 5 });
    const job = orchestrator.get(id);

    const status = await call('get-research-status', { job_id: id });
    expect(status.content[0].text.startsWith(`# ✅ Research Job: ${id}\n\n## Status\n- **Query**: kelp forests\n`)).toBe(
      true
    );
    expect(status.content[0].text).toContain('\n## Report\n\nReport on kelp forests\n');

    const progress = await call('get-research-progress', { job_id: id });
    expect(progress.content[0].text).toContain(
      `- [0%] ${job.createdAt.toISOString()} (queued): Research job queued\n`
    );

    const listed = await call('list-research-jobs', { status: 'failed' });
    expect(listed.content[0].text).toContain('- Total Jobs: 1\n');
    expect(listed.content[0].text.endsWith('## Jobs\nNo jobs found')).toBe(true);

    const deleted = await call('delete-research-job', { job_id: id });
    expect(deleted.content[0].text).toBe(`✅ Research job ${id} deleted`);

    const missing = await call('get-research-status', { job_id: id });
    expect(missing.isError).toBe(true);
    expect(missing.content[0].text).toBe(`Error getting research status: Research job not found: ${id}`);
  });

  test('health-check should return the health report', async () => {
    await start();

    const result = await call('health-check');
    const text = result.content[0].text;

    expect(text.startsWith('# System Health Check\n\n```json\n')).toBe(true);
    const report: unknown = JSON.parse(text.slice(text.indexOf('{'), text.lastIndexOf('}') + 1));
    expect(report).toMatchObject({
      status: 'healthy',
      components: {
        reports: { status: 'healthy', providers: ['ollama'] },
        database: { status: 'disabled', message: 'Persistence disabled' },
        ollama: { status: 'disabled', message: 'Ollama not configured' },
      },
    });
  });
});
