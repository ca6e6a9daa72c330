import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { BackendKind } from '../core/entities/SourceHit.js';
import { ISearchAdapter } from '../core/interfaces/ISearchAdapter.js';
import { IReportProvider } from '../core/interfaces/IReportGenerator.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { JobRepository } from '../infrastructure/database/repositories/JobRepository.js';
import { OllamaApiClient } from '../infrastructure/http/OllamaApiClient.js';
import { JobQueue } from '../infrastructure/queue/JobQueue.js';
import { JobStore } from '../infrastructure/store/JobStore.js';
import { WebSearchAdapter } from '../infrastructure/search/WebSearchAdapter.js';
import { AcademicSearchAdapter } from '../infrastructure/search/AcademicSearchAdapter.js';
import { HtmlContentExtractor } from '../infrastructure/extraction/HtmlContentExtractor.js';
import { OllamaReportProvider } from '../infrastructure/llm/OllamaReportProvider.js';
import { OpenAIReportProvider } from '../infrastructure/llm/OpenAIReportProvider.js';
import { ResearchApi } from '../infrastructure/web/ResearchApi.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { ReportService } from '../application/services/ReportService.js';
import { ResearchPipeline } from '../application/services/ResearchPipeline.js';
import { ResearchOrchestrator } from '../application/services/ResearchOrchestrator.js';
import { HealthService } from '../application/services/HealthService.js';
import { CircuitBreaker } from '../utils/retry.js';
import { Logger, createLogger } from '../utils/logger.js';
import { registerResearchTools } from './tools/ResearchTools.js';
import { registerJobManagementTools } from './tools/JobManagementTools.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';
import { registerResearchPrompt } from './prompts/ResearchPrompt.js';

/**
 * MCP server with every research tool and prompt registered
 */
export function createResearchMcpServer(
  info: { name: string; version: string },
  orchestrator: ResearchOrchestrator,
  healthService: HealthService
): BaseMcpServer {
  const server = new BaseMcpServer(info);
  registerResearchTools(server, orchestrator);
  registerJobManagementTools(server, orchestrator);
  registerHealthCheckTool(server, healthService);
  registerResearchPrompt(server);
  return server;
}

/**
 * Main server class that wires all components together
 */
export class McpServer {
  private server: BaseMcpServer;
  private orchestrator: ResearchOrchestrator;
  private store: JobStore;
  private dbConnection: DatabaseConnection | null = null;
  private webServer: WebServer | null = null;
  private logger: Logger;

  constructor(private config: Config) {
    const level = config.server.logLevel;
    this.logger = createLogger('Server', level);

    if (config.database.enabled) {
      this.dbConnection = new DatabaseConnection(config.database.path);
    }
    const jobRepo = this.dbConnection ? new JobRepository(this.dbConnection.getDatabase()) : undefined;
    this.store = new JobStore(jobRepo, createLogger('JobStore', level));

    const adapters = new Map<BackendKind, ISearchAdapter>([
      ['web', new WebSearchAdapter(config.search, undefined, createLogger('WebSearch', level))],
      ['academic', new AcademicSearchAdapter(config.search, undefined, createLogger('AcademicSearch', level))],
    ]);
    const extractor = new HtmlContentExtractor(
      { ...config.extraction, userAgent: config.search.userAgent },
      undefined,
      createLogger('ContentExtractor', level)
    );

    let ollamaClient: OllamaApiClient | undefined;
    const providers: IReportProvider[] = [];
    if (config.report.ollamaApiUrl) {
      ollamaClient = new OllamaApiClient(config.report.ollamaApiUrl, {
        timeoutMs: config.report.timeoutMs,
        circuitBreaker: new CircuitBreaker(5, 60000),
        retryConfig: config.retry,
        logger: createLogger('Ollama', level),
      });
      providers.push(new OllamaReportProvider(ollamaClient));
    }
    if (config.report.openaiApiKey) {
      providers.push(
        new OpenAIReportProvider({ name: 'openai', apiKey: config.report.openaiApiKey, timeoutMs: config.report.timeoutMs })
      );
    }
    if (config.report.groqApiKey) {
      providers.push(
        new OpenAIReportProvider({ name: 'groq', apiKey: config.report.groqApiKey, timeoutMs: config.report.timeoutMs })
      );
    }
    const reportService = new ReportService(
      providers,
      {
        defaultProvider: config.report.defaultProvider,
        defaultModel: config.report.defaultModel,
        timeoutMs: config.report.timeoutMs,
      },
      createLogger('ReportService', level)
    );

    const pipeline = new ResearchPipeline(
      adapters,
      extractor,
      {
        maxResultsPerBackend: config.search.maxResultsPerBackend,
        overfetchFactor: config.search.overfetchFactor,
        perJobConcurrency: config.jobQueue.perJobConcurrency,
        progressStart: config.progress.researchStart,
        progressComplete: config.progress.researchComplete,
        maxRawDataSize: config.research.maxRawDataSize,
        searchTimeoutMs: { web: config.search.webTimeoutMs, academic: config.search.academicTimeoutMs },
        extractionTimeoutMs: config.extraction.timeoutMs,
        retry: config.retry,
      },
      createLogger('ResearchPipeline', level)
    );

    this.orchestrator = new ResearchOrchestrator(
      this.store,
      new JobQueue(config.jobQueue.maxConcurrentJobs, createLogger('JobQueue', level)),
      pipeline,
      reportService,
      {
        minNumResults: config.search.minNumResults,
        maxNumResults: config.search.maxNumResults,
        defaultNumResults: config.search.defaultNumResults,
        progressStart: config.progress.researchStart,
        progressComplete: config.progress.researchComplete,
      },
      createLogger('Orchestrator', level)
    );

    const healthService = new HealthService(
      this.orchestrator,
      reportService,
      this.dbConnection ?? undefined,
      ollamaClient
    );

    if (config.api.enabled) {
      const api = new ResearchApi(
        this.orchestrator,
        healthService,
        { name: config.server.name, version: config.server.version },
        createLogger('ResearchApi', level)
      );
      this.webServer = new WebServer(api, this.orchestrator, config.api.port, createLogger('WebServer', level));
    }

    this.server = createResearchMcpServer(
      { name: config.server.name, version: config.server.version },
      this.orchestrator,
      healthService
    );
  }

  /**
   * Print database statistics
   */
  printStats() {
    if (!this.dbConnection) return;
    const stats = this.dbConnection.getStatistics();
    this.logger.info(
      `📊 Database: ${stats.totalJobs} jobs (${stats.jobStats.completed} completed, ${stats.jobStats.failed} failed), ${(stats.databaseSize / 1024).toFixed(2)} KB`
    );
  }

  async start() {
    if (this.dbConnection) {
      this.logger.debug(`Database initialized at: ${this.dbConnection.getDatabasePath()}`);
      this.store.loadPersisted();
    }

    if (this.webServer) {
      try {
        await this.webServer.start();
      } catch (error) {
        this.logger.warn('Failed to start REST API:', error);
        this.webServer = null;
      }
    }

    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      this.logger.warn(`stdin error (non-fatal): ${error.message}`);
    });
    process.stdin.on('end', () => {
      this.logger.warn('stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    this.logger.info(`✅ ${this.config.server.name} MCP server running on stdio`);
  }

  /**
   * Graceful shutdown: cancel running jobs, then close the servers and the database
   */
  async shutdown() {
    this.logger.info('👋 Shutting down gracefully...');

    await this.orchestrator.shutdown();

    if (this.webServer) {
      await this.webServer.stop();
    }
    await this.server.close();

    this.dbConnection?.close();
  }
}
