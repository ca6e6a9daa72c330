import { IReportGenerator } from '../../core/interfaces/IReportGenerator.js';
import { IOllamaClient } from '../../core/interfaces/IOllamaClient.js';
import { errorMessage } from '../../core/errors/ResearchErrors.js';
import { DatabaseConnection, DatabaseStatistics } from '../../infrastructure/database/DatabaseConnection.js';
import { CircuitBreakerStats } from '../../utils/retry.js';
import { ResearchOrchestrator, ResearchStatistics } from './ResearchOrchestrator.js';

type ComponentStatus = 'healthy' | 'error' | 'disabled';

export interface HealthReport {
  timestamp: string;
  status: 'healthy' | 'degraded';
  components: {
    jobs: ResearchStatistics;
    reports: {
      status: ComponentStatus;
      providers: string[];
    };
    database: {
      status: ComponentStatus;
      message: string;
      statistics?: DatabaseStatistics;
    };
    ollama: {
      status: ComponentStatus;
      message: string;
      models?: string[];
      circuitBreaker?: CircuitBreakerStats;
    };
  };
}

/**
 * Health of the orchestrator and the services around it
 */
export class HealthService {
  constructor(
    private readonly orchestrator: ResearchOrchestrator,
    private readonly reportGenerator: IReportGenerator,
    private readonly database?: DatabaseConnection,
    private readonly ollama?: IOllamaClient
  ) {}

  async check(): Promise<HealthReport> {
    const providers = this.reportGenerator.listProviders();
    const health: HealthReport = {
      timestamp: new Date().toISOString(),
      status: 'healthy',
      components: {
        jobs: this.orchestrator.getStatistics(),
        reports: { status: providers.length > 0 ? 'healthy' : 'disabled', providers },
        database: { status: 'disabled', message: 'Persistence disabled' },
        ollama: { status: 'disabled', message: 'Ollama not configured' },
      },
    };

    if (this.database) {
      try {
        const statistics = this.database.getStatistics();
        health.components.database = {
          status: 'healthy',
          message: `Database connected - ${statistics.totalJobs} jobs stored`,
          statistics,
        };
      } catch (error) {
        health.components.database = { status: 'error', message: errorMessage(error) };
        health.status = 'degraded';
      }
    }

    if (this.ollama) {
      const circuitBreaker = this.ollama.getCircuitBreakerStats();
      try {
        const models = await this.ollama.listModels();
        health.components.ollama = {
          status: 'healthy',
          message: `Ollama is running with ${models.length} models available`,
          models,
          circuitBreaker,
        };
      } catch (error) {
        health.components.ollama = { status: 'error', message: errorMessage(error), circuitBreaker };
        health.status = 'degraded';
      }
    }

    return health;
  }
}
