import { z } from 'zod';
import { NotFoundError, ValidationError, errorMessage } from '../../core/errors/ResearchErrors.js';
import { ResearchOrchestrator } from '../../application/services/ResearchOrchestrator.js';
import { HealthService } from '../../application/services/HealthService.js';
import { serializeJob, serializeProgressEvent } from '../../presentation/serializers.js';
import { Logger, createLogger } from '../../utils/logger.js';

const SubmitBodySchema = z.object({
  query: z.string(),
  sources: z.string().optional(),
  num_results: z.number().optional(),
  llm_provider: z.string().optional(),
  model: z.string().optional(),
});

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface ApiInfo {
  name: string;
  version: string;
}

/**
 * REST handlers, independent of the HTTP framework. Each returns the status and JSON body to send.
 */
export class ResearchApi {
  constructor(
    private readonly orchestrator: ResearchOrchestrator,
    private readonly health: HealthService,
    private readonly info: ApiInfo,
    private readonly logger: Logger = createLogger('ResearchApi')
  ) {}

  root(): ApiResponse {
    return { status: 200, body: { message: `${this.info.name} API`, version: this.info.version } };
  }

  async healthCheck(): Promise<ApiResponse> {
    try {
      return { status: 200, body: await this.health.check() };
    } catch (error) {
      return this.failure(error);
    }
  }

  submit(body: unknown): ApiResponse {
    const parsed = SubmitBodySchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
      return { status: 400, body: { error: `Invalid request body: ${issues.join('; ')}` } };
    }

    return this.handle(201, () => {
      const { query, sources, num_results, llm_provider, model } = parsed.data;
      const jobId = this.orchestrator.submit(query, sources, num_results, { llmProvider: llm_provider, model });
      return serializeJob(this.orchestrator.get(jobId));
    });
  }

  list(): ApiResponse {
    return this.handle(200, () => ({ jobs: this.orchestrator.list().map(serializeJob) }));
  }

  get(jobId: string): ApiResponse {
    return this.handle(200, () => serializeJob(this.orchestrator.get(jobId)));
  }

  progress(jobId: string): ApiResponse {
    return this.handle(200, () => {
      const { job, progressLog } = this.orchestrator.getProgress(jobId);
      return { job: serializeJob(job), progress: progressLog.map(serializeProgressEvent) };
    });
  }

  remove(jobId: string): ApiResponse {
    return this.handle(200, () => {
      this.orchestrator.delete(jobId);
      return { message: `Research job ${jobId} deleted` };
    });
  }

  private handle(status: number, fn: () => unknown): ApiResponse {
    try {
      return { status, body: fn() };
    } catch (error) {
      return this.failure(error);
    }
  }

  private failure(error: unknown): ApiResponse {
    if (error instanceof ValidationError) {
      return { status: 400, body: { error: error.message } };
    }
    if (error instanceof NotFoundError) {
      return { status: 404, body: { error: error.message } };
    }
    this.logger.error(`Request failed: ${errorMessage(error)}`);
    return { status: 500, body: { error: errorMessage(error) } };
  }
}
