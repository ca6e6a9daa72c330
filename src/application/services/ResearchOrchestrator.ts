import { randomUUID } from 'crypto';
import {
  Job,
  JobStatus,
  JobSubmitOptions,
  ProgressEvent,
  SOURCE_SELECTIONS,
  isSourceSelection,
} from '../../core/entities/Job.js';
import { assertTransition, isTerminalStatus } from '../../core/entities/JobStateMachine.js';
import {
  JobCancelledError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../../core/errors/ResearchErrors.js';
import { IReportGenerator } from '../../core/interfaces/IReportGenerator.js';
import { JobStore } from '../../infrastructure/store/JobStore.js';
import { JobQueue, QueueStatistics } from '../../infrastructure/queue/JobQueue.js';
import { REPORT_PROVIDERS } from '../../config.js';
import { abortable, sleep } from '../../utils/retry.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { PipelineListener, ResearchPipeline } from './ResearchPipeline.js';

export interface OrchestratorOptions {
  minNumResults: number;
  maxNumResults: number;
  defaultNumResults: number;
  progressStart: number;
  progressComplete: number;
}

export type JobEvent =
  | { type: 'job_updated'; jobId: string; status: JobStatus; progress: number }
  | { type: 'job_deleted'; jobId: string };

export type JobEventListener = (event: JobEvent) => void;

export interface WaitOptions {
  timeoutMs: number;
  pollIntervalMs?: number;
}

export interface ResearchStatistics {
  total: number;
  byStatus: Record<JobStatus, number>;
  queue: QueueStatistics;
}

/**
 * Drives research jobs from submission to a terminal state.
 *
 * The orchestrator is the only writer of the job store. Each job gets an
 * AbortController at submission; deleting the job aborts it, after which
 * the job's task writes nothing.
 */
export class ResearchOrchestrator {
  private controllers: Map<string, AbortController> = new Map();
  private listeners: Set<JobEventListener> = new Set();

  constructor(
    private readonly store: JobStore,
    private readonly queue: JobQueue,
    private readonly pipeline: ResearchPipeline,
    private readonly reportGenerator: IReportGenerator,
    private readonly options: OrchestratorOptions,
    private readonly logger: Logger = createLogger('Orchestrator'),
    private readonly generateId: () => string = randomUUID
  ) {}

  /**
   * Validate and queue a research job. Returns its id immediately.
   */
  submit(
    query: string,
    sources: string = 'both',
    numResults: number = this.options.defaultNumResults,
    submitOptions: JobSubmitOptions = {}
  ): string {
    if (typeof query !== 'string' || query.trim().length === 0) {
      throw new ValidationError('Query cannot be empty', 'query');
    }
    if (!isSourceSelection(sources)) {
      throw new ValidationError(`Sources must be one of: ${SOURCE_SELECTIONS.join(', ')}`, 'sources');
    }
    const { minNumResults, maxNumResults } = this.options;
    if (!Number.isInteger(numResults) || numResults < minNumResults || numResults > maxNumResults) {
      throw new ValidationError(
        `Number of results must be an integer between ${minNumResults} and ${maxNumResults}`,
        'num_results'
      );
    }
    const provider = submitOptions.llmProvider?.toLowerCase();
    if (provider !== undefined && !REPORT_PROVIDERS.some((p) => p === provider)) {
      throw new ValidationError(`LLM provider must be one of: ${REPORT_PROVIDERS.join(', ')}`, 'llm_provider');
    }

    const now = new Date();
    const job: Job = {
      id: this.generateId(),
      query,
      sources,
      numResults,
      llmProvider: provider,
      model: submitOptions.model,
      status: 'queued',
      progress: 0,
      skippedSources: [],
      backendErrors: [],
      createdAt: now,
      progressLog: [{ timestamp: now, status: 'queued', progress: 0, message: 'Research job queued' }],
    };

    this.store.insert(job);
    this.controllers.set(job.id, new AbortController());
    this.queue.enqueue(job.id, (jobId) => this.execute(jobId));

    this.logger.info(`Job ${job.id} submitted: "${query}" (${sources}, ${numResults} per backend)`);
    this.emit({ type: 'job_updated', jobId: job.id, status: job.status, progress: job.progress });
    return job.id;
  }

  get(jobId: string): Job {
    const job = this.store.get(jobId);
    if (!job) {
      throw new NotFoundError(jobId);
    }
    return job;
  }

  /**
   * All jobs in creation order
   */
  list(): Job[] {
    return this.store.list();
  }

  getProgress(jobId: string): { job: Job; progressLog: ProgressEvent[] } {
    const job = this.get(jobId);
    return { job, progressLog: job.progressLog };
  }

  /**
   * Remove a job. A queued job leaves the queue; a running one is cancelled.
   */
  delete(jobId: string): void {
    if (!this.store.delete(jobId)) {
      throw new NotFoundError(jobId);
    }

    const wasQueued = this.queue.remove(jobId);
    const controller = this.controllers.get(jobId);
    if (controller) {
      controller.abort(new JobCancelledError(jobId));
      this.controllers.delete(jobId);
    }

    this.logger.info(`Job ${jobId} deleted${wasQueued ? ' before it started' : ''}`);
    this.emit({ type: 'job_deleted', jobId });
  }

  /**
   * Poll until the job reaches a terminal state or the timeout passes.
   * Resolves with the latest snapshot either way.
   */
  async waitForJob(jobId: string, options: WaitOptions): Promise<Job> {
    const pollIntervalMs = options.pollIntervalMs ?? 500;
    const deadline = Date.now() + options.timeoutMs;

    let job = this.get(jobId);
    while (!isTerminalStatus(job.status) && Date.now() < deadline) {
      await sleep(Math.min(pollIntervalMs, Math.max(0, deadline - Date.now())));
      job = this.get(jobId);
    }
    return job;
  }

  getStatistics(): ResearchStatistics {
    const byStatus: Record<JobStatus, number> = {
      queued: 0,
      researching: 0,
      generating: 0,
      completed: 0,
      failed: 0,
    };
    const jobs = this.store.list();
    for (const job of jobs) {
      byStatus[job.status]++;
    }
    return { total: jobs.length, byStatus, queue: this.queue.getStatistics() };
  }

  onJobEvent(listener: JobEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Cancel every unfinished job and wait for their tasks to return.
   * Persisted jobs cut short this way are failed on the next start.
   */
  async shutdown(): Promise<void> {
    for (const [jobId, controller] of this.controllers) {
      controller.abort(new JobCancelledError(jobId));
      this.queue.remove(jobId);
    }
    this.controllers.clear();
    await this.queue.whenIdle();
  }

  private async execute(jobId: string): Promise<void> {
    const controller = this.controllers.get(jobId);
    if (!controller || controller.signal.aborted) {
      return;
    }
    const signal = controller.signal;

    try {
      const job = this.transition(jobId, 'researching', this.options.progressStart, 'Starting search', (j) => {
        j.startedAt = new Date();
      });
      if (!job) return;

      const result = await this.pipeline.run(job, signal, this.listenerFor(jobId));
      signal.throwIfAborted();

      this.transition(
        jobId,
        'generating',
        this.options.progressComplete,
        `Research complete: content extracted from ${result.extractedCount} of ${result.hitCount} sources`,
        (j) => {
          j.rawData = result.rawData;
        }
      );

      await this.generateReport(job, result.rawData, signal);
    } catch (error) {
      if (signal.aborted) {
        this.logger.info(`Job ${jobId} cancelled`);
        return;
      }
      this.fail(jobId, errorMessage(error));
    } finally {
      this.controllers.delete(jobId);
    }
  }

  private async generateReport(job: Job, rawData: string, signal: AbortSignal): Promise<void> {
    const provider = job.llmProvider;

    if (!this.reportGenerator.isAvailable(provider)) {
      const message = `Completed without report: no ${provider ?? 'report'} provider configured`;
      this.logger.info(`Job ${job.id}: ${message}`);
      this.transition(job.id, 'completed', 100, message);
      return;
    }

    let report: string;
    try {
      report = await abortable(this.reportGenerator.generate(rawData, job.query, provider, job.model), signal);
    } catch (error) {
      signal.throwIfAborted();
      const message = `Completed without report: ${errorMessage(error)}`;
      this.logger.warn(`Job ${job.id}: ${message}`);
      this.transition(job.id, 'completed', 100, message);
      return;
    }
    signal.throwIfAborted();

    this.transition(job.id, 'completed', 100, 'Report generated', (j) => {
      j.report = report;
    });
  }

  private listenerFor(jobId: string): PipelineListener {
    return {
      progress: (progress, message) => this.recordProgress(jobId, progress, message),
      skipped: (source) => {
        this.store.update(jobId, (job) => {
          job.skippedSources.push(source);
        });
      },
      backendFailed: (failure) => {
        this.store.update(jobId, (job) => {
          job.backendErrors.push(failure);
        });
      },
    };
  }

  private recordProgress(jobId: string, progress: number, message: string): void {
    const updated = this.store.update(jobId, (job) => {
      if (!isTerminalStatus(job.status)) {
        job.progress = Math.max(job.progress, progress);
      }
    });
    if (!updated || isTerminalStatus(updated.status)) return;

    this.store.appendProgress(jobId, {
      timestamp: new Date(),
      status: updated.status,
      progress: updated.progress,
      message,
    });
  }

  private fail(jobId: string, message: string): void {
    try {
      this.transition(jobId, 'failed', 0, `Research failed: ${message}`, (j) => {
        j.error = message;
      });
      this.logger.error(`Job ${jobId} failed: ${message}`);
    } catch (error) {
      this.logger.error(`Job ${jobId} could not be marked failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Move a job along the state machine, append the progress event and notify listeners.
   * Returns undefined when the job has been deleted.
   */
  private transition(
    jobId: string,
    to: JobStatus,
    progress: number,
    message: string,
    mutate?: (job: Job) => void
  ): Job | undefined {
    const now = new Date();
    const updated = this.store.update(jobId, (job) => {
      assertTransition(job.status, to);
      job.status = to;
      job.progress = Math.max(job.progress, progress);
      if (isTerminalStatus(to)) {
        job.completedAt = now;
      }
      mutate?.(job);
    });
    if (!updated) return undefined;

    this.store.appendProgress(jobId, { timestamp: now, status: to, progress: updated.progress, message });
    this.logger.debug(`Job ${jobId} -> ${to} (${updated.progress}%)`);
    this.emit({ type: 'job_updated', jobId, status: to, progress: updated.progress });
    return updated;
  }

  private emit(event: JobEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error(`Job event listener failed: ${errorMessage(error)}`);
      }
    }
  }
}
