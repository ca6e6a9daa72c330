import { Job, ProgressEvent, snapshotJob } from '../../core/entities/Job.js';
import { isTerminalStatus } from '../../core/entities/JobStateMachine.js';
import { IJobRepository } from '../../core/interfaces/IJobRepository.js';
import { Logger, createLogger } from '../../utils/logger.js';

export const INTERRUPTED_MESSAGE = 'Interrupted by server restart';

/**
 * Process-wide map of job id to job record.
 *
 * Every operation is synchronous, so a read issued after a write observes it.
 * Callers only ever receive deep copies; the live records are reachable
 * solely through `update` and `appendProgress`.
 *
 * With a repository attached, each mutation is written through. Persistence
 * failures are logged and do not disturb the in-memory state.
 */
export class JobStore {
  private jobs: Map<string, Job> = new Map();

  constructor(
    private readonly jobRepo?: IJobRepository,
    private readonly logger: Logger = createLogger('JobStore')
  ) {}

  /**
   * Load jobs left by a previous process. Non-terminal jobs cannot resume
   * and are recorded as failed.
   */
  loadPersisted(): { loaded: number; interrupted: number } {
    if (!this.jobRepo) {
      return { loaded: 0, interrupted: 0 };
    }

    const persisted = this.jobRepo.getAllJobs();
    let interrupted = 0;

    for (const job of persisted) {
      if (!isTerminalStatus(job.status)) {
        const now = new Date();
        const event: ProgressEvent = {
          timestamp: now,
          status: 'failed',
          progress: job.progress,
          message: INTERRUPTED_MESSAGE,
        };
        job.status = 'failed';
        job.error = INTERRUPTED_MESSAGE;
        job.completedAt = now;
        job.progressLog.push(event);
        this.persist(job, event);
        interrupted++;
      }
      this.jobs.set(job.id, job);
    }

    this.logger.info(`Loaded ${persisted.length} jobs from database (${interrupted} interrupted)`);
    return { loaded: persisted.length, interrupted };
  }

  insert(job: Job): Job {
    if (this.jobs.has(job.id)) {
      throw new Error(`Job ${job.id} already exists`);
    }
    const record = snapshotJob(job);
    this.jobs.set(record.id, record);
    this.persist(record);
    for (const event of record.progressLog) {
      this.persistProgress(record.id, event);
    }
    return snapshotJob(record);
  }

  get(jobId: string): Job | undefined {
    const job = this.jobs.get(jobId);
    return job ? snapshotJob(job) : undefined;
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  /**
   * Snapshots in creation order
   */
  list(): Job[] {
    return Array.from(this.jobs.values(), (job) => snapshotJob(job));
  }

  /**
   * Apply a mutation to the live record. Returns the updated snapshot, or
   * undefined when the job no longer exists.
   */
  update(jobId: string, mutate: (job: Job) => void): Job | undefined {
    const job = this.jobs.get(jobId);
    if (!job) {
      return undefined;
    }
    mutate(job);
    this.persist(job);
    return snapshotJob(job);
  }

  appendProgress(jobId: string, event: ProgressEvent): boolean {
    const job = this.jobs.get(jobId);
    if (!job) {
      return false;
    }
    job.progressLog.push({ ...event });
    this.persistProgress(jobId, event);
    return true;
  }

  delete(jobId: string): boolean {
    const existed = this.jobs.delete(jobId);
    if (existed && this.jobRepo) {
      try {
        this.jobRepo.deleteJob(jobId);
      } catch (error) {
        this.logger.error(`Failed to delete job ${jobId} from database:`, error);
      }
    }
    return existed;
  }

  size(): number {
    return this.jobs.size;
  }

  private persist(job: Job, event?: ProgressEvent): void {
    if (!this.jobRepo) return;
    try {
      this.jobRepo.saveJob(job);
    } catch (error) {
      this.logger.error(`Failed to persist job ${job.id} to database:`, error);
    }
    if (event) {
      this.persistProgress(job.id, event);
    }
  }

  private persistProgress(jobId: string, event: ProgressEvent): void {
    if (!this.jobRepo) return;
    try {
      this.jobRepo.saveJobProgress(jobId, event);
    } catch (error) {
      this.logger.error(`Failed to persist progress for job ${jobId}:`, error);
    }
  }
}
