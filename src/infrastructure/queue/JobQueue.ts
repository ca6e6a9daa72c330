import { Logger, createLogger } from '../../utils/logger.js';

export type QueueTask = (jobId: string) => Promise<void>;

export interface QueueStatistics {
  pending: number;
  running: number;
  maxConcurrent: number;
}

interface QueueEntry {
  jobId: string;
  task: QueueTask;
}

/**
 * FIFO job queue with a bound on concurrently running tasks.
 *
 * Dispatch is deferred to the next turn of the event loop, so a job enqueued
 * by a caller is still pending when that caller's synchronous code finishes.
 */
export class JobQueue {
  private pending: QueueEntry[] = [];
  private running: Set<string> = new Set();
  private idleWaiters: Array<() => void> = [];
  private dispatchScheduled = false;

  constructor(
    private readonly maxConcurrent: number = 2,
    private readonly logger: Logger = createLogger('JobQueue')
  ) {}

  /**
   * Add a task to the queue
   */
  enqueue(jobId: string, task: QueueTask): void {
    this.pending.push({ jobId, task });
    this.logger.debug(`Job ${jobId} queued (${this.pending.length} pending)`);
    this.scheduleDispatch();
  }

  /**
   * Drop a task that has not started yet. Returns false if it is not pending.
   */
  remove(jobId: string): boolean {
    const index = this.pending.findIndex((entry) => entry.jobId === jobId);
    if (index === -1) {
      return false;
    }
    this.pending.splice(index, 1);
    this.notifyIfIdle();
    return true;
  }

  isPending(jobId: string): boolean {
    return this.pending.some((entry) => entry.jobId === jobId);
  }

  isRunning(jobId: string): boolean {
    return this.running.has(jobId);
  }

  getStatistics(): QueueStatistics {
    return {
      pending: this.pending.length,
      running: this.running.size,
      maxConcurrent: this.maxConcurrent,
    };
  }

  /**
   * Resolves once nothing is pending or running
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private isIdle(): boolean {
    return this.pending.length === 0 && this.running.size === 0;
  }

  private scheduleDispatch(): void {
    if (this.dispatchScheduled) return;
    this.dispatchScheduled = true;
    setImmediate(() => {
      this.dispatchScheduled = false;
      this.processQueue();
    });
  }

  /**
   * Process the queue and start pending tasks while slots are free
   */
  private processQueue(): void {
    while (this.pending.length > 0 && this.running.size < this.maxConcurrent) {
      const entry = this.pending.shift();
      if (!entry) break;
      this.running.add(entry.jobId);
      // run() settles every outcome itself
      void this.run(entry);
    }
  }

  private async run(entry: QueueEntry): Promise<void> {
    this.logger.debug(`Job ${entry.jobId} started (${this.running.size}/${this.maxConcurrent} slots)`);
    try {
      await entry.task(entry.jobId);
    } catch (error) {
      this.logger.error(`Job ${entry.jobId} task rejected:`, error);
    } finally {
      this.running.delete(entry.jobId);
      this.processQueue();
      this.notifyIfIdle();
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
