import { Job, ProgressEvent } from '../entities/Job.js';

/**
 * Interface for research job persistence
 */
export interface IJobRepository {
  saveJob(job: Job): void;

  loadJob(jobId: string): Job | null;

  getAllJobs(): Job[];

  saveJobProgress(jobId: string, event: ProgressEvent): void;

  loadJobProgress(jobId: string): ProgressEvent[];

  deleteJob(jobId: string): boolean;
}
