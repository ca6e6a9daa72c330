import { BackendKind, SearchErrorKind } from './SourceHit.js';

/**
 * Research job domain entity
 */
export const JOB_STATUSES = ['queued', 'researching', 'generating', 'completed', 'failed'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const SOURCE_SELECTIONS = ['web', 'academic', 'both'] as const;

export type SourceSelection = (typeof SOURCE_SELECTIONS)[number];

export function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

export function isSourceSelection(value: string): value is SourceSelection {
  return SOURCE_SELECTIONS.some((selection) => selection === value);
}

export interface ProgressEvent {
  timestamp: Date;
  status: JobStatus;
  progress: number;
  message: string;
}

/**
 * A hit whose content could not be extracted. Kept on the job for
 * inspection; never part of raw data.
 */
export interface SkippedSource {
  url: string;
  title: string;
  backendKind: BackendKind;
  reason: string;
}

/**
 * A backend that failed for this job while others carried on.
 */
export interface BackendFailure {
  backendKind: BackendKind;
  kind: SearchErrorKind;
  message: string;
}

export interface Job {
  id: string;
  query: string;
  sources: SourceSelection;
  numResults: number;
  llmProvider?: string;
  model?: string;
  status: JobStatus;
  progress: number; // 0-100
  rawData?: string;
  report?: string;
  error?: string;
  skippedSources: SkippedSource[];
  backendErrors: BackendFailure[];
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  progressLog: ProgressEvent[];
}

export interface JobSubmitOptions {
  llmProvider?: string;
  model?: string;
}

/**
 * Backends searched for a given source selection, in a fixed order.
 */
export function backendsFor(sources: SourceSelection): BackendKind[] {
  if (sources === 'both') {
    return ['web', 'academic'];
  }
  return [sources];
}

/**
 * Deep copy of a job, safe to hand out to callers.
 */
export function snapshotJob(job: Job): Job {
  return structuredClone(job);
}
