import { BackendFailure, Job, JobStatus, ProgressEvent, SkippedSource, SourceSelection } from '../core/entities/Job.js';

export interface SerializedProgressEvent {
  timestamp: string;
  status: JobStatus;
  progress: number;
  message: string;
}

export interface SerializedJob {
  id: string;
  query: string;
  sources: SourceSelection;
  num_results: number;
  llm_provider: string | null;
  model: string | null;
  status: JobStatus;
  progress: number;
  raw_data: string | null;
  report: string | null;
  error: string | null;
  skipped_sources: Array<{ url: string; title: string; backend_kind: string; reason: string }>;
  backend_errors: Array<{ backend_kind: string; kind: string; message: string }>;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}

function serializeSkipped(source: SkippedSource): SerializedJob['skipped_sources'][number] {
  return { url: source.url, title: source.title, backend_kind: source.backendKind, reason: source.reason };
}

function serializeBackendError(failure: BackendFailure): SerializedJob['backend_errors'][number] {
  return { backend_kind: failure.backendKind, kind: failure.kind, message: failure.message };
}

/**
 * Wire form of a job: snake_case fields, ISO timestamps, null for absent values
 */
export function serializeJob(job: Job): SerializedJob {
  return {
    id: job.id,
    query: job.query,
    sources: job.sources,
    num_results: job.numResults,
    llm_provider: job.llmProvider ?? null,
    model: job.model ?? null,
    status: job.status,
    progress: job.progress,
    raw_data: job.rawData ?? null,
    report: job.report ?? null,
    error: job.error ?? null,
    skipped_sources: job.skippedSources.map(serializeSkipped),
    backend_errors: job.backendErrors.map(serializeBackendError),
    created_at: job.createdAt.toISOString(),
    started_at: job.startedAt?.toISOString() ?? null,
    completed_at: job.completedAt?.toISOString() ?? null,
  };
}

export function serializeProgressEvent(event: ProgressEvent): SerializedProgressEvent {
  return {
    timestamp: event.timestamp.toISOString(),
    status: event.status,
    progress: event.progress,
    message: event.message,
  };
}
