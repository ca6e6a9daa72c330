import { BackendKind, ExtractionErrorKind, SearchErrorKind } from '../entities/SourceHit.js';
import { JobStatus } from '../entities/Job.js';

/**
 * Base class for every error raised by the research system
 */
export class ResearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResearchError';
  }
}

/**
 * Bad submission input, rejected before a job is created
 */
export class ValidationError extends ResearchError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ResearchError {
  constructor(public readonly jobId: string) {
    super(`Research job not found: ${jobId}`);
    this.name = 'NotFoundError';
  }
}

const SEARCH_KIND_LABELS: Record<SearchErrorKind, string> = {
  RateLimited: 'rate limited',
  Unreachable: 'unreachable',
  Malformed: 'malformed response',
};

/**
 * Failure of one backend search call
 */
export class SearchError extends ResearchError {
  public readonly status: number | null;

  constructor(
    public readonly backend: BackendKind,
    public readonly kind: SearchErrorKind,
    public readonly detail: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(`Search error (${backend}): ${SEARCH_KIND_LABELS[kind]} - ${detail}`, options);
    this.name = 'SearchError';
    this.status = options?.status ?? null;
  }
}

/**
 * Failure to turn a single hit into readable text. Never fatal on its own.
 */
export class ExtractionError extends ResearchError {
  constructor(
    public readonly url: string,
    public readonly kind: ExtractionErrorKind,
    public readonly detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Extraction error for ${url}: ${detail}`, options);
    this.name = 'ExtractionError';
  }
}

export class GenerationError extends ResearchError {
  public readonly status: number | null;

  constructor(
    public readonly provider: string,
    detail: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(`Report generation failed (${provider}): ${detail}`, options);
    this.name = 'GenerationError';
    this.status = options?.status ?? null;
  }
}

export class InvalidTransitionError extends ResearchError {
  constructor(
    public readonly from: JobStatus,
    public readonly to: JobStatus
  ) {
    super(`Invalid job status transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Raised inside a pipeline once its job has been deleted
 */
export class JobCancelledError extends ResearchError {
  constructor(public readonly jobId: string) {
    super(`Research job cancelled: ${jobId}`);
    this.name = 'JobCancelledError';
  }
}

export class ConfigurationError extends ResearchError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
