import Database from 'better-sqlite3';
import { z } from 'zod';
import { IJobRepository } from '../../../core/interfaces/IJobRepository.js';
import { JOB_STATUSES, Job, ProgressEvent, SOURCE_SELECTIONS } from '../../../core/entities/Job.js';
import { BACKEND_KINDS, SEARCH_ERROR_KINDS } from '../../../core/entities/SourceHit.js';

const SkippedSourcesSchema = z.array(
  z.object({
    url: z.string(),
    title: z.string(),
    backendKind: z.enum(BACKEND_KINDS),
    reason: z.string(),
  })
);

const BackendErrorsSchema = z.array(
  z.object({
    backendKind: z.enum(BACKEND_KINDS),
    kind: z.enum(SEARCH_ERROR_KINDS),
    message: z.string(),
  })
);

const JobRowSchema = z.object({
  id: z.string(),
  query: z.string(),
  sources: z.enum(SOURCE_SELECTIONS),
  num_results: z.number().int(),
  llm_provider: z.string().nullable(),
  model: z.string().nullable(),
  status: z.enum(JOB_STATUSES),
  progress: z.number().int(),
  raw_data: z.string().nullable(),
  report: z.string().nullable(),
  error: z.string().nullable(),
  skipped_sources: z.string(),
  backend_errors: z.string(),
  created_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
});

const ProgressRowSchema = z.object({
  timestamp: z.string(),
  status: z.enum(JOB_STATUSES),
  progress: z.number().int(),
  message: z.string(),
});

/**
 * SQLite implementation of job repository
 */
export class JobRepository implements IJobRepository {
  constructor(private db: Database.Database) {}

  saveJob(job: Job): void {
    const stmt = this.db.prepare(`
      INSERT INTO research_jobs (
        id, query, sources, num_results, llm_provider, model, status, progress,
        raw_data, report, error, skipped_sources, backend_errors,
        created_at, started_at, completed_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        status = excluded.status,
        progress = excluded.progress,
        raw_data = excluded.raw_data,
        report = excluded.report,
        error = excluded.error,
        skipped_sources = excluded.skipped_sources,
        backend_errors = excluded.backend_errors,
        started_at = excluded.started_at,
        completed_at = excluded.completed_at
    `);

    stmt.run(
      job.id,
      job.query,
      job.sources,
      job.numResults,
      job.llmProvider ?? null,
      job.model ?? null,
      job.status,
      job.progress,
      job.rawData ?? null,
      job.report ?? null,
      job.error ?? null,
      JSON.stringify(job.skippedSources),
      JSON.stringify(job.backendErrors),
      job.createdAt.toISOString(),
      job.startedAt ? job.startedAt.toISOString() : null,
      job.completedAt ? job.completedAt.toISOString() : null
    );
  }

  loadJob(jobId: string): Job | null {
    const row = this.db.prepare<[string], unknown>('SELECT * FROM research_jobs WHERE id = ?').get(jobId);
    return row ? this.toJob(row) : null;
  }

  getAllJobs(): Job[] {
    const rows = this.db
      .prepare<[], unknown>('SELECT * FROM research_jobs ORDER BY created_at ASC, rowid ASC')
      .all();
    return rows.map((row) => this.toJob(row));
  }

  saveJobProgress(jobId: string, event: ProgressEvent): void {
    const stmt = this.db.prepare(`
      INSERT INTO research_job_progress (job_id, timestamp, status, progress, message)
      VALUES (?, ?, ?, ?, ?)
    `);

    stmt.run(jobId, event.timestamp.toISOString(), event.status, event.progress, event.message);
  }

  loadJobProgress(jobId: string): ProgressEvent[] {
    const rows = this.db
      .prepare<[string], unknown>('SELECT * FROM research_job_progress WHERE job_id = ? ORDER BY id')
      .all(jobId);

    return rows.map((raw) => {
      const row = ProgressRowSchema.parse(raw);
      return {
        timestamp: new Date(row.timestamp),
        status: row.status,
        progress: row.progress,
        message: row.message,
      };
    });
  }

  deleteJob(jobId: string): boolean {
    // Progress rows go with the job through ON DELETE CASCADE
    const result = this.db.prepare('DELETE FROM research_jobs WHERE id = ?').run(jobId);
    return result.changes > 0;
  }

  private toJob(raw: unknown): Job {
    const row = JobRowSchema.parse(raw);

    return {
      id: row.id,
      query: row.query,
      sources: row.sources,
      numResults: row.num_results,
      llmProvider: row.llm_provider ?? undefined,
      model: row.model ?? undefined,
      status: row.status,
      progress: row.progress,
      rawData: row.raw_data ?? undefined,
      report: row.report ?? undefined,
      error: row.error ?? undefined,
      skippedSources: SkippedSourcesSchema.parse(JSON.parse(row.skipped_sources)),
      backendErrors: BackendErrorsSchema.parse(JSON.parse(row.backend_errors)),
      createdAt: new Date(row.created_at),
      startedAt: row.started_at ? new Date(row.started_at) : undefined,
      completedAt: row.completed_at ? new Date(row.completed_at) : undefined,
      progressLog: this.loadJobProgress(row.id),
    };
  }
}
