import pLimit from 'p-limit';
import { BackendFailure, Job, SkippedSource, backendsFor } from '../../core/entities/Job.js';
import { BackendKind, ExtractedContent, SourceHit } from '../../core/entities/SourceHit.js';
import { ExtractionError, ResearchError, SearchError, errorMessage } from '../../core/errors/ResearchErrors.js';
import { SearchAdapterRegistry } from '../../core/interfaces/ISearchAdapter.js';
import { IContentExtractor } from '../../core/interfaces/IContentExtractor.js';
import { RetryConfig, withDeadline, withRetry } from '../../utils/retry.js';
import { isMeaningfulContent } from '../../utils/contentQuality.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { formatRawData } from './RawDataFormatter.js';

export interface PipelineConfig {
  maxResultsPerBackend: number;
  overfetchFactor: number;
  perJobConcurrency: number;
  progressStart: number;
  progressComplete: number;
  maxRawDataSize: number;
  searchTimeoutMs: Record<BackendKind, number>;
  extractionTimeoutMs: number;
  retry: RetryConfig;
}

/**
 * Receives the pipeline's side effects for one job, in completion order
 */
export interface PipelineListener {
  progress(progress: number, message: string): void;
  skipped(source: SkippedSource): void;
  backendFailed(failure: BackendFailure): void;
}

export interface PipelineResult {
  rawData: string;
  hitCount: number;
  extractedCount: number;
}

type JobInput = Pick<Job, 'id' | 'query' | 'sources' | 'numResults'>;

type Limiter = ReturnType<typeof pLimit>;

interface BackendOutcome {
  kind: BackendKind;
  hits: SourceHit[];
  extracted: ExtractedContent[];
  failure?: BackendFailure;
}

/**
 * Tracks progress across the researching stage:
 * start + floor(done / total * (ceiling - start)), held below the ceiling
 */
class ProgressTracker {
  private done = 0;

  constructor(
    private readonly total: number,
    private readonly start: number,
    private readonly ceiling: number
  ) {}

  advance(units = 1): number {
    this.done = Math.min(this.total, this.done + units);
    const span = this.ceiling - this.start;
    const value = this.start + Math.floor((this.done / this.total) * span);
    return Math.min(value, this.ceiling - 1);
  }
}

/**
 * Academic hits that carry an abstract are resolved from their metadata
 */
export function contentFromMetadata(hit: SourceHit): ExtractedContent | null {
  const meta = hit.metadata;
  if (hit.backendKind !== 'academic' || !meta || !meta.abstract || meta.abstract === 'No abstract available') {
    return null;
  }
  if (!isMeaningfulContent(meta.abstract, '', hit.title)) {
    return null;
  }

  const lines = [`Authors: ${meta.authors}`, `Year: ${meta.year || 'Unknown year'}`];
  if (meta.venue) {
    lines.push(`Published in: ${meta.venue}`);
  }
  lines.push('', 'Abstract:', meta.abstract);

  return {
    title: hit.title,
    url: hit.url,
    description: `Academic paper by ${meta.authors} (${meta.year || 'Unknown year'})`,
    content: lines.join('\n'),
    backendKind: hit.backendKind,
    extractedAt: new Date(),
  };
}

/**
 * The researching stage of a job: searches the selected backends concurrently,
 * extracts content from their hits with a bounded fan-out and assembles raw data.
 *
 * Backend failures degrade the job; it fails only when every backend fails,
 * no backend returns a hit, or no hit yields content.
 */
export class ResearchPipeline {
  constructor(
    private readonly adapters: SearchAdapterRegistry,
    private readonly extractor: IContentExtractor,
    private readonly config: PipelineConfig,
    private readonly logger: Logger = createLogger('ResearchPipeline'),
    private readonly random: () => number = Math.random
  ) {}

  async run(job: JobInput, signal: AbortSignal, listener: PipelineListener): Promise<PipelineResult> {
    const backends = backendsFor(job.sources);
    const progress = new ProgressTracker(
      backends.length * (1 + job.numResults),
      this.config.progressStart,
      this.config.progressComplete
    );
    const limit = pLimit(this.config.perJobConcurrency);

    const outcomes = await Promise.all(
      backends.map((kind) => this.runBackend(kind, job, signal, listener, progress, limit))
    );
    signal.throwIfAborted();

    const failures = outcomes.flatMap((o) => (o.failure ? [o.failure] : []));
    if (failures.length === outcomes.length) {
      throw new ResearchError(`All search backends failed: ${failures.map((f) => f.message).join('; ')}`);
    }

    const hits = outcomes.flatMap((o) => o.hits);
    if (hits.length === 0) {
      throw new ResearchError('No search results found');
    }

    const extracted = outcomes.flatMap((o) => o.extracted);
    if (extracted.length === 0) {
      throw new ResearchError(`Content extraction failed for all ${hits.length} sources`);
    }

    const rawData = formatRawData(
      {
        query: job.query,
        sources: job.sources,
        target: job.numResults * backends.length,
        hits,
        extracted,
        errors: failures.map((f) => f.message),
      },
      this.config.maxRawDataSize
    );

    return { rawData, hitCount: hits.length, extractedCount: extracted.length };
  }

  private async runBackend(
    kind: BackendKind,
    job: JobInput,
    signal: AbortSignal,
    listener: PipelineListener,
    progress: ProgressTracker,
    limit: Limiter
  ): Promise<BackendOutcome> {
    let hits: SourceHit[];
    try {
      hits = await this.search(kind, job, signal);
    } catch (error) {
      signal.throwIfAborted();
      const failure: BackendFailure =
        error instanceof SearchError
          ? { backendKind: kind, kind: error.kind, message: error.message }
          : { backendKind: kind, kind: 'Unreachable', message: `Search error (${kind}): ${errorMessage(error)}` };

      this.logger.warn(`Job ${job.id}: ${failure.message}`);
      listener.backendFailed(failure);
      listener.progress(progress.advance(1 + job.numResults), `Continuing without ${kind} search: ${failure.message}`);
      return { kind, hits: [], extracted: [], failure };
    }
    signal.throwIfAborted();

    listener.progress(progress.advance(), `Found ${hits.length} ${kind} results`);

    const extracted = await this.extractUntilTarget(hits, job, signal, listener, progress, limit);
    return { kind, hits, extracted };
  }

  private search(kind: BackendKind, job: JobInput, signal: AbortSignal): Promise<SourceHit[]> {
    const adapter = this.adapters.get(kind);
    if (!adapter) {
      return Promise.reject(new SearchError(kind, 'Unreachable', 'no adapter configured'));
    }

    const count = Math.min(job.numResults * this.config.overfetchFactor, this.config.maxResultsPerBackend);
    const timeoutMs = this.config.searchTimeoutMs[kind];

    return withRetry(
      () =>
        withDeadline(
          (attemptSignal) => adapter.search(job.query, count, attemptSignal),
          timeoutMs,
          () => new SearchError(kind, 'Unreachable', `timed out after ${timeoutMs}ms`),
          signal
        ),
      this.config.retry,
      {
        signal,
        random: this.random,
        onLog: (log) => {
          if (!log.success && log.nextRetryInMs !== undefined) {
            this.logger.info(
              `Job ${job.id}: ${kind} search attempt ${log.attempt} rate limited, retrying in ${log.nextRetryInMs}ms`
            );
          }
        },
      }
    );
  }

  /**
   * Extract hits in order until `numResults` succeed or candidates run out.
   * A failed extraction hands its slot to the next candidate.
   */
  private async extractUntilTarget(
    hits: SourceHit[],
    job: JobInput,
    signal: AbortSignal,
    listener: PipelineListener,
    progress: ProgressTracker,
    limit: Limiter
  ): Promise<ExtractedContent[]> {
    const target = job.numResults;
    const accepted: Array<{ index: number; content: ExtractedContent }> = [];
    let next = 0;
    let inFlight = 0;
    let unitsReported = 0;

    const report = (message: string) => {
      if (unitsReported < target) {
        unitsReported++;
        listener.progress(progress.advance(), message);
      } else {
        listener.progress(progress.advance(0), message);
      }
    };

    const slot = async (): Promise<void> => {
      while (accepted.length + inFlight < target && next < hits.length) {
        const index = next++;
        const hit = hits[index];
        inFlight++;
        try {
          const content = await limit(() => this.extractHit(hit, signal));
          signal.throwIfAborted();
          accepted.push({ index, content });
          report(`Extracted content from ${hit.url}`);
        } catch (error) {
          signal.throwIfAborted();
          const reason = errorMessage(error);
          this.logger.debug(`Job ${job.id}: skipped ${hit.url}: ${reason}`);
          listener.skipped({ url: hit.url, title: hit.title, backendKind: hit.backendKind, reason });
          report(`Skipped ${hit.url}: ${reason}`);
        } finally {
          inFlight--;
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(target, hits.length) }, () => slot()));

    if (unitsReported < target) {
      progress.advance(target - unitsReported);
    }

    return accepted.sort((a, b) => a.index - b.index).map((a) => a.content);
  }

  private async extractHit(hit: SourceHit, signal: AbortSignal): Promise<ExtractedContent> {
    signal.throwIfAborted();

    const fromMetadata = contentFromMetadata(hit);
    if (fromMetadata) {
      return fromMetadata;
    }

    const page = await withDeadline(
      (attemptSignal) => this.extractor.extract(hit.url, attemptSignal),
      this.config.extractionTimeoutMs,
      () => new ExtractionError(hit.url, 'FetchFailed', `timed out after ${this.config.extractionTimeoutMs}ms`),
      signal
    );
    return { ...page, backendKind: hit.backendKind };
  }
}
