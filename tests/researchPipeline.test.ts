import { ResearchPipeline, PipelineListener, contentFromMetadata } from '../src/application/services/ResearchPipeline.js';
import { BackendFailure, SkippedSource } from '../src/core/entities/Job.js';
import { getConfig } from '../src/config.js';
import { BackendKind, SourceHit } from '../src/core/entities/SourceHit.js';
import { ISearchAdapter } from '../src/core/interfaces/ISearchAdapter.js';
import { ExtractionError, JobCancelledError, SearchError } from '../src/core/errors/ResearchErrors.js';
import {
  FakeExtractor,
  FakeSearchAdapter,
  TEST_PIPELINE_CONFIG,
  deferred,
  makeHit,
  makeHits,
  pageFor,
  silentLogger,
} from './helpers/fakes.js';

function recordingListener() {
  const progress: Array<{ progress: number; message: string }> = [];
  const skipped: SkippedSource[] = [];
  const failures: BackendFailure[] = [];
  const listener: PipelineListener = {
    progress: (value, message) => progress.push({ progress: value, message }),
    skipped: (source) => skipped.push(source),
    backendFailed: (failure) => failures.push(failure),
  };
  return { listener, progress, skipped, failures };
}

function pipelineWith(adapters: ISearchAdapter[], extractor = new FakeExtractor(), config = TEST_PIPELINE_CONFIG) {
  const registry = new Map<BackendKind, ISearchAdapter>(adapters.map((a) => [a.kind, a]));
  return new ResearchPipeline(registry, extractor, config, silentLogger, () => 0.5);
}

const job = (overrides: Partial<{ sources: 'web' | 'academic' | 'both'; numResults: number }> = {}) => ({
  id: 'job-1',
  query: 'tidal energy',
  sources: overrides.sources ?? ('both' as const),
  numResults: overrides.numResults ?? 2,
});

const rateLimited = (backend: BackendKind) => new SearchError(backend, 'RateLimited', 'HTTP 429 Too Many Requests');

describe('ResearchPipeline', () => {
  test('should search both backends and extract the target per backend', async () => {
    const web = FakeSearchAdapter.returning('web', makeHits('web', 4));
    const academic = FakeSearchAdapter.returning('academic', makeHits('academic', 4));
    const extractor = new FakeExtractor();
    const { listener, progress } = recordingListener();

    const result = await pipelineWith([web, academic], extractor).run(job(), new AbortController().signal, listener);

    expect(result.hitCount).toBe(8);
    expect(result.extractedCount).toBe(4);
    expect(extractor.calls.sort()).toEqual([
      'https://academic.example.com/1',
      'https://academic.example.com/2',
      'https://web.example.com/1',
      'https://web.example.com/2',
    ]);
    expect(web.calls).toEqual([{ query: 'tidal energy', count: 4 }]);
    expect(result.rawData).toContain('DETAILED CONTENT FROM TOP 4 SOURCES:');
    expect(result.rawData).toContain('Searched web and academic sources - Found 8 results');

    const values = progress.map((p) => p.progress);
    expect(values).toEqual([...values].sort((a, b) => a - b));
    expect(values[values.length - 1]).toBe(59);
    expect(progress.map((p) => p.message)).toEqual(
      expect.arrayContaining(['Found 4 web results', 'Found 4 academic results'])
    );
  });

  test('should cap the requested count at the per-backend maximum', async () => {
    const web = FakeSearchAdapter.returning('web', makeHits('web', 10));
    await pipelineWith([web], new FakeExtractor(), { ...TEST_PIPELINE_CONFIG, maxResultsPerBackend: 5 }).run(
      job({ sources: 'web', numResults: 3 }),
      new AbortController().signal,
      recordingListener().listener
    );
    expect(web.calls[0].count).toBe(5);
  });

  test('should replace a failed extraction with the next candidate', async () => {
    const web = FakeSearchAdapter.returning('web', makeHits('web', 4));
    const extractor = new FakeExtractor(async (url) => {
      if (url.endsWith('/1')) {
        throw new ExtractionError(url, 'FetchFailed', 'HTTP 404 Not Found');
      }
      return pageFor(url);
    });
    const { listener, skipped, progress } = recordingListener();

    const result = await pipelineWith([web], extractor).run(
      job({ sources: 'web' }),
      new AbortController().signal,
      listener
    );

    expect(result.extractedCount).toBe(2);
    expect(result.rawData).toContain('SOURCE 1: Page https://web.example.com/2');
    expect(result.rawData).toContain('SOURCE 2: Page https://web.example.com/3');
    expect(result.rawData).not.toContain('SOURCE 3:');
    expect(skipped).toEqual([
      {
        url: 'https://web.example.com/1',
        title: 'web result 1',
        backendKind: 'web',
        reason: 'Extraction error for https://web.example.com/1: HTTP 404 Not Found',
      },
    ]);
    expect(progress.map((p) => p.message)).toContain(
      'Skipped https://web.example.com/1: Extraction error for https://web.example.com/1: HTTP 404 Not Found'
    );
  });

  test('should have a spare candidate for a failed extraction under the default settings', async () => {
    const { search } = getConfig(['node', 'dist/index.js'], {});
    const web = FakeSearchAdapter.returning('web', makeHits('web', 10));
    const extractor = new FakeExtractor(async (url) => {
      if (url.endsWith('/1')) {
        throw new ExtractionError(url, 'FetchFailed', 'HTTP 404 Not Found');
      }
      return pageFor(url);
    });
    const pipeline = pipelineWith([web], extractor, {
      ...TEST_PIPELINE_CONFIG,
      overfetchFactor: search.overfetchFactor,
      maxResultsPerBackend: search.maxResultsPerBackend,
    });

    const result = await pipeline.run(
      job({ sources: 'web', numResults: 2 }),
      new AbortController().signal,
      recordingListener().listener
    );

    expect(web.calls).toEqual([{ query: 'tidal energy', count: 6 }]);
    expect(extractor.calls).toHaveLength(3);
    expect(result.extractedCount).toBe(2);
  });

  test('should keep raw data in hit order even when extractions finish out of order', async () => {
    const web = FakeSearchAdapter.returning('web', makeHits('web', 2));
    const extractor = new FakeExtractor(async (url) => {
      if (url.endsWith('/1')) {
        await new Promise((resolve) => setTimeout(resolve, 20));
      }
      return pageFor(url);
    });

    const result = await pipelineWith([web], extractor).run(
      job({ sources: 'web' }),
      new AbortController().signal,
      recordingListener().listener
    );

    expect(result.rawData.indexOf('SOURCE 1: Page https://web.example.com/1')).toBeGreaterThan(-1);
    expect(result.rawData.indexOf('SOURCE 2: Page https://web.example.com/2')).toBeGreaterThan(-1);
  });

  test('should carry on without a failed backend', async () => {
    const web = FakeSearchAdapter.returning('web', makeHits('web', 2));
    const academic = FakeSearchAdapter.failing(
      'academic',
      new SearchError('academic', 'Unreachable', 'HTTP 503 Service Unavailable')
    );
    const { listener, failures, progress } = recordingListener();

    const result = await pipelineWith([web, academic]).run(job(), new AbortController().signal, listener);

    expect(result.extractedCount).toBe(2);
    expect(failures).toEqual([
      {
        backendKind: 'academic',
        kind: 'Unreachable',
        message: 'Search error (academic): unreachable - HTTP 503 Service Unavailable',
      },
    ]);
    expect(progress.map((p) => p.message)).toContain(
      'Continuing without academic search: Search error (academic): unreachable - HTTP 503 Service Unavailable'
    );
    expect(result.rawData).toContain(
      'ERRORS ENCOUNTERED:\n- Search error (academic): unreachable - HTTP 503 Service Unavailable\n'
    );
  });

  test('should retry a rate limited backend and use its results', async () => {
    let attempts = 0;
    const academic = new FakeSearchAdapter('academic', async () => {
      attempts++;
      if (attempts === 1) {
        throw rateLimited('academic');
      }
      return makeHits('academic', 2);
    });

    const result = await pipelineWith([academic]).run(
      job({ sources: 'academic' }),
      new AbortController().signal,
      recordingListener().listener
    );

    expect(academic.calls).toHaveLength(2);
    expect(result.extractedCount).toBe(2);
  });

  test('should fail when every backend fails', async () => {
    const web = FakeSearchAdapter.failing('web', new SearchError('web', 'Unreachable', 'HTTP 502 Bad Gateway'));
    const academic = FakeSearchAdapter.failing('academic', rateLimited('academic'));

    await expect(
      pipelineWith([web, academic]).run(job(), new AbortController().signal, recordingListener().listener)
    ).rejects.toThrow(
      'All search backends failed: Search error (web): unreachable - HTTP 502 Bad Gateway; Search error (academic): rate limited - HTTP 429 Too Many Requests'
    );
    expect(academic.calls).toHaveLength(3);
  });

  test('should fail when the backends return no hits', async () => {
    const web = FakeSearchAdapter.returning('web', []);
    await expect(
      pipelineWith([web]).run(job({ sources: 'web' }), new AbortController().signal, recordingListener().listener)
    ).rejects.toThrow('No search results found');
  });

  test('should fail when no hit yields content', async () => {
    const web = FakeSearchAdapter.returning('web', makeHits('web', 4));
    const extractor = new FakeExtractor(async (url) => {
      throw new ExtractionError(url, 'Unsupported', 'low quality or restricted content');
    });

    await expect(
      pipelineWith([web], extractor).run(
        job({ sources: 'web' }),
        new AbortController().signal,
        recordingListener().listener
      )
    ).rejects.toThrow('Content extraction failed for all 4 sources');
    expect(extractor.calls).toHaveLength(4);
  });

  test('should time out a search that does not answer', async () => {
    const web = new FakeSearchAdapter('web', () => new Promise<SourceHit[]>(() => undefined));
    const academic = FakeSearchAdapter.returning('academic', makeHits('academic', 2));
    const { listener, failures } = recordingListener();

    await pipelineWith([web, academic], new FakeExtractor(), {
      ...TEST_PIPELINE_CONFIG,
      searchTimeoutMs: { web: 20, academic: 1000 },
    }).run(job(), new AbortController().signal, listener);

    expect(failures).toEqual([
      { backendKind: 'web', kind: 'Unreachable', message: 'Search error (web): unreachable - timed out after 20ms' },
    ]);
  });

  test('should bound concurrent extractions per job', async () => {
    const extractor = new FakeExtractor(async (url) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return pageFor(url);
    });
    const web = FakeSearchAdapter.returning('web', makeHits('web', 4));
    const academic = FakeSearchAdapter.returning('academic', makeHits('academic', 4));

    await pipelineWith([web, academic], extractor, { ...TEST_PIPELINE_CONFIG, perJobConcurrency: 1 }).run(
      job({ numResults: 3 }),
      new AbortController().signal,
      recordingListener().listener
    );

    expect(extractor.maxActive).toBe(1);
    expect(extractor.calls).toHaveLength(6);
  });

  test('should resolve academic hits with an abstract from their metadata', async () => {
    const hit: SourceHit = {
      ...makeHit('academic', 1),
      metadata: {
        authors: 'Ada Lovelace',
        year: '2021',
        venue: 'Ocean Letters',
        abstract:
          'Tidal turbines convert the motion of tides into electricity. We measure their output over two full years.',
      },
    };
    const academic = FakeSearchAdapter.returning('academic', [hit]);
    const extractor = new FakeExtractor();

    const result = await pipelineWith([academic], extractor).run(
      job({ sources: 'academic', numResults: 1 }),
      new AbortController().signal,
      recordingListener().listener
    );

    expect(extractor.calls).toEqual([]);
    expect(result.rawData).toContain('Description: Academic paper by Ada Lovelace (2021)');
    expect(result.rawData).toContain(
      'Content:\nAuthors: Ada Lovelace\nYear: 2021\nPublished in: Ocean Letters\n\nAbstract:\nTidal turbines'
    );
  });

  test('contentFromMetadata should ignore web hits and missing abstracts', () => {
    expect(contentFromMetadata(makeHit('web', 1))).toBeNull();
    expect(
      contentFromMetadata({
        ...makeHit('academic', 1),
        metadata: { authors: 'A', year: '', venue: '', abstract: 'No abstract available' },
      })
    ).toBeNull();
  });

  test('should stop with the abort reason once the job is cancelled', async () => {
    const gate = deferred<SourceHit[]>();
    const web = new FakeSearchAdapter('web', () => gate.promise);
    const extractor = new FakeExtractor();
    const controller = new AbortController();

    const running = pipelineWith([web], extractor).run(
      job({ sources: 'web' }),
      controller.signal,
      recordingListener().listener
    );
    controller.abort(new JobCancelledError('job-1'));
    gate.resolve(makeHits('web', 2));

    await expect(running).rejects.toBeInstanceOf(JobCancelledError);
    expect(extractor.calls).toEqual([]);
  });
});
