import { z } from 'zod';
import { ISearchAdapter } from '../../core/interfaces/ISearchAdapter.js';
import { SourceHit } from '../../core/entities/SourceHit.js';
import { SearchError } from '../../core/errors/ResearchErrors.js';
import { Config } from '../../config.js';
import { FetchLike, defaultFetch, fetchForSearch, readSearchBody } from '../http/HttpClient.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { sleep } from '../../utils/retry.js';
import { clip } from '../../utils/text.js';

export type AcademicSearchConfig = Pick<
  Config['search'],
  | 'academicSearchUrl'
  | 'academicTimeoutMs'
  | 'academicMinIntervalMs'
  | 'userAgent'
  | 'maxSnippetLength'
  | 'semanticScholarApiKey'
>;

const PAPER_FIELDS = 'title,authors,year,venue,url,abstract';
const MAX_TITLE_LENGTH = 100;
const MAX_URL_LENGTH = 150;
const MAX_LISTED_AUTHORS = 3;

const PaperSchema = z.object({
  title: z.string().nullish(),
  authors: z.array(z.object({ name: z.string().nullish() })).nullish(),
  year: z.number().int().nullish(),
  venue: z.string().nullish(),
  url: z.string().nullish(),
  abstract: z.string().nullish(),
});

const SearchResponseSchema = z.object({
  total: z.number().optional(),
  data: z.array(PaperSchema).nullish(),
});

type Paper = z.infer<typeof PaperSchema>;

export function formatAuthors(authors: Paper['authors']): string {
  const names = (authors ?? []).map((a) => a.name?.trim() ?? '').filter((name) => name.length > 0);
  if (names.length === 0) {
    return 'Unknown authors';
  }
  const listed = names.slice(0, MAX_LISTED_AUTHORS);
  if ((authors ?? []).length > MAX_LISTED_AUTHORS) {
    listed.push('et al.');
  }
  return listed.join(', ');
}

/**
 * Academic paper search through the Semantic Scholar Graph API.
 * Requests from one adapter instance are spaced at least `academicMinIntervalMs` apart.
 */
export class AcademicSearchAdapter implements ISearchAdapter {
  readonly kind = 'academic' as const;
  private nextRequestAt = 0;

  constructor(
    private readonly config: AcademicSearchConfig,
    private readonly fetchImpl: FetchLike = defaultFetch,
    private readonly logger: Logger = createLogger('AcademicSearch'),
    private readonly now: () => number = Date.now
  ) {}

  async search(query: string, count: number, signal?: AbortSignal): Promise<SourceHit[]> {
    await this.awaitRequestSlot(signal);

    const url = new URL(this.config.academicSearchUrl);
    url.searchParams.set('query', query);
    url.searchParams.set('limit', String(count));
    url.searchParams.set('fields', PAPER_FIELDS);

    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      Accept: 'application/json',
    };
    if (this.config.semanticScholarApiKey) {
      headers['x-api-key'] = this.config.semanticScholarApiKey;
    }

    this.logger.info(`Searching academic papers for: ${query}`);
    const response = await fetchForSearch(this.fetchImpl, this.kind, url.toString(), {
      headers,
      timeout: this.config.academicTimeoutMs,
      signal,
    });
    const body = await readSearchBody(this.kind, response);

    const hits = this.parsePapers(body, count);
    this.logger.info(`Academic search completed: ${hits.length} results`);
    return hits;
  }

  /**
   * Waits for this call's turn. A call aborted while waiting sends no request
   * and hands its reserved slot back when it is still the latest one.
   */
  private async awaitRequestSlot(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const now = this.now();
    const previous = this.nextRequestAt;
    const wait = Math.max(0, previous - now);
    // Reserve the slot before sleeping so concurrent callers queue behind each other
    const reserved = Math.max(now, previous) + this.config.academicMinIntervalMs;
    this.nextRequestAt = reserved;

    if (wait > 0) {
      this.logger.debug(`Rate limiting: waiting ${wait}ms before API call`);
      try {
        await sleep(wait, signal);
      } catch (error) {
        if (this.nextRequestAt === reserved) {
          this.nextRequestAt = previous;
        }
        throw error;
      }
    }
  }

  private parsePapers(body: string, count: number): SourceHit[] {
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new SearchError(this.kind, 'Malformed', 'response is not valid JSON', { cause: error });
    }

    const parsed = SearchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new SearchError(
        this.kind,
        'Malformed',
        `unexpected payload shape at ${issue.path.join('.') || 'root'}: ${issue.message}`,
        { cause: parsed.error }
      );
    }

    const hits: SourceHit[] = [];
    for (const paper of parsed.data.data ?? []) {
      if (hits.length >= count) break;
      const hit = this.toHit(paper);
      if (hit) {
        hits.push(hit);
      }
    }
    return hits;
  }

  private toHit(paper: Paper): SourceHit | null {
    const url = paper.url?.trim();
    if (!url) {
      return null;
    }

    const authors = formatAuthors(paper.authors);
    const year = paper.year != null ? String(paper.year) : '';
    const venue = paper.venue?.trim() ?? '';
    const abstract = paper.abstract?.trim() || 'No abstract available';

    let publication = `${authors} (${year})`;
    if (venue) {
      publication += ` - ${venue}`;
    }
    const snippet =
      publication.length > 75
        ? `${publication.slice(0, 75)}... ${abstract.slice(0, 125)}`
        : `${publication} ${abstract}`;

    return {
      title: clip(paper.title?.trim() || 'Untitled Paper', MAX_TITLE_LENGTH),
      url: clip(url, MAX_URL_LENGTH),
      snippet: clip(snippet, this.config.maxSnippetLength),
      backendKind: this.kind,
      metadata: { authors, year, venue, abstract },
    };
  }
}
