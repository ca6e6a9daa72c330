import * as cheerio from 'cheerio';
import { ISearchAdapter } from '../../core/interfaces/ISearchAdapter.js';
import { SourceHit } from '../../core/entities/SourceHit.js';
import { SearchError } from '../../core/errors/ResearchErrors.js';
import { Config } from '../../config.js';
import { FetchLike, defaultFetch, fetchForSearch, readSearchBody } from '../http/HttpClient.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { clip, normalizeWhitespace } from '../../utils/text.js';

export type WebSearchConfig = Pick<
  Config['search'],
  'webSearchUrl' | 'webTimeoutMs' | 'userAgent' | 'maxSnippetLength'
>;

const MAX_TITLE_LENGTH = 100;
const MAX_URL_LENGTH = 150;
const NO_SNIPPET = 'No snippet available';

/**
 * DuckDuckGo redirect links carry the destination in the `uddg` parameter
 */
export function unwrapRedirect(href: string): string {
  if (!href.includes('duckduckgo.com')) {
    return href;
  }
  const match = /uddg=([^&]+)/.exec(href);
  if (!match) {
    return href;
  }
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return match[1];
  }
}

/**
 * Web search through the DuckDuckGo HTML endpoint
 */
export class WebSearchAdapter implements ISearchAdapter {
  readonly kind = 'web' as const;

  constructor(
    private readonly config: WebSearchConfig,
    private readonly fetchImpl: FetchLike = defaultFetch,
    private readonly logger: Logger = createLogger('WebSearch')
  ) {}

  async search(query: string, count: number, signal?: AbortSignal): Promise<SourceHit[]> {
    const url = new URL(this.config.webSearchUrl);
    url.searchParams.set('q', query);

    this.logger.info(`Searching web for: ${query}`);
    const response = await fetchForSearch(this.fetchImpl, this.kind, url.toString(), {
      headers: {
        'User-Agent': this.config.userAgent,
        Accept: 'text/html,application/xhtml+xml',
      },
      timeout: this.config.webTimeoutMs,
      signal,
    });
    const html = await readSearchBody(this.kind, response);

    const hits = this.parseResults(html, count);
    this.logger.info(`Web search completed: ${hits.length} results`);
    return hits;
  }

  private parseResults(html: string, count: number): SourceHit[] {
    let $: cheerio.CheerioAPI;
    try {
      $ = cheerio.load(html);
    } catch (error) {
      throw new SearchError(this.kind, 'Malformed', 'unparsable HTML', { cause: error });
    }

    const hits: SourceHit[] = [];

    $('.result').each((_, block) => {
      if (hits.length >= count) {
        return false;
      }

      const link = $(block).find('.result__title a').first();
      if (link.length === 0) {
        return undefined;
      }

      const href = unwrapRedirect(link.attr('href') ?? '');
      if (!href) {
        return undefined;
      }

      const snippetText = normalizeWhitespace($(block).find('.result__snippet').first().text());

      hits.push({
        title: clip(normalizeWhitespace(link.text()), MAX_TITLE_LENGTH),
        url: clip(href, MAX_URL_LENGTH),
        snippet: clip(snippetText || NO_SNIPPET, this.config.maxSnippetLength),
        backendKind: this.kind,
      });
      return undefined;
    });

    return hits;
  }
}
