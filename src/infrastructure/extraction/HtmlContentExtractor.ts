import * as cheerio from 'cheerio';
import { Response } from 'node-fetch';
import { IContentExtractor } from '../../core/interfaces/IContentExtractor.js';
import { ExtractedContent } from '../../core/entities/SourceHit.js';
import { ExtractionError, errorMessage } from '../../core/errors/ResearchErrors.js';
import { Config } from '../../config.js';
import { FetchLike, defaultFetch, isSizeLimitError, isTimeoutError } from '../http/HttpClient.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { isMeaningfulContent } from '../../utils/contentQuality.js';
import { clip, normalizeWhitespace, safeTruncate } from '../../utils/text.js';

export type ExtractionConfig = Config['extraction'] & { userAgent: string };

const MAX_TITLE_LENGTH = 100;
const MAX_DESCRIPTION_LENGTH = 200;
const MAX_PARAGRAPH_LENGTH = 300;
const MIN_PARAGRAPH_LENGTH = 15;
const MAX_FALLBACK_ELEMENTS = 8;
const MAX_FALLBACK_ELEMENT_LENGTH = 200;
const MAX_BODY_TEXT_LENGTH = 500;

const HTML_TYPES = ['text/html', 'application/xhtml+xml'];

type ExtractionResult = Omit<ExtractedContent, 'backendKind'>;

/**
 * Fetches a page with node-fetch and reduces it to bounded plain text with cheerio
 */
export class HtmlContentExtractor implements IContentExtractor {
  constructor(
    private readonly config: ExtractionConfig,
    private readonly fetchImpl: FetchLike = defaultFetch,
    private readonly logger: Logger = createLogger('ContentExtractor')
  ) {}

  async extract(url: string, signal?: AbortSignal): Promise<ExtractionResult> {
    this.logger.debug(`Extracting content from: ${url}`);

    const response = await this.fetchPage(url, signal);
    const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
    const isHtml = contentType === '' || HTML_TYPES.some((type) => contentType.includes(type));

    if (!isHtml && !contentType.startsWith('text/plain')) {
      throw new ExtractionError(url, 'Unsupported', `unsupported content type ${contentType.split(';')[0]}`);
    }

    const declaredLength = Number(response.headers.get('content-length') ?? NaN);
    if (Number.isFinite(declaredLength) && declaredLength > this.config.maxExtractionSize) {
      throw new ExtractionError(
        url,
        'TooLarge',
        `document is ${declaredLength} bytes, limit is ${this.config.maxExtractionSize}`
      );
    }

    const body = await this.readBody(url, response);
    const page = isHtml ? this.parseHtml(body) : this.parsePlainText(body);

    if (!isMeaningfulContent(page.content, page.description, page.title)) {
      throw new ExtractionError(url, 'Unsupported', 'low quality or restricted content');
    }

    this.logger.debug(`Content extraction completed for: ${url}`);
    return {
      title: page.title,
      url,
      description: page.description,
      content: safeTruncate(page.content, this.config.maxContentLength),
      extractedAt: new Date(),
    };
  }

  private async fetchPage(url: string, signal?: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
        timeout: this.config.timeoutMs,
        size: this.config.maxExtractionSize,
        signal,
      });
    } catch (error) {
      throw this.mapFetchError(url, error);
    }

    if (!response.ok) {
      throw new ExtractionError(url, 'FetchFailed', `HTTP ${response.status} ${response.statusText}`.trim());
    }
    return response;
  }

  private async readBody(url: string, response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw this.mapFetchError(url, error);
    }
  }

  private mapFetchError(url: string, error: unknown): ExtractionError {
    if (isSizeLimitError(error)) {
      return new ExtractionError(url, 'TooLarge', `document exceeds ${this.config.maxExtractionSize} bytes`, {
        cause: error,
      });
    }
    if (isTimeoutError(error)) {
      return new ExtractionError(url, 'FetchFailed', `timed out after ${this.config.timeoutMs}ms`, { cause: error });
    }
    return new ExtractionError(url, 'FetchFailed', errorMessage(error), { cause: error });
  }

  private parseHtml(html: string): { title: string; description: string; content: string } {
    const $ = cheerio.load(html);
    $('script, style, noscript, template').remove();

    const title = clip(normalizeWhitespace($('title').first().text()), MAX_TITLE_LENGTH) || 'No title';
    const description =
      clip(normalizeWhitespace($('meta[name="description"]').attr('content') ?? ''), MAX_DESCRIPTION_LENGTH) ||
      'No description available';

    return { title, description, content: this.extractContent($) };
  }

  private parsePlainText(text: string): { title: string; description: string; content: string } {
    const paragraphs = text
      .split(/\n\s*\n/)
      .map((p) => normalizeWhitespace(p))
      .filter((p) => p.length > 0);

    return {
      title: clip(paragraphs[0] ?? 'No title', MAX_TITLE_LENGTH),
      description: 'No description available',
      content: paragraphs.join('\n\n'),
    };
  }

  /**
   * Paragraphs first, then headings mixed with paragraphs, then all visible text
   */
  private extractContent($: cheerio.CheerioAPI): string {
    const paragraphs = $('p')
      .slice(0, this.config.maxParagraphs)
      .toArray()
      .map((el) => normalizeWhitespace($(el).text()))
      .filter((text) => text.length > MIN_PARAGRAPH_LENGTH)
      .map((text) => clip(text, MAX_PARAGRAPH_LENGTH));

    if (paragraphs.length >= 2) {
      return paragraphs.join('\n\n');
    }

    const elements = $('h1, h2, h3, p')
      .slice(0, MAX_FALLBACK_ELEMENTS)
      .toArray()
      .map((el) => normalizeWhitespace($(el).text()))
      .filter((text) => text.length > 10)
      .map((text) => clip(text, MAX_FALLBACK_ELEMENT_LENGTH));

    if (elements.length > 0) {
      return elements.join('\n\n');
    }

    return clip(normalizeWhitespace($('body').text() || $.root().text()), MAX_BODY_TEXT_LENGTH);
  }
}
